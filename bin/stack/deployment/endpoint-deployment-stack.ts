import * as cdk from 'aws-cdk-lib';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as s3 from 'aws-cdk-lib/aws-s3';
import { Construct } from 'constructs';
import { BaseStack, StackCommonProps } from '../../../lib/base/base-stack';
import { EndpointDeploymentStackConfig } from '../../../lib/utils/config-loader';

export interface EndpointDeploymentOptions {
  /** Bundled deploy-endpoint handler. Defaults to the esbuild output under dist/lambda. */
  readonly handlerCode?: lambda.Code;
}

/**
 * The Lambda the training pipeline's DeployEndpoint step calls. It runs the
 * endpoint lifecycle orchestrator against the freshly trained artifact.
 */
export class EndpointDeploymentStack extends BaseStack {
  public readonly deployFunction: lambda.IFunction;

  constructor(
    scope: Construct,
    props: StackCommonProps,
    stackConfig: EndpointDeploymentStackConfig,
    options: EndpointDeploymentOptions = {},
  ) {
    super(scope, props, stackConfig);

    const { Pipeline: pipeline, Endpoint: endpoint } = props.appConfig;
    const artifactBucket = s3.Bucket.fromBucketName(this, 'ModelArtifactBucket', pipeline.ArtifactBucket);
    const functionName = `${this.projectPrefix}-deploy-endpoint`;

    const role = new iam.Role(this, 'DeployEndpointRole', {
      assumedBy: new iam.ServicePrincipal('lambda.amazonaws.com'),
      roleName: `${this.projectPrefix}-deploy-endpoint-role`,
      managedPolicies: [
        iam.ManagedPolicy.fromAwsManagedPolicyName('service-role/AWSLambdaBasicExecutionRole'),
      ],
    });
    role.addToPrincipalPolicy(new iam.PolicyStatement({
      actions: [
        'sagemaker:DescribeEndpoint',
        'sagemaker:DescribeEndpointConfig',
        'sagemaker:DescribeModel',
        'sagemaker:CreateModel',
        'sagemaker:CreateEndpointConfig',
        'sagemaker:CreateEndpoint',
        'sagemaker:UpdateEndpoint',
        'sagemaker:DeleteEndpoint',
        'sagemaker:AddTags',
      ],
      resources: ['*'],
    }));
    role.addToPrincipalPolicy(new iam.PolicyStatement({
      actions: ['iam:PassRole'],
      resources: [pipeline.ExecutionRoleArn],
      conditions: { StringEquals: { 'iam:PassedToService': 'sagemaker.amazonaws.com' } },
    }));
    artifactBucket.grantReadWrite(role);

    const logGroup = new logs.LogGroup(this, 'DeployEndpointLogGroup', {
      logGroupName: `/aws/lambda/${functionName}`,
      retention: logs.RetentionDays.ONE_MONTH,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
    });

    // Leaves a minute of the function's budget for retry waits and recording the outcome.
    const transitionBudgetSeconds = Math.min(endpoint.TimeoutSeconds, stackConfig.FunctionTimeoutMinutes * 60 - 60);

    this.deployFunction = new lambda.Function(this, 'DeployEndpointFunction', {
      functionName,
      description: 'Creates or updates the segmentation endpoint on a trained artifact',
      runtime: lambda.Runtime.NODEJS_20_X,
      handler: 'index.handler',
      code: options.handlerCode ?? lambda.Code.fromAsset('dist/lambda/deploy-endpoint'),
      role,
      logGroup,
      timeout: cdk.Duration.minutes(stackConfig.FunctionTimeoutMinutes),
      memorySize: 256,
      environment: {
        TRAINING_OUTPUT_URI: `s3://${pipeline.ArtifactBucket}/training-output`,
        EXECUTION_ROLE_ARN: pipeline.ExecutionRoleArn,
        INFERENCE_IMAGE_URI: stackConfig.InferenceImageUri,
        OUTCOME_BUCKET: pipeline.ArtifactBucket,
        OUTCOME_PREFIX: stackConfig.OutcomePrefix,
        POLL_INTERVAL_SECONDS: String(endpoint.PollIntervalSeconds),
        TIMEOUT_SECONDS: String(Math.max(60, transitionBudgetSeconds)),
        FAILED_ENDPOINT_POLICY: endpoint.FailedEndpointPolicy,
      },
    });

    this.putParameter('deployEndpointFunctionArn', this.deployFunction.functionArn);

    new cdk.CfnOutput(this, 'DeployEndpointFunctionArn', {
      value: this.deployFunction.functionArn,
      exportName: `${this.projectPrefix}-deploy-endpoint-function-arn`,
    });
  }
}
