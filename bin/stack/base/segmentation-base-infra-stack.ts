import * as cdk from 'aws-cdk-lib';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as kms from 'aws-cdk-lib/aws-kms';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as sagemaker from 'aws-cdk-lib/aws-sagemaker';
import { Construct } from 'constructs';
import { BucketDeployment, Source } from 'aws-cdk-lib/aws-s3-deployment';
import { join } from 'path';
import * as fs from 'fs';
import { BaseStack, StackCommonProps } from '../../../lib/base/base-stack';
import { BaseInfraStackConfig } from '../../../lib/utils/config-loader';

export interface SegmentationBaseInfraOptions {
  /** Directory uploaded to the config bucket under `config/`. Skipped when missing. */
  readonly configDirectory?: string;
}

export class SegmentationBaseInfraStack extends BaseStack {
  public readonly modelArtifactBucket: s3.IBucket;
  public readonly configBucket: s3.IBucket;
  public readonly sagemakerBaseRole: iam.IRole;
  public readonly genAiFunctionRole: iam.IRole;
  public readonly encryptionKey?: kms.IKey;
  public readonly modelPackageGroup: sagemaker.CfnModelPackageGroup;

  constructor(
    scope: Construct,
    props: StackCommonProps,
    stackConfig: BaseInfraStackConfig,
    options: SegmentationBaseInfraOptions = {},
  ) {
    super(scope, props, stackConfig);

    if (stackConfig.EnableEncryption) {
      this.encryptionKey = new kms.Key(this, 'EncryptionKey', {
        alias: `${this.projectPrefix}-key`,
        description: 'KMS key for segmentation model artifacts',
        enableKeyRotation: true,
      });
    }

    const bucketSuffix = stackConfig.TestMode ? '' : '-bucket';
    const bucketProps = (bucketName: string): s3.BucketProps => ({
      bucketName: bucketName.toLowerCase(),
      encryption: this.encryptionKey ? s3.BucketEncryption.KMS : s3.BucketEncryption.S3_MANAGED,
      encryptionKey: this.encryptionKey,
      versioned: stackConfig.EnableVersioning,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      removalPolicy: stackConfig.TestMode ? cdk.RemovalPolicy.DESTROY : cdk.RemovalPolicy.RETAIN,
    });

    this.modelArtifactBucket = new s3.Bucket(this, 'ModelArtifactBucket',
      bucketProps(`${this.projectPrefix}-model-artifacts${bucketSuffix}`));
    this.configBucket = new s3.Bucket(this, 'ConfigBucket',
      bucketProps(`${this.projectPrefix}-configs${bucketSuffix}`));

    const configDirectory = options.configDirectory ?? join(__dirname, '../../../config');
    if (fs.existsSync(configDirectory)) {
      new BucketDeployment(this, 'DeployConfigFiles', {
        sources: [Source.asset(configDirectory, { exclude: ['*.ts'] })],
        destinationBucket: this.configBucket,
        destinationKeyPrefix: 'config',
      });
    }

    this.sagemakerBaseRole = new iam.Role(this, 'SageMakerBaseRole', {
      assumedBy: new iam.ServicePrincipal('sagemaker.amazonaws.com'),
      roleName: `${this.projectPrefix}-sagemaker-base-role`,
      managedPolicies: [
        iam.ManagedPolicy.fromAwsManagedPolicyName('AmazonSageMakerFullAccess'),
      ],
    });
    this.modelArtifactBucket.grantReadWrite(this.sagemakerBaseRole);
    this.configBucket.grantRead(this.sagemakerBaseRole);
    this.encryptionKey?.grantEncryptDecrypt(this.sagemakerBaseRole);

    // Role of the Bedrock function, which the CLI creates outside CloudFormation.
    this.genAiFunctionRole = new iam.Role(this, 'GenAiFunctionRole', {
      assumedBy: new iam.ServicePrincipal('lambda.amazonaws.com'),
      roleName: `${this.projectPrefix}-genai-lambda-role`,
      managedPolicies: [
        iam.ManagedPolicy.fromAwsManagedPolicyName('service-role/AWSLambdaBasicExecutionRole'),
      ],
    });
    this.genAiFunctionRole.addToPrincipalPolicy(new iam.PolicyStatement({
      actions: ['bedrock:InvokeModel'],
      resources: [`arn:aws:bedrock:${this.region}::foundation-model/*`],
    }));

    this.modelPackageGroup = new sagemaker.CfnModelPackageGroup(this, 'ModelPackageGroup', {
      modelPackageGroupName: `${this.projectPrefix}-model-group`,
      modelPackageGroupDescription: 'Customer segmentation models registered by the training pipeline',
    });

    this.putParameter('modelArtifactBucketName', this.modelArtifactBucket.bucketName);
    this.putParameter('configBucketName', this.configBucket.bucketName);
    this.putParameter('sageMakerBaseRoleArn', this.sagemakerBaseRole.roleArn);
    this.putParameter('genAiFunctionRoleArn', this.genAiFunctionRole.roleArn);

    new cdk.CfnOutput(this, 'ModelArtifactBucketName', {
      value: this.modelArtifactBucket.bucketName,
      exportName: `${this.projectPrefix}-model-artifact-bucket-name`,
    });

    new cdk.CfnOutput(this, 'ConfigBucketName', {
      value: this.configBucket.bucketName,
      exportName: `${this.projectPrefix}-config-bucket-name`,
    });

    new cdk.CfnOutput(this, 'SageMakerBaseRoleArn', {
      value: this.sagemakerBaseRole.roleArn,
      exportName: `${this.projectPrefix}-sagemaker-base-role-arn`,
    });

    new cdk.CfnOutput(this, 'GenAiFunctionRoleArn', {
      value: this.genAiFunctionRole.roleArn,
      exportName: `${this.projectPrefix}-genai-lambda-role-arn`,
    });

    new cdk.CfnOutput(this, 'ModelPackageGroupName', {
      value: `${this.projectPrefix}-model-group`,
      exportName: `${this.projectPrefix}-model-package-group-name`,
    });
  }
}
