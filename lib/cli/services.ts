// lib/cli/services.ts
import { LambdaClient } from '@aws-sdk/client-lambda';
import { SageMakerClient } from '@aws-sdk/client-sagemaker';
import { SageMakerRuntimeClient } from '@aws-sdk/client-sagemaker-runtime';
import { EndpointLifecycleOrchestrator } from '../endpoint-lifecycle/orchestrator';
import { FunctionDeployer, FunctionSpec, LambdaFunctionGateway } from '../genai/function-deployer';
import { buildPipelineDefinition, pipelineSettingsFromConfig } from '../pipeline/pipeline-definition';
import { PipelineRunner } from '../pipeline/pipeline-runner';
import { SageMakerPipelineRegistry } from '../pipeline/sagemaker-pipeline-registry';
import { OrchestratorSettings, createOrchestrator } from '../platform/orchestrator-factory';
import { SageMakerServingPlatform } from '../platform/sagemaker-serving-platform';
import { EndpointInvoker, SageMakerEndpointInvoker } from '../smoke/endpoint-smoke-test';
import { FunctionInvoker, LambdaFunctionInvoker } from '../smoke/function-smoke-test';
import { AppConfig, projectPrefix } from '../utils/config-loader';

/** Collaborators the CLI commands run against. */
export interface CliServices {
  pipelineRunner(): PipelineRunner;
  orchestrator(): EndpointLifecycleOrchestrator;
  functionDeployer(): FunctionDeployer;
  endpointInvoker(): EndpointInvoker;
  functionInvoker(): FunctionInvoker;
}

export function orchestratorSettingsFromConfig(config: AppConfig): OrchestratorSettings {
  const { Pipeline: pipeline, Endpoint: endpoint } = config;
  return {
    trainingOutputUri: `s3://${pipeline.ArtifactBucket}/training-output`,
    executionRoleArn: pipeline.ExecutionRoleArn,
    inferenceImageUri: pipeline.InferenceImageUri,
    outcomeBucket: pipeline.ArtifactBucket,
    outcomePrefix: config.Stack.EndpointDeployment.OutcomePrefix,
    polling: {
      intervalMs: endpoint.PollIntervalSeconds * 1000,
      budgetMs: endpoint.TimeoutSeconds * 1000,
    },
    failedEndpointPolicy: endpoint.FailedEndpointPolicy,
    region: config.Project.Region,
    tags: { Project: projectPrefix(config.Project) },
  };
}

export function functionSpecFromConfig(config: AppConfig): FunctionSpec {
  const genAi = config.GenAi;
  return {
    functionName: genAi.FunctionName,
    roleArn: genAi.RoleArn,
    runtime: genAi.Runtime,
    handler: genAi.Handler,
    timeoutSeconds: genAi.TimeoutSeconds,
    memorySize: genAi.MemorySize,
    description: 'Generative AI inference via Amazon Bedrock',
    environment: {
      MODEL_ID: genAi.ModelId,
      MAX_TOKENS: String(genAi.MaxTokens),
      TEMPERATURE: String(genAi.Temperature),
    },
  };
}

export function createAwsServices(config: AppConfig): CliServices {
  const region = config.Project.Region;
  const sagemaker = new SageMakerClient({ region });
  const lambda = new LambdaClient({ region });

  return {
    pipelineRunner: () => new PipelineRunner({
      registry: new SageMakerPipelineRegistry(sagemaker),
      pipelineName: config.Pipeline.Name,
      roleArn: config.Pipeline.ExecutionRoleArn,
      definition: buildPipelineDefinition(pipelineSettingsFromConfig(config)),
      polling: {
        intervalMs: config.Pipeline.PollIntervalSeconds * 1000,
        budgetMs: config.Pipeline.TimeoutMinutes * 60_000,
      },
    }),
    orchestrator: () => {
      const settings = orchestratorSettingsFromConfig(config);
      return createOrchestrator(settings, {
        platform: new SageMakerServingPlatform({ client: sagemaker, tags: settings.tags }),
      });
    },
    functionDeployer: () => new FunctionDeployer({ gateway: new LambdaFunctionGateway(lambda) }),
    endpointInvoker: () => new SageMakerEndpointInvoker(new SageMakerRuntimeClient({ region })),
    functionInvoker: () => new LambdaFunctionInvoker(lambda),
  };
}
