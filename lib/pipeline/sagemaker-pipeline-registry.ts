// lib/pipeline/sagemaker-pipeline-registry.ts
import {
  CreatePipelineCommand,
  DescribePipelineCommand,
  DescribePipelineExecutionCommand,
  SageMakerClient,
  StartPipelineExecutionCommand,
  UpdatePipelineCommand,
} from '@aws-sdk/client-sagemaker';
import { isResourceNotFound } from '../platform/sagemaker-serving-platform';
import { PipelineExecutionDescription, PipelineExecutionStatus, PipelineRegistry } from './pipeline-runner';

export class SageMakerPipelineRegistry implements PipelineRegistry {
  constructor(private readonly client: SageMakerClient = new SageMakerClient({})) {}

  public async pipelineExists(pipelineName: string): Promise<boolean> {
    try {
      await this.client.send(new DescribePipelineCommand({ PipelineName: pipelineName }));
      return true;
    } catch (error) {
      if (isResourceNotFound(error)) return false;
      throw error;
    }
  }

  public async createPipeline(pipelineName: string, definition: string, roleArn: string): Promise<string> {
    const response = await this.client.send(new CreatePipelineCommand({
      PipelineName: pipelineName,
      PipelineDefinition: definition,
      RoleArn: roleArn,
    }));
    return response.PipelineArn ?? pipelineName;
  }

  public async updatePipeline(pipelineName: string, definition: string, roleArn: string): Promise<string> {
    const response = await this.client.send(new UpdatePipelineCommand({
      PipelineName: pipelineName,
      PipelineDefinition: definition,
      RoleArn: roleArn,
    }));
    return response.PipelineArn ?? pipelineName;
  }

  public async startExecution(pipelineName: string, parameters: { Name: string; Value: string }[]): Promise<string> {
    const response = await this.client.send(new StartPipelineExecutionCommand({
      PipelineName: pipelineName,
      PipelineParameters: parameters,
    }));
    if (!response.PipelineExecutionArn) {
      throw new Error(`Pipeline ${pipelineName} started without returning an execution ARN`);
    }
    return response.PipelineExecutionArn;
  }

  public async describeExecution(executionArn: string): Promise<PipelineExecutionDescription> {
    const response = await this.client.send(new DescribePipelineExecutionCommand({ PipelineExecutionArn: executionArn }));
    return {
      status: toExecutionStatus(response.PipelineExecutionStatus),
      failureReason: response.FailureReason,
    };
  }
}

export function toExecutionStatus(status: string | undefined): PipelineExecutionStatus {
  switch (status) {
    case 'Executing':
    case 'Stopping':
    case 'Stopped':
    case 'Failed':
    case 'Succeeded':
      return status;
    default:
      throw new Error(`Unrecognised pipeline execution status ${status ?? '(none)'}`);
  }
}
