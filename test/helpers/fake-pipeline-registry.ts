import {
  PipelineExecutionDescription,
  PipelineRegistry,
} from '../../lib/pipeline/pipeline-runner';

export class FakePipelineRegistry implements PipelineRegistry {
  public readonly pipelines = new Map<string, { definition: string; roleArn: string }>();
  public readonly started: { pipelineName: string; parameters: { Name: string; Value: string }[] }[] = [];
  /** Statuses handed out by describeExecution, in order; the last one repeats. */
  public statuses: PipelineExecutionDescription[] = [{ status: 'Executing' }, { status: 'Succeeded' }];
  public startFailure?: Error;

  public async pipelineExists(pipelineName: string): Promise<boolean> {
    return this.pipelines.has(pipelineName);
  }

  public async createPipeline(pipelineName: string, definition: string, roleArn: string): Promise<string> {
    this.pipelines.set(pipelineName, { definition, roleArn });
    return pipelineArn(pipelineName);
  }

  public async updatePipeline(pipelineName: string, definition: string, roleArn: string): Promise<string> {
    if (!this.pipelines.has(pipelineName)) {
      throw new Error(`Pipeline ${pipelineName} does not exist`);
    }
    this.pipelines.set(pipelineName, { definition, roleArn });
    return pipelineArn(pipelineName);
  }

  public async startExecution(pipelineName: string, parameters: { Name: string; Value: string }[]): Promise<string> {
    if (this.startFailure) throw this.startFailure;
    this.started.push({ pipelineName, parameters });
    return `${pipelineArn(pipelineName)}/execution/run${this.started.length}`;
  }

  public async describeExecution(): Promise<PipelineExecutionDescription> {
    const next = this.statuses.length > 1 ? this.statuses.shift() : this.statuses[0];
    if (!next) throw new Error('no execution status scripted');
    return next;
  }
}

export function pipelineArn(pipelineName: string): string {
  return `arn:aws:sagemaker:us-east-1:123456789012:pipeline/${pipelineName}`;
}
