// lib/pipeline/pipeline-runner.ts
import { Clock, Sleeper } from '../utils/clock';
import { Logger, logger as rootLogger } from '../utils/logger';
import { PollingBudget, pollUntil } from '../utils/polling';
import { PipelineDefinition, PipelineRunParameters, toPipelineParameters } from './pipeline-definition';

export type PipelineExecutionStatus = 'Executing' | 'Stopping' | 'Stopped' | 'Failed' | 'Succeeded';

export interface PipelineExecutionDescription {
  readonly status: PipelineExecutionStatus;
  readonly failureReason?: string;
}

/** Pipeline operations of the training platform. */
export interface PipelineRegistry {
  pipelineExists(pipelineName: string): Promise<boolean>;
  createPipeline(pipelineName: string, definition: string, roleArn: string): Promise<string>;
  updatePipeline(pipelineName: string, definition: string, roleArn: string): Promise<string>;
  startExecution(pipelineName: string, parameters: { Name: string; Value: string }[]): Promise<string>;
  describeExecution(executionArn: string): Promise<PipelineExecutionDescription>;
}

export interface PipelineDeployment {
  readonly pipelineName: string;
  readonly pipelineArn: string;
  readonly action: 'CREATED' | 'UPDATED';
}

/** What `pipeline --action run` hands to the next stage instead of a printed line. */
export interface PipelineExecution {
  readonly pipelineName: string;
  readonly executionArn: string;
}

export interface PipelineCompletion {
  readonly executionArn: string;
  readonly status: 'Succeeded' | 'Failed' | 'Stopped' | 'TimedOut';
  readonly failureReason?: string;
}

export const DEFAULT_PIPELINE_POLLING: PollingBudget = {
  intervalMs: 60_000,
  budgetMs: 2 * 60 * 60_000,
};

export interface PipelineRunnerProps {
  readonly registry: PipelineRegistry;
  readonly pipelineName: string;
  readonly roleArn: string;
  readonly definition: PipelineDefinition;
  readonly polling?: PollingBudget;
  readonly clock?: Clock;
  readonly sleep?: Sleeper;
  readonly logger?: Logger;
}

export class PipelineRunner {
  private readonly logger: Logger;

  constructor(private readonly props: PipelineRunnerProps) {
    this.logger = (props.logger ?? rootLogger).child({ component: 'pipeline-runner', pipelineName: props.pipelineName });
  }

  /** Creates the pipeline, or replaces the definition of an existing one. */
  public async deploy(): Promise<PipelineDeployment> {
    const { registry, pipelineName, roleArn } = this.props;
    const definition = JSON.stringify(this.props.definition);

    if (await registry.pipelineExists(pipelineName)) {
      const pipelineArn = await registry.updatePipeline(pipelineName, definition, roleArn);
      this.logger.info('pipeline updated', { pipelineArn });
      return { pipelineName, pipelineArn, action: 'UPDATED' };
    }
    const pipelineArn = await registry.createPipeline(pipelineName, definition, roleArn);
    this.logger.info('pipeline created', { pipelineArn });
    return { pipelineName, pipelineArn, action: 'CREATED' };
  }

  public async run(parameters: PipelineRunParameters = {}): Promise<PipelineExecution> {
    const { pipelineName } = this.props;
    const executionArn = await this.props.registry.startExecution(pipelineName, toPipelineParameters(parameters));
    this.logger.info('pipeline execution started', { executionArn, parameters });
    return { pipelineName, executionArn };
  }

  public async waitForCompletion(executionArn: string): Promise<PipelineCompletion> {
    const outcome = await pollUntil(async () => {
      const execution = await this.props.registry.describeExecution(executionArn);
      this.logger.debug('pipeline execution status', { executionArn, status: execution.status });
      return isFinished(execution) ? execution : undefined;
    }, {
      ...(this.props.polling ?? DEFAULT_PIPELINE_POLLING),
      clock: this.props.clock,
      sleep: this.props.sleep,
    });

    if (outcome.status === 'timeout') {
      this.logger.warn('pipeline execution still running when the wait ended', { executionArn });
      return { executionArn, status: 'TimedOut' };
    }
    const { status, failureReason } = outcome.value;
    this.logger.info('pipeline execution finished', { executionArn, status, failureReason });
    return { executionArn, status, failureReason };
  }
}

function isFinished(
  execution: PipelineExecutionDescription,
): execution is PipelineExecutionDescription & { status: 'Succeeded' | 'Failed' | 'Stopped' } {
  return execution.status === 'Succeeded' || execution.status === 'Failed' || execution.status === 'Stopped';
}
