// lib/workflow/delivery-workflow.ts
import { describeError } from '../endpoint-lifecycle/errors';
import { FunctionDeployer, FunctionDeployment, FunctionDeploymentRequest } from '../genai/function-deployer';
import { PipelineRunParameters } from '../pipeline/pipeline-definition';
import {
  PipelineCompletion,
  PipelineDeployment,
  PipelineExecution,
  PipelineRunner,
} from '../pipeline/pipeline-runner';
import { EndpointInvoker, SmokeTestResult, smokeTestEndpoint } from '../smoke/endpoint-smoke-test';
import { FunctionInvoker, smokeTestFunction } from '../smoke/function-smoke-test';
import { Clock, systemClock } from '../utils/clock';
import { Logger, logger as rootLogger } from '../utils/logger';

export enum DeliveryStage {
  PipelineDeploy = 'pipeline-deploy',
  PipelineRun = 'pipeline-run',
  PipelineWait = 'pipeline-wait',
  FunctionDeploy = 'function-deploy',
  EndpointSmokeTest = 'endpoint-smoke-test',
  FunctionSmokeTest = 'function-smoke-test',
}

export interface StageRecord {
  readonly stage: DeliveryStage;
  readonly status: 'succeeded' | 'failed';
  readonly durationMs: number;
  readonly detail: string;
}

export interface DeliveryReport {
  readonly succeeded: boolean;
  readonly failedStage?: DeliveryStage;
  readonly stages: readonly StageRecord[];
  readonly pipeline?: PipelineDeployment;
  readonly execution?: PipelineExecution;
  readonly completion?: PipelineCompletion;
  readonly functionDeployment?: FunctionDeployment;
  readonly smokeTests: readonly SmokeTestResult<unknown>[];
}

export interface DeliveryWorkflowProps {
  readonly pipeline: PipelineRunner;
  readonly functionDeployer: FunctionDeployer;
  readonly functionRequest: FunctionDeploymentRequest;
  readonly endpointInvoker: EndpointInvoker;
  readonly functionInvoker: FunctionInvoker;
  readonly endpointName: string;
  readonly parameters?: PipelineRunParameters;
  readonly skipSmokeTests?: boolean;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

type StageOutcome<T> = { ok: true; value: T } | { ok: false };

/**
 * Pipeline deploy → run → wait → GenAI function deploy → smoke tests. Each
 * stage hands its typed result to the next; the first failure ends the run.
 */
export async function runDeliveryWorkflow(props: DeliveryWorkflowProps): Promise<DeliveryReport> {
  const clock = props.clock ?? systemClock;
  const logger = (props.logger ?? rootLogger).child({ component: 'delivery-workflow' });
  const stages: StageRecord[] = [];
  const smokeTests: SmokeTestResult<unknown>[] = [];
  let report: Omit<DeliveryReport, 'succeeded' | 'stages' | 'smokeTests'> = {};

  async function stage<T>(
    name: DeliveryStage,
    run: () => Promise<T>,
    verdict: (value: T) => { passed: boolean; detail: string },
  ): Promise<StageOutcome<T>> {
    const startedAt = clock.now().getTime();
    logger.info('stage started', { stage: name });
    let value: T;
    try {
      value = await run();
    } catch (error) {
      finish(name, startedAt, false, describeError(error));
      return { ok: false };
    }
    const { passed, detail } = verdict(value);
    return finish(name, startedAt, passed, detail) ? { ok: true, value } : { ok: false };
  }

  function finish(name: DeliveryStage, startedAt: number, passed: boolean, detail: string): boolean {
    stages.push({
      stage: name,
      status: passed ? 'succeeded' : 'failed',
      durationMs: clock.now().getTime() - startedAt,
      detail,
    });
    if (passed) {
      logger.info('stage succeeded', { stage: name, detail });
    } else {
      logger.error('stage failed', { stage: name, detail });
      report = { ...report, failedStage: name };
    }
    return passed;
  }

  const done = (): DeliveryReport => ({
    ...report,
    succeeded: report.failedStage === undefined,
    stages,
    smokeTests,
  });

  const deployed = await stage(DeliveryStage.PipelineDeploy, () => props.pipeline.deploy(),
    (value) => ({ passed: true, detail: `${value.action} ${value.pipelineArn}` }));
  if (!deployed.ok) return done();
  report = { ...report, pipeline: deployed.value };

  const started = await stage(DeliveryStage.PipelineRun, () => props.pipeline.run(props.parameters),
    (value) => ({ passed: true, detail: `Execution ARN: ${value.executionArn}` }));
  if (!started.ok) return done();
  report = { ...report, execution: started.value };
  const { executionArn } = started.value;

  const completed = await stage(DeliveryStage.PipelineWait,
    () => props.pipeline.waitForCompletion(executionArn),
    (value) => ({
      passed: value.status === 'Succeeded',
      detail: value.failureReason ? `${value.status}: ${value.failureReason}` : value.status,
    }));
  if (!completed.ok) return done();
  report = { ...report, completion: completed.value };

  const functionDeployed = await stage(DeliveryStage.FunctionDeploy,
    () => props.functionDeployer.deploy(props.functionRequest),
    (value) => ({ passed: true, detail: value.message }));
  if (!functionDeployed.ok) return done();
  report = { ...report, functionDeployment: functionDeployed.value };

  if (props.skipSmokeTests) return done();

  const smokeVerdict = (value: SmokeTestResult<unknown>) => {
    smokeTests.push(value);
    return { passed: value.passed, detail: value.detail };
  };
  const endpointChecked = await stage(DeliveryStage.EndpointSmokeTest,
    () => smokeTestEndpoint(props.endpointInvoker, props.endpointName, undefined, logger),
    smokeVerdict);
  if (!endpointChecked.ok) return done();

  await stage(DeliveryStage.FunctionSmokeTest,
    () => smokeTestFunction(props.functionInvoker, props.functionRequest.spec.functionName, undefined, logger),
    smokeVerdict);
  return done();
}
