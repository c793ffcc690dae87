// lib/endpoint-lifecycle/orchestrator.ts
import { BackoffPolicy, DEFAULT_BACKOFF_POLICY, computeBackoffDelay } from '../utils/backoff';
import { Sleeper, sleep } from '../utils/clock';
import { Logger, logger as rootLogger } from '../utils/logger';
import { ArtifactLocator } from './artifact-locator';
import { ConfigRegistrar } from './config-registrar';
import { EndpointStateProber } from './endpoint-prober';
import { ProbeError, TransitionConflictError } from './errors';
import { LifecycleDecision, decideLifecycleAction } from './lifecycle-decision';
import { OutcomeRecorder } from './outcome-recorder';
import { TransitionExecutor } from './transition-executor';
import {
  DeploymentRequest,
  EndpointConfig,
  EndpointDescriptor,
  FailedEndpointPolicy,
  LifecycleAction,
  TrainedArtifact,
  TransitionResult,
  TransitionStatus,
} from './types';

export interface EndpointLifecycleOrchestratorProps {
  readonly locator: ArtifactLocator;
  readonly prober: EndpointStateProber;
  readonly registrar: ConfigRegistrar;
  readonly executor: TransitionExecutor;
  readonly recorder: OutcomeRecorder;
  readonly failedEndpointPolicy?: FailedEndpointPolicy;
  readonly retryPolicy?: BackoffPolicy;
  readonly logger?: Logger;
  /** Used between retries only; transition polling has its own sleeper. */
  readonly sleep?: Sleeper;
  readonly random?: () => number;
}

/** Carried from one attempt of a deployment to the next. */
interface AttemptMemory {
  registered?: EndpointConfig;
}

/**
 * Locate → probe → decide → register → transition → record, for one endpoint.
 *
 * Errors raised before a transition starts (missing artifact, unreadable
 * endpoint state, rejected registration) abort the run and are thrown. Anything
 * that happens once a transition is underway comes back as a TransitionResult.
 */
export class EndpointLifecycleOrchestrator {
  private readonly failedEndpointPolicy: FailedEndpointPolicy;
  private readonly retryPolicy: BackoffPolicy;
  private readonly logger: Logger;
  private readonly sleep: Sleeper;
  private readonly random: () => number;

  constructor(private readonly props: EndpointLifecycleOrchestratorProps) {
    this.failedEndpointPolicy = props.failedEndpointPolicy ?? FailedEndpointPolicy.RECREATE;
    this.retryPolicy = props.retryPolicy ?? DEFAULT_BACKOFF_POLICY;
    this.logger = (props.logger ?? rootLogger).child({ component: 'orchestrator' });
    this.sleep = props.sleep ?? sleep;
    this.random = props.random ?? Math.random;
  }

  public async deploy(request: DeploymentRequest): Promise<TransitionResult> {
    return this.attempt(request, {});
  }

  private async attempt(request: DeploymentRequest, memory: AttemptMemory): Promise<TransitionResult> {
    const { endpointName } = request;
    const artifact = await this.props.locator.locate(request);
    const endpoint = await this.props.prober.probe(endpointName);
    const decision = decideLifecycleAction(endpoint, this.failedEndpointPolicy);
    this.logger.info('lifecycle decision', {
      endpointName,
      state: endpoint.currentState,
      action: decision.action,
      reason: decision.reason,
      artifactUri: artifact.artifactUri,
    });

    const { action } = decision;
    if (action === LifecycleAction.CONFLICT) {
      return this.record(this.conflictResult(endpoint, decision), artifact);
    }
    if (action === LifecycleAction.NO_OP) {
      return this.record(skippedResult(endpoint), artifact);
    }

    const config = await this.props.registrar.register({
      artifact,
      endpointName,
      modelName: request.modelName,
      sizing: { instanceType: request.instanceType, instanceCount: request.instanceCount },
      previous: memory.registered,
    });
    memory.registered = config;

    const result = await this.props.executor.execute({
      endpointName,
      targetConfigId: config.configId,
      action,
      expectedState: endpoint.currentState,
    });
    return this.record(result, artifact);
  }

  /**
   * Runs deploy again after a CONFLICT or a ProbeError, waiting an exponentially
   * growing, jittered delay in between. Any other error is thrown at once; the
   * last result (or error) is returned once attempts run out. A config that an
   * attempt registered is reused by the next one.
   */
  public async deployWithRetry(
    request: DeploymentRequest,
    policy: BackoffPolicy = this.retryPolicy,
  ): Promise<TransitionResult> {
    const maxAttempts = Math.max(1, policy.maxAttempts);
    const memory: AttemptMemory = {};
    let attempt = 1;

    for (;;) {
      let reason: string;
      try {
        const result = await this.attempt(request, memory);
        if (result.status !== TransitionStatus.CONFLICT || attempt >= maxAttempts) {
          return result;
        }
        reason = result.error?.message ?? 'conflict';
      } catch (error) {
        if (!(error instanceof ProbeError) || attempt >= maxAttempts) {
          throw error;
        }
        reason = error.message;
      }

      const delayMs = computeBackoffDelay(attempt, policy, this.random);
      this.logger.warn('deployment will be retried', {
        endpointName: request.endpointName,
        attempt,
        maxAttempts,
        delayMs,
        reason,
      });
      await this.sleep(delayMs);
      attempt++;
    }
  }

  private async record(result: TransitionResult, artifact: TrainedArtifact): Promise<TransitionResult> {
    const report = await this.props.recorder.record(result, artifact);
    if (report.failures.length === 0) return result;

    this.logger.warn('deployment outcome was not fully recorded', {
      endpointName: result.endpointName,
      status: result.status,
      recordingFailures: report.failures.length,
    });
    return { ...result, recordingFailures: report.failures.map((failure) => failure.message) };
  }

  private conflictResult(endpoint: EndpointDescriptor, decision: LifecycleDecision): TransitionResult {
    const error = new TransitionConflictError(endpoint.name, decision.reason);
    return {
      endpointName: endpoint.name,
      action: LifecycleAction.CONFLICT,
      status: TransitionStatus.CONFLICT,
      finalState: endpoint.currentState,
      configId: endpoint.activeConfigId,
      observedStates: [endpoint.currentState],
      error: error.toErrorInfo(),
    };
  }
}

function skippedResult(endpoint: EndpointDescriptor): TransitionResult {
  return {
    endpointName: endpoint.name,
    action: LifecycleAction.NO_OP,
    status: TransitionStatus.SKIPPED,
    finalState: endpoint.currentState,
    configId: endpoint.activeConfigId,
    observedStates: [endpoint.currentState],
  };
}
