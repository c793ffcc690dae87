// lib/endpoint-lifecycle/transition-executor.ts
import { Clock, Sleeper, sleep, systemClock } from '../utils/clock';
import { Logger, logger as rootLogger } from '../utils/logger';
import { PollingBudget, PollingOptions, pollUntil } from '../utils/polling';
import { EndpointStateProber } from './endpoint-prober';
import {
  EndpointLifecycleError,
  ProbeError,
  TransitionConflictError,
  TransitionFailedError,
  TransitionTimeoutError,
  describeError,
} from './errors';
import { ServingPlatform } from './serving-platform';
import {
  EndpointDescriptor,
  EndpointState,
  LifecycleAction,
  TransitionRequest,
  TransitionResult,
  TransitionStatus,
} from './types';

export const DEFAULT_TRANSITION_POLLING: PollingBudget = {
  intervalMs: 30_000,
  budgetMs: 30 * 60_000,
};

export interface TransitionExecutorProps {
  readonly platform: ServingPlatform;
  readonly prober?: EndpointStateProber;
  readonly polling?: PollingBudget;
  readonly clock?: Clock;
  readonly sleep?: Sleeper;
  readonly logger?: Logger;
}

/**
 * Issues create/update calls and waits for the endpoint to settle.
 *
 * One transition per endpoint name at a time inside this process; a second
 * request is answered with CONFLICT straight away. Across processes the live
 * state is re-read right before acting and must still match the state the
 * decision was made on.
 */
export class TransitionExecutor {
  private readonly inFlight = new Map<string, EndpointState>();
  private readonly prober: EndpointStateProber;
  private readonly polling: PollingBudget;
  private readonly clock: Clock;
  private readonly sleep: Sleeper;
  private readonly logger: Logger;

  constructor(private readonly props: TransitionExecutorProps) {
    this.logger = (props.logger ?? rootLogger).child({ component: 'transition-executor' });
    this.prober = props.prober ?? new EndpointStateProber(props.platform, this.logger);
    this.polling = props.polling ?? DEFAULT_TRANSITION_POLLING;
    this.clock = props.clock ?? systemClock;
    this.sleep = props.sleep ?? sleep;
  }

  public isInFlight(endpointName: string): boolean {
    return this.inFlight.has(endpointName);
  }

  public async execute(request: TransitionRequest): Promise<TransitionResult> {
    const busyState = this.inFlight.get(request.endpointName);
    if (busyState !== undefined) {
      return this.conflict(request, busyState, 'another transition for this endpoint is in progress', []);
    }

    // Claimed before the first await so a concurrent call cannot slip in.
    this.inFlight.set(request.endpointName, transitionalState(request.action));
    try {
      return await this.run(request);
    } finally {
      this.inFlight.delete(request.endpointName);
    }
  }

  private async run(request: TransitionRequest): Promise<TransitionResult> {
    const { endpointName, targetConfigId, action } = request;
    const observed: EndpointState[] = [];
    // Deletion of a failed endpoint and the rollout share one budget.
    const deadline = this.clock.now().getTime() + this.polling.budgetMs;

    const live = await this.prober.probe(endpointName);
    observed.push(live.currentState);
    if (live.currentState !== request.expectedState) {
      return this.conflict(
        request,
        live.currentState,
        `expected ${request.expectedState} but the endpoint is ${live.currentState}`,
        observed,
      );
    }

    if (action === LifecycleAction.CREATE && live.currentState === EndpointState.FAILED) {
      const interrupted = await this.removeFailedEndpoint(request, live, observed, deadline);
      if (interrupted) return interrupted;
    }

    this.logger.info('starting endpoint transition', { endpointName, action, targetConfigId });
    try {
      if (action === LifecycleAction.CREATE) {
        await this.props.platform.createEndpoint(endpointName, targetConfigId);
      } else {
        await this.props.platform.updateEndpoint(endpointName, targetConfigId);
      }
    } catch (error) {
      return this.finish(request, TransitionStatus.FAILED, last(observed, live.currentState), observed,
        new TransitionFailedError(endpointName, `${action} call was rejected: ${describeError(error)}`, { cause: error }));
    }

    const outcome = await pollUntil(async () => {
      const current = await this.observe(endpointName, observed);
      return current && this.isSettled(current, targetConfigId) ? current : undefined;
    }, this.pollingUntil(deadline));

    if (outcome.status === 'timeout') {
      const lastState = last(observed, transitionalState(action));
      this.logger.warn('endpoint transition timed out; the next run will reconcile', {
        endpointName, targetConfigId, lastState, attempts: outcome.attempts,
      });
      return this.finish(request, TransitionStatus.TIMEOUT, lastState, observed,
        new TransitionTimeoutError(endpointName, this.polling.budgetMs, lastState));
    }

    const settled = outcome.value;
    if (settled.currentState === EndpointState.IN_SERVICE && servesConfig(settled, targetConfigId)) {
      this.logger.info('endpoint transition completed', { endpointName, targetConfigId, elapsedMs: outcome.elapsedMs });
      return this.finish(request, TransitionStatus.COMPLETED, EndpointState.IN_SERVICE, observed);
    }

    const reason = settled.failureReason ?? `platform reported ${settled.currentState}`;
    this.logger.error('endpoint transition failed', { endpointName, targetConfigId, reason });
    return this.finish(request, TransitionStatus.FAILED, settled.currentState, observed,
      new TransitionFailedError(endpointName, reason));
  }

  /**
   * Deletes a FAILED endpoint and waits until it is gone. Returns a terminal
   * result when that did not work out, nothing when creation can proceed.
   */
  private async removeFailedEndpoint(
    request: TransitionRequest,
    live: EndpointDescriptor,
    observed: EndpointState[],
    deadline: number,
  ): Promise<TransitionResult | undefined> {
    const { endpointName } = request;
    this.logger.warn('deleting failed endpoint before recreating it', {
      endpointName,
      retainedConfigId: live.activeConfigId,
      failureReason: live.failureReason,
    });

    try {
      await this.props.platform.deleteEndpoint(endpointName);
    } catch (error) {
      return this.finish(request, TransitionStatus.FAILED, EndpointState.FAILED, observed,
        new TransitionFailedError(endpointName, `could not delete the failed endpoint: ${describeError(error)}`, { cause: error }));
    }

    const outcome = await pollUntil(async () => {
      const current = await this.observe(endpointName, observed);
      return current?.currentState === EndpointState.ABSENT ? current : undefined;
    }, this.pollingUntil(deadline));

    if (outcome.status === 'timeout') {
      const lastState = last(observed, EndpointState.FAILED);
      return this.finish(request, TransitionStatus.TIMEOUT, lastState, observed,
        new TransitionTimeoutError(endpointName, this.polling.budgetMs, lastState));
    }
    return undefined;
  }

  private pollingUntil(deadline: number): PollingOptions {
    return {
      intervalMs: this.polling.intervalMs,
      budgetMs: Math.max(0, deadline - this.clock.now().getTime()),
      clock: this.clock,
      sleep: this.sleep,
    };
  }

  /** A failed read during polling is logged and retried on the next tick. */
  private async observe(endpointName: string, observed: EndpointState[]): Promise<EndpointDescriptor | undefined> {
    try {
      const current = await this.prober.probe(endpointName);
      observed.push(current.currentState);
      this.inFlight.set(endpointName, current.currentState);
      return current;
    } catch (error) {
      if (!(error instanceof ProbeError)) throw error;
      this.logger.warn('probe failed while polling', { endpointName, error: error.message });
      return undefined;
    }
  }

  /**
   * FAILED always settles. IN_SERVICE settles once the target config is live, or
   * when the platform rolled back to the previous config and said why.
   */
  private isSettled(endpoint: EndpointDescriptor, targetConfigId: string): boolean {
    if (endpoint.currentState === EndpointState.FAILED) return true;
    if (endpoint.currentState !== EndpointState.IN_SERVICE) return false;
    return servesConfig(endpoint, targetConfigId) || endpoint.failureReason !== undefined;
  }

  private conflict(
    request: TransitionRequest,
    state: EndpointState,
    reason: string,
    observed: EndpointState[],
  ): TransitionResult {
    const error = new TransitionConflictError(request.endpointName, reason);
    this.logger.warn('endpoint transition rejected', { endpointName: request.endpointName, reason });
    return {
      endpointName: request.endpointName,
      action: LifecycleAction.CONFLICT,
      status: TransitionStatus.CONFLICT,
      finalState: state,
      configId: request.targetConfigId,
      observedStates: observed,
      error: error.toErrorInfo(),
    };
  }

  private finish(
    request: TransitionRequest,
    status: TransitionStatus,
    finalState: EndpointState,
    observed: EndpointState[],
    error?: EndpointLifecycleError,
  ): TransitionResult {
    return {
      endpointName: request.endpointName,
      action: request.action,
      status,
      finalState,
      configId: request.targetConfigId,
      observedStates: observed,
      error: error?.toErrorInfo(),
    };
  }
}

function transitionalState(action: LifecycleAction): EndpointState {
  return action === LifecycleAction.CREATE ? EndpointState.CREATING : EndpointState.UPDATING;
}

/** Platforms that do not report the active config are taken at their word. */
function servesConfig(endpoint: EndpointDescriptor, configId: string): boolean {
  return endpoint.activeConfigId === undefined || endpoint.activeConfigId === configId;
}

function last(states: EndpointState[], fallback: EndpointState): EndpointState {
  return states.length > 0 ? states[states.length - 1] : fallback;
}
