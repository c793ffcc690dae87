// lib/endpoint-lifecycle/outcome-recorder.ts
import { Clock, systemClock } from '../utils/clock';
import { Logger, logger as rootLogger } from '../utils/logger';
import { RecordingFailure } from './errors';
import {
  EndpointState,
  LifecycleAction,
  TrainedArtifact,
  TransitionErrorInfo,
  TransitionResult,
  TransitionStatus,
} from './types';

/**
 * What downstream consumers (smoke tests, model registry) read about a deployment.
 */
export interface OutcomeRecord {
  readonly endpointName: string;
  readonly endpointState: EndpointState;
  readonly configId?: string;
  readonly action: LifecycleAction;
  readonly status: TransitionStatus;
  readonly artifactUri?: string;
  readonly trainingJobId?: string;
  readonly recordedAt: string;
  readonly error?: TransitionErrorInfo;
}

export interface OutcomeSink {
  readonly name: string;
  write(record: OutcomeRecord): Promise<void>;
}

export interface RecordingReport {
  readonly record: OutcomeRecord;
  readonly failures: readonly RecordingFailure[];
}

export class LogOutcomeSink implements OutcomeSink {
  public readonly name = 'log';

  constructor(private readonly logger: Logger = rootLogger) {}

  public async write(record: OutcomeRecord): Promise<void> {
    this.logger.info('deployment outcome', { outcome: record });
  }
}

/**
 * Best-effort telemetry. A sink that fails is reported and logged; the
 * transition it describes has already happened and stays.
 */
export class OutcomeRecorder {
  private readonly logger: Logger;

  constructor(
    private readonly sinks: readonly OutcomeSink[],
    logger: Logger = rootLogger,
    private readonly clock: Clock = systemClock,
  ) {
    this.logger = logger.child({ component: 'outcome-recorder' });
  }

  public async record(result: TransitionResult, artifact?: TrainedArtifact): Promise<RecordingReport> {
    const record: OutcomeRecord = {
      endpointName: result.endpointName,
      endpointState: result.finalState,
      configId: result.configId,
      action: result.action,
      status: result.status,
      artifactUri: artifact?.artifactUri,
      trainingJobId: artifact?.trainingJobId,
      recordedAt: this.clock.now().toISOString(),
      error: result.error,
    };

    const failures: RecordingFailure[] = [];
    for (const sink of this.sinks) {
      try {
        await sink.write(record);
      } catch (error) {
        const failure = new RecordingFailure(sink.name, { cause: error });
        this.logger.error('could not record deployment outcome', {
          sink: sink.name,
          endpointName: record.endpointName,
          error: failure.message,
        });
        failures.push(failure);
      }
    }
    return { record, failures };
  }
}
