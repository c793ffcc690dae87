// lib/platform/orchestrator-factory.ts
import { S3Client } from '@aws-sdk/client-s3';
import {
  ArtifactLocator,
  ArtifactStore,
  ConfigRegistrar,
  EndpointLifecycleOrchestrator,
  EndpointStateProber,
  FailedEndpointPolicy,
  LogOutcomeSink,
  OutcomeRecorder,
  OutcomeSink,
  ServingPlatform,
  TransitionExecutor,
} from '../endpoint-lifecycle';
import { BackoffPolicy } from '../utils/backoff';
import { Clock, Sleeper } from '../utils/clock';
import { Logger, logger as rootLogger } from '../utils/logger';
import { PollingBudget } from '../utils/polling';
import { S3ArtifactStore } from './s3-artifact-store';
import { S3OutcomeSink } from './s3-outcome-sink';
import { SageMakerServingPlatform } from './sagemaker-serving-platform';

export interface OrchestratorSettings {
  readonly trainingOutputUri: string;
  readonly executionRoleArn?: string;
  readonly inferenceImageUri?: string;
  readonly outcomeBucket?: string;
  readonly outcomePrefix: string;
  readonly polling: PollingBudget;
  /** Backoff for `deployWithRetry` when the caller passes none. */
  readonly retry?: BackoffPolicy;
  readonly failedEndpointPolicy: FailedEndpointPolicy;
  readonly region?: string;
  readonly tags?: Record<string, string>;
}

/** Replacements for the AWS-backed collaborators, used by tests and local runs. */
export interface OrchestratorOverrides {
  readonly platform?: ServingPlatform;
  readonly store?: ArtifactStore;
  readonly sinks?: readonly OutcomeSink[];
  readonly clock?: Clock;
  readonly sleep?: Sleeper;
  readonly logger?: Logger;
}

export function createOrchestrator(
  settings: OrchestratorSettings,
  overrides: OrchestratorOverrides = {},
): EndpointLifecycleOrchestrator {
  const logger = overrides.logger ?? rootLogger;
  const platform = overrides.platform
    ?? new SageMakerServingPlatform({ region: settings.region, tags: settings.tags });
  const s3 = overrides.store && overrides.sinks ? undefined : new S3Client({ region: settings.region });
  const store = overrides.store ?? new S3ArtifactStore(s3);
  const sinks = overrides.sinks ?? defaultSinks(settings, logger, s3);

  const prober = new EndpointStateProber(platform, logger);
  return new EndpointLifecycleOrchestrator({
    locator: new ArtifactLocator({ store, trainingOutputUri: settings.trainingOutputUri, clock: overrides.clock }),
    prober,
    registrar: new ConfigRegistrar({
      platform,
      executionRoleArn: settings.executionRoleArn,
      containerImage: settings.inferenceImageUri,
      clock: overrides.clock,
      logger,
    }),
    executor: new TransitionExecutor({
      platform,
      prober,
      polling: settings.polling,
      clock: overrides.clock,
      sleep: overrides.sleep,
      logger,
    }),
    recorder: new OutcomeRecorder(sinks, logger, overrides.clock),
    failedEndpointPolicy: settings.failedEndpointPolicy,
    retryPolicy: settings.retry,
    sleep: overrides.sleep,
    logger,
  });
}

function defaultSinks(settings: OrchestratorSettings, logger: Logger, client?: S3Client): OutcomeSink[] {
  const sinks: OutcomeSink[] = [new LogOutcomeSink(logger)];
  if (settings.outcomeBucket) {
    sinks.push(new S3OutcomeSink({ bucket: settings.outcomeBucket, prefix: settings.outcomePrefix, client }));
  }
  return sinks;
}
