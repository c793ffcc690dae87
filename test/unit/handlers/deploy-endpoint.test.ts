import {
  DeploymentStepError,
  InvalidInputError,
  createDeployEndpointHandler,
  settingsFromEnv,
} from '../../../lib/handlers/deploy-endpoint';
import { EndpointState, FailedEndpointPolicy } from '../../../lib/endpoint-lifecycle/types';
import { createOrchestrator } from '../../../lib/platform/orchestrator-factory';
import { FakeClock } from '../../helpers/fake-clock';
import { FakeServingPlatform } from '../../helpers/fake-serving-platform';
import { MemoryArtifactStore } from '../../helpers/memory-artifact-store';

const ARTIFACT_URI = 's3://test-artifacts/training-output/train-job-1/output/model.tar.gz';
const ENV = { TRAINING_OUTPUT_URI: 's3://test-artifacts/training-output' };

const event = {
  endpoint_name: 'seg-endpoint',
  model_name: 'pipeline-model-1',
  artifact_uri: ARTIFACT_URI,
  training_job_id: 'train-job-1',
  instance_type: 'ml.t2.medium',
  instance_count: '1',
};

describe('deploy-endpoint handler', () => {
  let platform: FakeServingPlatform;
  let builds: number;
  let handler: ReturnType<typeof createDeployEndpointHandler>;

  beforeEach(() => {
    platform = new FakeServingPlatform();
    builds = 0;
    const clock = new FakeClock();
    handler = createDeployEndpointHandler({
      env: ENV,
      createOrchestrator: (settings) => {
        builds++;
        return createOrchestrator(settings, {
          platform,
          store: new MemoryArtifactStore().put(ARTIFACT_URI),
          sinks: [],
          clock,
          sleep: clock.sleep,
        });
      },
    });
  });

  test('deploys the pipeline artifact and returns the step outputs', async () => {
    await expect(handler(event)).resolves.toEqual({
      endpoint_name: 'seg-endpoint',
      action: 'CREATE',
      status: 'COMPLETED',
      final_state: 'IN_SERVICE',
      config_id: 'seg-endpoint-20260301100000-0',
    });
    expect(platform.configs.get('seg-endpoint-20260301100000-0')?.modelName).toBe('pipeline-model-1');
  });

  test('builds the orchestrator once per container', async () => {
    await handler(event);
    await handler(event);
    expect(builds).toBe(1);
  });

  test('retries a busy endpoint until it is free', async () => {
    platform.seedEndpoint({ name: 'seg-endpoint', state: EndpointState.CREATING });
    platform.onDescribe = (call) => {
      if (call === 2) {
        platform.seedEndpoint({ name: 'seg-endpoint', state: EndpointState.IN_SERVICE, configId: 'seg-endpoint-old' });
      }
    };

    await expect(handler(event)).resolves.toMatchObject({ action: 'UPDATE', status: 'COMPLETED' });
    expect(platform.calls.filter((call) => call.startsWith('updateEndpoint'))).toHaveLength(1);
  });

  test('fails the step when the endpoint stays busy through every attempt', async () => {
    platform.seedEndpoint({ name: 'seg-endpoint', state: EndpointState.CREATING });

    const error = await handler(event).catch((caught: unknown) => caught);

    expect(platform.describeCount).toBe(3);
    expect(error).toBeInstanceOf(DeploymentStepError);
    expect(error).toMatchObject({
      message: 'Deployment of seg-endpoint ended CONFLICT: '
        + 'Endpoint seg-endpoint is busy: a transition is already in flight (CREATING)',
    });
  });

  test('fails the step when the rollout fails', async () => {
    platform.rollout = 'fail';
    await expect(handler(event)).rejects.toBeInstanceOf(DeploymentStepError);
  });

  test('rejects an event without an artifact', async () => {
    await expect(handler({ endpoint_name: 'seg-endpoint', instance_type: 'ml.t2.medium' }))
      .rejects.toThrow('Invalid deploy event: artifact_uri or training_job_id is required');
    expect(builds).toBe(0);
  });

  test('rejects a missing environment', async () => {
    const unconfigured = createDeployEndpointHandler({ env: {} });
    const error = await unconfigured(event).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(InvalidInputError);
    expect(error).toMatchObject({ message: 'Invalid environment: TRAINING_OUTPUT_URI: Required' });
  });
});

describe('settingsFromEnv', () => {
  test('reads the function environment with defaults', () => {
    expect(settingsFromEnv({
      ...ENV,
      OUTCOME_BUCKET: 'test-artifacts',
      POLL_INTERVAL_SECONDS: '10',
      FAILED_ENDPOINT_POLICY: 'HALT',
      AWS_REGION: 'eu-west-1',
    })).toEqual({
      trainingOutputUri: 's3://test-artifacts/training-output',
      executionRoleArn: undefined,
      inferenceImageUri: undefined,
      outcomeBucket: 'test-artifacts',
      outcomePrefix: 'deployments',
      polling: { intervalMs: 10_000, budgetMs: 540_000 },
      retry: { maxAttempts: 3, baseDelayMs: 5000, maxDelayMs: 20_000 },
      failedEndpointPolicy: FailedEndpointPolicy.HALT,
      region: 'eu-west-1',
    });
  });

  test('reads the retry policy', () => {
    expect(settingsFromEnv({ ...ENV, RETRY_MAX_ATTEMPTS: '5', RETRY_BASE_DELAY_SECONDS: '2' }).retry)
      .toEqual({ maxAttempts: 5, baseDelayMs: 2000, maxDelayMs: 20_000 });
  });

  test('rejects an unknown failed-endpoint policy', () => {
    expect(() => settingsFromEnv({ ...ENV, FAILED_ENDPOINT_POLICY: 'IGNORE' })).toThrow(InvalidInputError);
  });
});
