import { HELP } from '../../../lib/cli/args';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, runCli } from '../../../lib/cli/commands';
import { EndpointState } from '../../../lib/endpoint-lifecycle/types';
import { ConfigError, LoadedAppConfig } from '../../../lib/utils/config-loader';
import { testAppConfig } from '../../helpers/app-config';
import { captureLogs, CapturedLogs } from '../../helpers/capture-logs';
import { CapturedIo, FakeCliServices, captureIo } from '../../helpers/fake-cli-services';
import { functionReply } from '../../helpers/fake-invokers';
import { pipelineArn } from '../../helpers/fake-pipeline-registry';

const PIPELINE_ARN = pipelineArn('segment-model-pipeline-dev');
const ARTIFACT_URI = 's3://segmentmodeldev-model-artifacts-bucket/training-output/job-1/output/model.tar.gz';

describe('runCli', () => {
  let config: LoadedAppConfig;
  let services: FakeCliServices;
  let io: CapturedIo;
  let logs: CapturedLogs;
  let loadedPaths: string[];

  const run = (...argv: string[]) => runCli(argv, {
    io,
    loadConfig: async (path) => {
      loadedPaths.push(path);
      return config;
    },
    services: () => services,
  });

  beforeEach(() => {
    config = testAppConfig();
    services = new FakeCliServices(config);
    io = captureIo();
    logs = captureLogs();
    loadedPaths = [];
  });

  afterEach(() => logs.restore());

  test('prints help without loading the config', async () => {
    await expect(run('--help')).resolves.toBe(EXIT_OK);
    expect(io.stdout).toEqual([HELP]);
    expect(loadedPaths).toEqual([]);
  });

  test('reports a usage error with the help text', async () => {
    await expect(run('launch')).resolves.toBe(EXIT_USAGE);
    expect(io.stderr).toEqual(['Error: Unknown command "launch"', HELP]);
  });

  test('reports a config that fails to load', async () => {
    const exitCode = await runCli(['deliver'], {
      io,
      loadConfig: async (path) => {
        throw new ConfigError(path, ['Project: Required']);
      },
    });

    expect(exitCode).toBe(EXIT_FAILURE);
    expect(io.stderr).toEqual(['Error: Invalid configuration in config/app-config.json: Project: Required']);
    expect(logs.messages()).toEqual(['command failed']);
  });

  describe('pipeline', () => {
    test('deploys the pipeline from the given config file', async () => {
      await expect(run('pipeline', '--action', 'deploy', '--config', 'test.json')).resolves.toBe(EXIT_OK);
      expect(io.stdout).toEqual([`Pipeline created: ${PIPELINE_ARN}`]);
      expect(loadedPaths).toEqual(['test.json']);
    });

    test('starts an execution with parameter overrides', async () => {
      await expect(run('pipeline', '--action', 'run', '--n-clusters', '5')).resolves.toBe(EXIT_OK);
      expect(io.stdout).toEqual([`Execution ARN: ${PIPELINE_ARN}/execution/run1`]);
      expect(services.registry.started[0].parameters).toEqual([{ Name: 'NClusters', Value: '5' }]);
    });

    test('prints the execution as JSON', async () => {
      await run('pipeline', '--action', 'run', '--json');
      expect(JSON.parse(io.stdout.join('\n'))).toEqual({
        pipelineName: 'segment-model-pipeline-dev',
        executionArn: `${PIPELINE_ARN}/execution/run1`,
      });
    });

    test('waits for the execution to succeed', async () => {
      await expect(run('pipeline', '--action', 'run', '--wait')).resolves.toBe(EXIT_OK);
      expect(io.stdout).toEqual([`Execution ARN: ${PIPELINE_ARN}/execution/run1`, 'Execution status: Succeeded']);
    });

    test('exits non-zero when the execution fails', async () => {
      services.registry.statuses = [{ status: 'Failed', failureReason: 'AlgorithmError' }];
      await expect(run('pipeline', '--action', 'run', '--wait')).resolves.toBe(EXIT_FAILURE);
      expect(io.stdout[1]).toBe('Execution status: Failed (AlgorithmError)');
    });
  });

  describe('endpoint deploy', () => {
    test('creates the configured endpoint on the training job output', async () => {
      services.store.put(ARTIFACT_URI);

      await expect(run('endpoint', 'deploy', '--training-job-id', 'job-1')).resolves.toBe(EXIT_OK);

      expect(io.stdout).toEqual([
        'Endpoint seg-endpoint: CREATE COMPLETED (state IN_SERVICE, config seg-endpoint-20260301100000-0)',
      ]);
      expect(services.platform.configs.get('seg-endpoint-20260301100000-0')).toMatchObject({
        artifactUri: ARTIFACT_URI,
        instanceType: 'ml.t2.medium',
        instanceCount: 1,
      });
    });

    test('exits non-zero when the artifact is missing', async () => {
      await expect(run('endpoint', 'deploy', '--training-job-id', 'job-1')).resolves.toBe(EXIT_FAILURE);
      expect(io.stderr).toEqual([`Error: Model artifact ${ARTIFACT_URI} is not usable: no such object`]);
    });

    test('exits non-zero when the endpoint stays busy', async () => {
      services.store.put(ARTIFACT_URI);
      services.platform.seedEndpoint({ name: 'seg-endpoint', state: EndpointState.UPDATING });

      await expect(run('endpoint', 'deploy', '--training-job-id', 'job-1')).resolves.toBe(EXIT_FAILURE);
      expect(io.stdout[0]).toMatch(/^Endpoint seg-endpoint: CONFLICT CONFLICT \(state UPDATING/);
      expect(services.platform.calls).toEqual([]);
    });
  });

  describe('genai deploy', () => {
    test('creates the function with the configured model settings', async () => {
      await expect(run('genai', 'deploy')).resolves.toBe(EXIT_OK);

      expect(io.stdout).toEqual(['Created SegmentModelDev-genai-function']);
      expect(services.gateway.functions.get('SegmentModelDev-genai-function')?.spec.environment).toEqual({
        MODEL_ID: 'anthropic.claude-v2',
        MAX_TOKENS: '400',
        TEMPERATURE: '0.7',
      });
    });

    test('updates an existing function when the config allows it', async () => {
      await run('genai', 'deploy');
      await run('genai', 'deploy');
      expect(io.stdout[1]).toBe('Updated SegmentModelDev-genai-function');
    });
  });

  describe('smoke', () => {
    test('passes against a healthy endpoint', async () => {
      await expect(run('smoke', 'endpoint')).resolves.toBe(EXIT_OK);
      expect(io.stdout).toEqual(['PASS seg-endpoint: 1 prediction(s) returned']);
    });

    test('fails against a function that errors', async () => {
      services.genAiReply = functionReply(500, { error: 'ThrottlingException' });
      await expect(run('smoke', 'function')).resolves.toBe(EXIT_FAILURE);
      expect(io.stdout).toEqual(['FAIL SegmentModelDev-genai-function: status 500: {"error":"ThrottlingException"}']);
    });
  });

  describe('deliver', () => {
    test('prints one line per stage', async () => {
      await expect(run('deliver', '--skip-smoke-tests')).resolves.toBe(EXIT_OK);
      expect(io.stdout).toEqual([
        `OK   pipeline-deploy: CREATED ${PIPELINE_ARN}`,
        `OK   pipeline-run: Execution ARN: ${PIPELINE_ARN}/execution/run1`,
        'OK   pipeline-wait: Succeeded',
        'OK   function-deploy: Created SegmentModelDev-genai-function',
      ]);
    });

    test('exits non-zero when a smoke test fails', async () => {
      services.endpointReply = new Error('Endpoint seg-endpoint not found');
      await expect(run('deliver')).resolves.toBe(EXIT_FAILURE);
      expect(io.stdout[4]).toBe('FAIL endpoint-smoke-test: invocation failed: Endpoint seg-endpoint not found');
    });
  });
});
