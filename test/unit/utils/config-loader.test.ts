import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  ConfigError,
  loadConfig,
  parseAppConfig,
  projectPrefix,
} from '../../../lib/utils/config-loader';
import { FailedEndpointPolicy } from '../../../lib/endpoint-lifecycle/types';

const SHIPPED_CONFIG = path.join(__dirname, '../../../config/app-config.json');

function shippedConfig(): Record<string, unknown> {
  const raw: unknown = JSON.parse(fs.readFileSync(SHIPPED_CONFIG, 'utf-8'));
  if (typeof raw !== 'object' || raw === null) throw new Error('config is not an object');
  return { ...raw };
}

describe('config-loader', () => {
  test('the shipped configuration is valid', () => {
    const config = parseAppConfig(shippedConfig(), SHIPPED_CONFIG);

    expect(config.InfraConfigFile).toBe(SHIPPED_CONFIG);
    expect(config.Stack.BaseInfra.Name).toBe('SegmentModelDev-BaseInfraStack');
    expect(config.Stack.EndpointDeployment.Name).toBe('SegmentModelDev-EndpointDeploymentStack');
    expect(config.Endpoint.FailedEndpointPolicy).toBe(FailedEndpointPolicy.RECREATE);
  });

  test('fills defaults for optional settings', () => {
    const raw = shippedConfig();
    const config = parseAppConfig({
      ...raw,
      Endpoint: { Name: 'seg-endpoint' },
    }, 'inline');

    expect(config.Endpoint).toEqual({
      Name: 'seg-endpoint',
      InstanceType: 'ml.t2.medium',
      InstanceCount: 1,
      PollIntervalSeconds: 30,
      TimeoutSeconds: 1800,
      FailedEndpointPolicy: FailedEndpointPolicy.RECREATE,
    });
  });

  test('lists every problem with its path', () => {
    const raw = shippedConfig();
    const attempt = () => parseAppConfig({
      ...raw,
      Project: { Name: 'SegmentModel', Stage: 'Dev', Account: '1234', Region: 'us-east-1' },
      Endpoint: { Name: 'seg-endpoint', InstanceCount: 0 },
    }, 'inline');

    expect(attempt).toThrow(ConfigError);
    expect(attempt).toThrow(
      'Invalid configuration in inline: Project.Account: must be a 12 digit account id; '
        + 'Endpoint.InstanceCount: Number must be greater than or equal to 1',
    );
  });

  test('builds the project prefix from name and stage', () => {
    expect(projectPrefix({ Name: 'SegmentModel', Stage: 'Prod', Account: '123456789012', Region: 'eu-west-1' }))
      .toBe('SegmentModelProd');
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'segment-config-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    test('reads the file when no bucket is configured', async () => {
      const file = path.join(dir, 'app-config.json');
      fs.writeFileSync(file, JSON.stringify(shippedConfig()));

      const config = await loadConfig(file, { env: {} });

      expect(config.InfraConfigFile).toBe(file);
      expect(config.Pipeline.Name).toBe('segment-model-pipeline-dev');
    });

    test('reports malformed JSON as a configuration error', async () => {
      const file = path.join(dir, 'broken.json');
      fs.writeFileSync(file, '{ "Project": ');

      await expect(loadConfig(file, { env: {} })).rejects.toBeInstanceOf(ConfigError);
    });
  });
});
