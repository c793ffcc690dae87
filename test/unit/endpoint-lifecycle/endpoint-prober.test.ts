import { EndpointStateProber } from '../../../lib/endpoint-lifecycle/endpoint-prober';
import { ProbeError } from '../../../lib/endpoint-lifecycle/errors';
import { EndpointState } from '../../../lib/endpoint-lifecycle/types';
import { FakeServingPlatform } from '../../helpers/fake-serving-platform';

describe('EndpointStateProber', () => {
  let platform: FakeServingPlatform;
  let prober: EndpointStateProber;

  beforeEach(() => {
    platform = new FakeServingPlatform();
    prober = new EndpointStateProber(platform);
  });

  test('reports a missing endpoint as ABSENT', async () => {
    await expect(prober.probe('seg-endpoint')).resolves.toEqual({
      name: 'seg-endpoint',
      currentState: EndpointState.ABSENT,
    });
  });

  test('carries state, config and failure reason', async () => {
    platform.seedEndpoint({
      name: 'seg-endpoint',
      state: EndpointState.FAILED,
      configId: 'seg-endpoint-1',
      failureReason: 'out of capacity',
    });

    await expect(prober.probe('seg-endpoint')).resolves.toEqual({
      name: 'seg-endpoint',
      currentState: EndpointState.FAILED,
      activeConfigId: 'seg-endpoint-1',
      failureReason: 'out of capacity',
    });
  });

  test('never turns a failed read into ABSENT', async () => {
    const cause = new Error('Rate exceeded');
    platform.onDescribe = () => {
      throw cause;
    };

    const error = await prober.probe('seg-endpoint').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProbeError);
    expect(error).toMatchObject({
      message: 'Could not read the state of endpoint seg-endpoint: Rate exceeded',
      retryable: true,
      cause,
    });
  });
});
