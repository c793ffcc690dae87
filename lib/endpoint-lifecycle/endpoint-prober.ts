// lib/endpoint-lifecycle/endpoint-prober.ts
import { Logger, logger as rootLogger } from '../utils/logger';
import { ProbeError } from './errors';
import { EndpointDescription, ServingPlatform } from './serving-platform';
import { EndpointDescriptor, EndpointState } from './types';

export class EndpointStateProber {
  private readonly logger: Logger;

  constructor(private readonly platform: ServingPlatform, logger: Logger = rootLogger) {
    this.logger = logger.child({ component: 'endpoint-prober' });
  }

  /**
   * A missing endpoint is ABSENT. Any failure to ask is a ProbeError and is
   * never read as ABSENT, which would recreate a live endpoint.
   */
  public async probe(endpointName: string): Promise<EndpointDescriptor> {
    let description: EndpointDescription | undefined;
    try {
      description = await this.platform.describeEndpoint(endpointName);
    } catch (error) {
      throw new ProbeError(endpointName, { cause: error });
    }

    if (!description) {
      this.logger.debug('endpoint not found', { endpointName });
      return { name: endpointName, currentState: EndpointState.ABSENT };
    }

    this.logger.debug('endpoint probed', { endpointName, state: description.state, configId: description.configId });
    return {
      name: endpointName,
      currentState: description.state,
      activeConfigId: description.configId,
      failureReason: description.failureReason,
    };
  }
}
