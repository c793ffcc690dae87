// lib/endpoint-lifecycle/serving-platform.ts
import { EndpointConfig, EndpointState } from './types';

/**
 * What the platform reports for an endpoint that exists.
 */
export interface EndpointDescription {
  readonly name: string;
  readonly state: Exclude<EndpointState, EndpointState.ABSENT>;
  readonly configId?: string;
  readonly failureReason?: string;
}

export interface ModelDefinition {
  readonly modelName: string;
  readonly artifactUri: string;
  readonly containerImage: string;
  readonly executionRoleArn: string;
  readonly environment?: Record<string, string>;
}

/**
 * Serving platform operations the lifecycle core depends on. Queries return
 * `undefined` for resources that do not exist; every other failure is thrown.
 * Create and update calls only start the work; callers poll describeEndpoint.
 */
export interface ServingPlatform {
  describeEndpoint(endpointName: string): Promise<EndpointDescription | undefined>;
  describeEndpointConfig(configId: string): Promise<EndpointConfig | undefined>;
  createModel(model: ModelDefinition): Promise<void>;
  createEndpointConfig(config: EndpointConfig): Promise<void>;
  createEndpoint(endpointName: string, configId: string): Promise<void>;
  updateEndpoint(endpointName: string, configId: string): Promise<void>;
  deleteEndpoint(endpointName: string): Promise<void>;
}
