// lib/platform/sagemaker-serving-platform.ts
import {
  CreateEndpointCommand,
  CreateEndpointConfigCommand,
  CreateModelCommand,
  DeleteEndpointCommand,
  DescribeEndpointCommand,
  DescribeEndpointConfigCommand,
  DescribeEndpointConfigCommandOutput,
  DescribeModelCommand,
  ProductionVariantInstanceType,
  ResourceNotFound,
  SageMakerClient,
  SageMakerServiceException,
  UpdateEndpointCommand,
} from '@aws-sdk/client-sagemaker';
import {
  EndpointDescription,
  ModelDefinition,
  ServingPlatform,
} from '../endpoint-lifecycle/serving-platform';
import { EndpointConfig, EndpointState } from '../endpoint-lifecycle/types';

export const DEFAULT_VARIANT_NAME = 'AllTraffic';

export interface SageMakerServingPlatformProps {
  readonly client?: SageMakerClient;
  readonly region?: string;
  readonly variantName?: string;
  /** Applied to every model, config and endpoint this adapter creates. */
  readonly tags?: Record<string, string>;
}

export class SageMakerServingPlatform implements ServingPlatform {
  private readonly client: SageMakerClient;
  private readonly variantName: string;

  constructor(private readonly props: SageMakerServingPlatformProps = {}) {
    this.client = props.client ?? new SageMakerClient({ region: props.region });
    this.variantName = props.variantName ?? DEFAULT_VARIANT_NAME;
  }

  public async describeEndpoint(endpointName: string): Promise<EndpointDescription | undefined> {
    try {
      const response = await this.client.send(new DescribeEndpointCommand({ EndpointName: endpointName }));
      return {
        name: endpointName,
        state: toEndpointState(response.EndpointStatus),
        configId: response.EndpointConfigName,
        failureReason: response.FailureReason,
      };
    } catch (error) {
      if (isResourceNotFound(error)) return undefined;
      throw error;
    }
  }

  public async describeEndpointConfig(configId: string): Promise<EndpointConfig | undefined> {
    let response: DescribeEndpointConfigCommandOutput;
    try {
      response = await this.client.send(new DescribeEndpointConfigCommand({ EndpointConfigName: configId }));
    } catch (error) {
      if (isResourceNotFound(error)) return undefined;
      throw error;
    }

    const variant = response.ProductionVariants?.[0];
    const modelName = variant?.ModelName ?? '';
    return {
      configId,
      modelName,
      artifactUri: modelName ? await this.findModelArtifact(modelName) : '',
      instanceType: variant?.InstanceType ?? '',
      instanceCount: variant?.InitialInstanceCount ?? 0,
      createdAt: response.CreationTime ?? new Date(0),
    };
  }

  public async createModel(model: ModelDefinition): Promise<void> {
    await this.client.send(new CreateModelCommand({
      ModelName: model.modelName,
      ExecutionRoleArn: model.executionRoleArn,
      PrimaryContainer: {
        Image: model.containerImage,
        ModelDataUrl: model.artifactUri,
        Environment: model.environment,
      },
      Tags: this.tagList(),
    }));
  }

  public async createEndpointConfig(config: EndpointConfig): Promise<void> {
    await this.client.send(new CreateEndpointConfigCommand({
      EndpointConfigName: config.configId,
      ProductionVariants: [{
        VariantName: this.variantName,
        ModelName: config.modelName,
        InstanceType: toInstanceType(config.instanceType),
        InitialInstanceCount: config.instanceCount,
        InitialVariantWeight: 1,
      }],
      Tags: this.tagList(),
    }));
  }

  public async createEndpoint(endpointName: string, configId: string): Promise<void> {
    await this.client.send(new CreateEndpointCommand({
      EndpointName: endpointName,
      EndpointConfigName: configId,
      Tags: this.tagList(),
    }));
  }

  public async updateEndpoint(endpointName: string, configId: string): Promise<void> {
    await this.client.send(new UpdateEndpointCommand({
      EndpointName: endpointName,
      EndpointConfigName: configId,
    }));
  }

  public async deleteEndpoint(endpointName: string): Promise<void> {
    await this.client.send(new DeleteEndpointCommand({ EndpointName: endpointName }));
  }

  private async findModelArtifact(modelName: string): Promise<string> {
    try {
      const model = await this.client.send(new DescribeModelCommand({ ModelName: modelName }));
      return model.PrimaryContainer?.ModelDataUrl ?? model.Containers?.[0]?.ModelDataUrl ?? '';
    } catch (error) {
      if (isResourceNotFound(error)) return '';
      throw error;
    }
  }

  private tagList(): { Key: string; Value: string }[] | undefined {
    const tags = this.props.tags;
    if (!tags) return undefined;
    return Object.entries(tags).map(([Key, Value]) => ({ Key, Value }));
  }
}

/**
 * SageMaker endpoint status → lifecycle state. Statuses in which the endpoint
 * is busy (system updates, rollbacks, deletion) count as UPDATING; the ones it
 * cannot serve from without intervention count as FAILED.
 */
export function toEndpointState(status: string | undefined): Exclude<EndpointState, EndpointState.ABSENT> {
  switch (status) {
    case 'InService':
      return EndpointState.IN_SERVICE;
    case 'Creating':
      return EndpointState.CREATING;
    case 'Updating':
    case 'SystemUpdating':
    case 'RollingBack':
    case 'Deleting':
      return EndpointState.UPDATING;
    case 'Failed':
    case 'OutOfService':
    case 'UpdateRollbackFailed':
      return EndpointState.FAILED;
    default:
      throw new Error(`Unrecognised endpoint status ${status ?? '(none)'}`);
  }
}

/** SageMaker reports missing endpoints, configs and models as a ValidationException. */
export function isResourceNotFound(error: unknown): boolean {
  if (error instanceof ResourceNotFound) return true;
  return error instanceof SageMakerServiceException
    && error.name === 'ValidationException'
    && /could not find/i.test(error.message);
}

function toInstanceType(value: string): ProductionVariantInstanceType {
  if (!isProductionVariantInstanceType(value)) {
    throw new Error(`${value} is not a SageMaker hosting instance type`);
  }
  return value;
}

function isProductionVariantInstanceType(value: string): value is ProductionVariantInstanceType {
  const known: readonly string[] = Object.values(ProductionVariantInstanceType);
  return known.includes(value);
}
