// lib/endpoint-lifecycle/config-registrar.ts
import { Clock, systemClock } from '../utils/clock';
import { Logger, logger as rootLogger } from '../utils/logger';
import { RegistrationError, describeError } from './errors';
import { ServingPlatform } from './serving-platform';
import { EndpointConfig, InstanceSizing, TrainedArtifact } from './types';
import { VersionTagGenerator, buildVersionedName } from './version-tag';

const INSTANCE_TYPE_PATTERN = /^ml\.[a-z0-9]+\.[a-z0-9]+$/;
const DEFAULT_MAX_ID_ATTEMPTS = 5;

export interface ConfigRegistrarProps {
  readonly platform: ServingPlatform;
  /** Role the serving containers run as; needed when the registrar creates the model itself. */
  readonly executionRoleArn?: string;
  /** Inference image; needed when the registrar creates the model itself. */
  readonly containerImage?: string;
  readonly modelEnvironment?: Record<string, string>;
  readonly tags?: VersionTagGenerator;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly maxIdAttempts?: number;
}

export interface RegistrationRequest {
  readonly artifact: TrainedArtifact;
  readonly endpointName: string;
  readonly sizing: InstanceSizing;
  readonly modelName?: string;
  /** Config registered by an earlier attempt of the same deployment. */
  readonly previous?: EndpointConfig;
}

export class ConfigRegistrar {
  private readonly tags: VersionTagGenerator;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(private readonly props: ConfigRegistrarProps) {
    this.clock = props.clock ?? systemClock;
    this.tags = props.tags ?? new VersionTagGenerator(this.clock);
    this.logger = (props.logger ?? rootLogger).child({ component: 'config-registrar' });
  }

  /**
   * Registers a new endpoint config (and model, unless one is given) under an
   * id no earlier config has used. An existing config with the same id and the
   * same binding is returned as is, and so is `previous` while it still exists
   * and binds the same artifact and sizing.
   */
  public async register(request: RegistrationRequest): Promise<EndpointConfig> {
    validateSizing(request.sizing);
    const { previous } = request;
    if (previous && isSameBinding(previous, request)) {
      const existing = await this.findConfig(previous.configId);
      if (existing && isSameBinding(existing, request)) {
        this.logger.info('reusing endpoint config from an earlier attempt', { configId: existing.configId });
        return existing;
      }
    }

    const maxAttempts = this.props.maxIdAttempts ?? DEFAULT_MAX_ID_ATTEMPTS;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const tag = this.tags.next();
      const configId = buildVersionedName(request.endpointName, tag);

      const existing = await this.findConfig(configId);
      if (existing) {
        if (isSameBinding(existing, request)) {
          this.logger.info('reusing equivalent endpoint config', { configId });
          return existing;
        }
        this.logger.warn('endpoint config id already taken, drawing another', { configId, attempt });
        continue;
      }

      const modelName = request.modelName ?? (await this.createModel(request, tag));
      const config: EndpointConfig = {
        configId,
        artifactUri: request.artifact.artifactUri,
        modelName,
        instanceType: request.sizing.instanceType,
        instanceCount: request.sizing.instanceCount,
        createdAt: this.clock.now(),
      };

      try {
        await this.props.platform.createEndpointConfig(config);
      } catch (error) {
        throw new RegistrationError(`Endpoint config ${configId} was rejected: ${describeError(error)}`, { cause: error });
      }

      this.logger.info('endpoint config registered', {
        configId,
        modelName,
        artifactUri: config.artifactUri,
        instanceType: config.instanceType,
        instanceCount: config.instanceCount,
      });
      return config;
    }

    throw new RegistrationError(`No free endpoint config id for ${request.endpointName} after ${maxAttempts} attempts`);
  }

  private async findConfig(configId: string): Promise<EndpointConfig | undefined> {
    try {
      return await this.props.platform.describeEndpointConfig(configId);
    } catch (error) {
      throw new RegistrationError(`Could not check endpoint config ${configId}: ${describeError(error)}`, { cause: error });
    }
  }

  private async createModel(request: RegistrationRequest, tag: string): Promise<string> {
    const { executionRoleArn, containerImage } = this.props;
    if (!executionRoleArn || !containerImage) {
      throw new RegistrationError(
        'A model name was not supplied and no execution role / container image is configured to create one',
      );
    }

    const modelName = buildVersionedName(`${request.endpointName}-model`, tag);
    try {
      await this.props.platform.createModel({
        modelName,
        artifactUri: request.artifact.artifactUri,
        containerImage,
        executionRoleArn,
        environment: this.props.modelEnvironment,
      });
    } catch (error) {
      throw new RegistrationError(`Model ${modelName} was rejected: ${describeError(error)}`, { cause: error });
    }
    this.logger.info('model registered', { modelName, trainingJobId: request.artifact.trainingJobId });
    return modelName;
  }
}

export function validateSizing(sizing: InstanceSizing): void {
  if (!Number.isInteger(sizing.instanceCount) || sizing.instanceCount < 1) {
    throw new RegistrationError(`Instance count must be a positive integer, got ${sizing.instanceCount}`);
  }
  if (!INSTANCE_TYPE_PATTERN.test(sizing.instanceType)) {
    throw new RegistrationError(`Instance type ${sizing.instanceType} is not a SageMaker ml.* instance type`);
  }
}

function isSameBinding(existing: EndpointConfig, request: RegistrationRequest): boolean {
  return existing.artifactUri === request.artifact.artifactUri
    && existing.instanceType === request.sizing.instanceType
    && existing.instanceCount === request.sizing.instanceCount
    && (request.modelName === undefined || existing.modelName === request.modelName);
}
