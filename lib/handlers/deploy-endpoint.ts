// lib/handlers/deploy-endpoint.ts
import { z } from 'zod';
import { EndpointLifecycleOrchestrator } from '../endpoint-lifecycle/orchestrator';
import { FailedEndpointPolicy, TransitionResult, TransitionStatus } from '../endpoint-lifecycle/types';
import { OrchestratorSettings, createOrchestrator } from '../platform/orchestrator-factory';
import { logger as rootLogger } from '../utils/logger';
import { validate } from '../utils/validation';

/** Arguments of the pipeline's DeployEndpoint Lambda step. */
export const DeployEndpointEventSchema = z.object({
  endpoint_name: z.string().min(1).max(63),
  model_name: z.string().min(1).optional(),
  artifact_uri: z.string().min(1).optional(),
  training_job_id: z.string().min(1).optional(),
  instance_type: z.string().min(1),
  instance_count: z.coerce.number().int().min(1).default(1),
}).refine((event) => event.artifact_uri !== undefined || event.training_job_id !== undefined, {
  message: 'artifact_uri or training_job_id is required',
});

export const DeployEndpointEnvSchema = z.object({
  TRAINING_OUTPUT_URI: z.string().startsWith('s3://'),
  EXECUTION_ROLE_ARN: z.string().min(1).optional(),
  INFERENCE_IMAGE_URI: z.string().min(1).optional(),
  OUTCOME_BUCKET: z.string().min(1).optional(),
  OUTCOME_PREFIX: z.string().default('deployments'),
  POLL_INTERVAL_SECONDS: z.coerce.number().int().min(1).default(30),
  TIMEOUT_SECONDS: z.coerce.number().int().min(1).default(540),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  RETRY_BASE_DELAY_SECONDS: z.coerce.number().int().min(1).default(5),
  RETRY_MAX_DELAY_SECONDS: z.coerce.number().int().min(1).default(20),
  FAILED_ENDPOINT_POLICY: z.nativeEnum(FailedEndpointPolicy).default(FailedEndpointPolicy.RECREATE),
  AWS_REGION: z.string().min(1).optional(),
});

export type DeployEndpointEvent = z.input<typeof DeployEndpointEventSchema>;
export type DeployEndpointEnv = z.infer<typeof DeployEndpointEnvSchema>;

export interface DeployEndpointResponse {
  readonly endpoint_name: string;
  readonly action: string;
  readonly status: string;
  readonly final_state: string;
  readonly config_id: string;
}

/** Fails the pipeline step; the message carries the transition error. */
export class DeploymentStepError extends Error {
  constructor(public readonly result: TransitionResult) {
    super(`Deployment of ${result.endpointName} ended ${result.status}: ${result.error?.message ?? 'no detail'}`);
    this.name = 'DeploymentStepError';
  }
}

export class InvalidInputError extends Error {
  constructor(what: string, public readonly issues: readonly string[]) {
    super(`Invalid ${what}: ${issues.join('; ')}`);
    this.name = 'InvalidInputError';
  }
}

export function settingsFromEnv(env: NodeJS.ProcessEnv): OrchestratorSettings {
  const parsed = validate(DeployEndpointEnvSchema, env);
  if (!parsed.valid) {
    throw new InvalidInputError('environment', parsed.errors);
  }
  const config = parsed.data;
  return {
    trainingOutputUri: config.TRAINING_OUTPUT_URI,
    executionRoleArn: config.EXECUTION_ROLE_ARN,
    inferenceImageUri: config.INFERENCE_IMAGE_URI,
    outcomeBucket: config.OUTCOME_BUCKET,
    outcomePrefix: config.OUTCOME_PREFIX,
    polling: {
      intervalMs: config.POLL_INTERVAL_SECONDS * 1000,
      budgetMs: config.TIMEOUT_SECONDS * 1000,
    },
    retry: {
      maxAttempts: config.RETRY_MAX_ATTEMPTS,
      baseDelayMs: config.RETRY_BASE_DELAY_SECONDS * 1000,
      maxDelayMs: config.RETRY_MAX_DELAY_SECONDS * 1000,
    },
    failedEndpointPolicy: config.FAILED_ENDPOINT_POLICY,
    region: config.AWS_REGION,
  };
}

export function toResponse(result: TransitionResult): DeployEndpointResponse {
  return {
    endpoint_name: result.endpointName,
    action: result.action,
    status: result.status,
    final_state: result.finalState,
    config_id: result.configId ?? '',
  };
}

export interface DeployEndpointHandlerDeps {
  readonly env?: NodeJS.ProcessEnv;
  readonly createOrchestrator?: (settings: OrchestratorSettings) => EndpointLifecycleOrchestrator;
}

export function createDeployEndpointHandler(deps: DeployEndpointHandlerDeps = {}) {
  const build = deps.createOrchestrator ?? ((settings: OrchestratorSettings) => createOrchestrator(settings));
  let orchestrator: EndpointLifecycleOrchestrator | undefined;

  return async (event: unknown): Promise<DeployEndpointResponse> => {
    const parsed = validate(DeployEndpointEventSchema, event);
    if (!parsed.valid) {
      throw new InvalidInputError('deploy event', parsed.errors);
    }
    const request = parsed.data;
    if (!orchestrator) {
      orchestrator = build(settingsFromEnv(deps.env ?? process.env));
    }

    const log = rootLogger.child({ handler: 'deploy-endpoint', endpointName: request.endpoint_name });
    log.info('deploy request received', { request });

    // Only attempts that never reached polling are retried, so the waits stay short.
    const result = await orchestrator.deployWithRetry({
      endpointName: request.endpoint_name,
      modelName: request.model_name,
      artifactUri: request.artifact_uri,
      trainingJobId: request.training_job_id,
      instanceType: request.instance_type,
      instanceCount: request.instance_count,
    });

    if (result.status === TransitionStatus.FAILED || result.status === TransitionStatus.CONFLICT) {
      log.error('deployment did not complete', { status: result.status, error: result.error });
      throw new DeploymentStepError(result);
    }
    return toResponse(result);
  };
}

export const handler = createDeployEndpointHandler();
