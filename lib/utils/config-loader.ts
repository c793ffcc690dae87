import * as fs from 'fs';
import { GetObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { z } from 'zod';
import { FailedEndpointPolicy } from '../endpoint-lifecycle/types';
import { logger } from './logger';
import { validate } from './validation';

const InstanceTypeSchema = z.string().regex(/^ml\.[a-z0-9]+\.[a-z0-9]+$/, 'must be an ml.<family>.<size> instance type');

export const ProjectConfigSchema = z.object({
  Name: z.string().min(1),
  Stage: z.string().min(1),
  Account: z.string().regex(/^\d{12}$/, 'must be a 12 digit account id'),
  Region: z.string().min(1),
});

export const BaseInfraStackConfigSchema = z.object({
  Name: z.string().min(1),
  EnableEncryption: z.boolean().default(false),
  EnableVersioning: z.boolean().default(false),
  TestMode: z.boolean().default(false),
});

export const EndpointDeploymentStackConfigSchema = z.object({
  Name: z.string().min(1),
  InferenceImageUri: z.string().min(1),
  FunctionTimeoutMinutes: z.number().int().min(1).max(15).default(15),
  OutcomePrefix: z.string().default('deployments'),
});

export const PipelineConfigSchema = z.object({
  Name: z.string().min(1),
  NClusters: z.number().int().min(1).default(3),
  NComponents: z.number().int().min(1).default(1),
  DataFile: z.string().min(1).default('customer_segmentation_data.csv'),
  TrainingInstanceType: InstanceTypeSchema.default('ml.m5.large'),
  InferenceInstanceType: InstanceTypeSchema.default('ml.t2.medium'),
  TrainingImageUri: z.string().min(1),
  InferenceImageUri: z.string().min(1),
  /** s3:// URI of the packaged train.py / inference.py sources. */
  SourceArchiveUri: z.string().startsWith('s3://'),
  ArtifactBucket: z.string().min(1),
  ExecutionRoleArn: z.string().startsWith('arn:'),
  DeployFunctionArn: z.string().startsWith('arn:'),
  PollIntervalSeconds: z.number().int().min(1).default(60),
  TimeoutMinutes: z.number().int().min(1).default(120),
});

export const EndpointConfigSchema = z.object({
  Name: z.string().min(1).max(63),
  InstanceType: InstanceTypeSchema.default('ml.t2.medium'),
  InstanceCount: z.number().int().min(1).default(1),
  PollIntervalSeconds: z.number().int().min(1).default(30),
  TimeoutSeconds: z.number().int().min(1).default(1800),
  FailedEndpointPolicy: z.nativeEnum(FailedEndpointPolicy).default(FailedEndpointPolicy.RECREATE),
});

export const GenAiConfigSchema = z.object({
  FunctionName: z.string().min(1),
  RoleArn: z.string().startsWith('arn:'),
  PackagePath: z.string().min(1).default('dist/lambda/genai-function.zip'),
  Handler: z.string().default('index.handler'),
  Runtime: z.string().default('nodejs20.x'),
  TimeoutSeconds: z.number().int().min(1).max(900).default(30),
  MemorySize: z.number().int().min(128).default(256),
  ModelId: z.string().default('anthropic.claude-v2'),
  MaxTokens: z.number().int().min(1).default(400),
  Temperature: z.number().min(0).max(1).default(0.7),
  UpdateIfExists: z.boolean().default(true),
});

export const AppConfigSchema = z.object({
  Project: ProjectConfigSchema,
  Stack: z.object({
    BaseInfra: BaseInfraStackConfigSchema,
    EndpointDeployment: EndpointDeploymentStackConfigSchema,
  }),
  Pipeline: PipelineConfigSchema,
  Endpoint: EndpointConfigSchema,
  GenAi: GenAiConfigSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type BaseInfraStackConfig = z.infer<typeof BaseInfraStackConfigSchema>;
export type EndpointDeploymentStackConfig = z.infer<typeof EndpointDeploymentStackConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type EndpointSettings = z.infer<typeof EndpointConfigSchema>;
export type GenAiConfig = z.infer<typeof GenAiConfigSchema>;

export interface LoadedAppConfig extends AppConfig {
  /** Where the configuration was read from. */
  readonly InfraConfigFile: string;
}

export class ConfigError extends Error {
  constructor(public readonly source: string, public readonly issues: readonly string[]) {
    super(`Invalid configuration in ${source}: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  readonly env?: NodeJS.ProcessEnv;
  readonly s3Client?: S3Client;
}

async function loadConfigFromS3(client: S3Client, bucket: string, key: string): Promise<unknown> {
  const response = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
  const body = await response.Body?.transformToString('utf-8');
  if (body === undefined) {
    throw new ConfigError(`s3://${bucket}/${key}`, ['object has no body']);
  }
  logger.info('loaded configuration from S3', { bucket, key });
  return parseJson(body, `s3://${bucket}/${key}`);
}

function loadConfigFromFile(filePath: string): unknown {
  return parseJson(fs.readFileSync(filePath, 'utf-8'), filePath);
}

function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigError(source, [error instanceof Error ? error.message : String(error)]);
  }
}

export function projectPrefix(project: ProjectConfig): string {
  return `${project.Name}${project.Stage}`;
}

function addProjectPrefix(config: AppConfig): AppConfig {
  const prefix = projectPrefix(config.Project);
  return {
    ...config,
    Stack: {
      BaseInfra: { ...config.Stack.BaseInfra, Name: `${prefix}-${config.Stack.BaseInfra.Name}` },
      EndpointDeployment: {
        ...config.Stack.EndpointDeployment,
        Name: `${prefix}-${config.Stack.EndpointDeployment.Name}`,
      },
    },
  };
}

export function parseAppConfig(raw: unknown, source: string): LoadedAppConfig {
  const result = validate(AppConfigSchema, raw);
  if (!result.valid) {
    throw new ConfigError(source, result.errors);
  }
  return { ...addProjectPrefix(result.data), InfraConfigFile: source };
}

/**
 * Reads the app config from S3 when CONFIG_BUCKET and CONFIG_KEY are set,
 * from `configFilePath` otherwise. Stack names come back project-prefixed.
 */
export async function loadConfig(configFilePath: string, options: LoadConfigOptions = {}): Promise<LoadedAppConfig> {
  const env = options.env ?? process.env;
  if (env.CONFIG_BUCKET && env.CONFIG_KEY) {
    const client = options.s3Client ?? new S3Client({});
    const raw = await loadConfigFromS3(client, env.CONFIG_BUCKET, env.CONFIG_KEY);
    return parseAppConfig(raw, `s3://${env.CONFIG_BUCKET}/${env.CONFIG_KEY}`);
  }
  return parseAppConfig(loadConfigFromFile(configFilePath), configFilePath);
}
