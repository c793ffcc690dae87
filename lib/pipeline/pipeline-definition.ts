// lib/pipeline/pipeline-definition.ts
import { AppConfig, projectPrefix } from '../utils/config-loader';

export const PIPELINE_DEFINITION_VERSION = '2020-12-01';
export const TRAINING_STEP = 'CustomerSegmentationTraining';
export const CREATE_MODEL_STEP = 'CreateCustomerSegmentationModel';
export const REGISTER_MODEL_STEP = 'RegisterCustomerSegmentationModel';
export const DEPLOY_STEP = 'DeployEndpoint';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type PipelineParameterType = 'Integer' | 'String' | 'Float' | 'Boolean';

export interface PipelineParameter {
  readonly Name: string;
  readonly Type: PipelineParameterType;
  readonly DefaultValue: string | number;
}

export interface PipelineStep {
  readonly Name: string;
  readonly Type: 'Training' | 'Model' | 'RegisterModel' | 'Lambda';
  readonly Arguments: JsonObject;
  readonly FunctionArn?: string;
  readonly OutputParameters?: { OutputName: string; OutputType: 'String' | 'Integer' | 'Boolean' | 'Float' }[];
}

export interface PipelineDefinition {
  readonly Version: string;
  readonly Metadata: JsonObject;
  readonly Parameters: PipelineParameter[];
  readonly Steps: PipelineStep[];
}

export interface PipelineSettings {
  readonly region: string;
  readonly modelPackageGroupName: string;
  readonly artifactBucket: string;
  readonly executionRoleArn: string;
  readonly trainingImageUri: string;
  readonly inferenceImageUri: string;
  readonly sourceArchiveUri: string;
  readonly deployFunctionArn: string;
  /** Stable across runs; each run only versions the endpoint config. */
  readonly endpointName: string;
  readonly endpointInstanceCount: number;
  readonly defaults: {
    readonly nClusters: number;
    readonly nComponents: number;
    readonly dataFile: string;
    readonly trainingInstanceType: string;
    readonly inferenceInstanceType: string;
  };
}

/** Values a caller may override when starting an execution. */
export interface PipelineRunParameters {
  readonly clusterCount?: number;
  readonly componentCount?: number;
  readonly dataFile?: string;
  readonly trainingInstanceType?: string;
  readonly inferenceInstanceType?: string;
}

const PARAMETER_NAMES: readonly (readonly [keyof PipelineRunParameters, string])[] = [
  ['clusterCount', 'NClusters'],
  ['componentCount', 'NComponents'],
  ['dataFile', 'DataFile'],
  ['trainingInstanceType', 'TrainingInstanceType'],
  ['inferenceInstanceType', 'InferenceInstanceType'],
];

export function modelPackageGroupName(config: AppConfig): string {
  return `${projectPrefix(config.Project)}-model-group`;
}

export function pipelineSettingsFromConfig(config: AppConfig): PipelineSettings {
  const { Pipeline: pipeline, Endpoint: endpoint } = config;
  return {
    region: config.Project.Region,
    modelPackageGroupName: modelPackageGroupName(config),
    artifactBucket: pipeline.ArtifactBucket,
    executionRoleArn: pipeline.ExecutionRoleArn,
    trainingImageUri: pipeline.TrainingImageUri,
    inferenceImageUri: pipeline.InferenceImageUri,
    sourceArchiveUri: pipeline.SourceArchiveUri,
    deployFunctionArn: pipeline.DeployFunctionArn,
    endpointName: endpoint.Name,
    endpointInstanceCount: endpoint.InstanceCount,
    defaults: {
      nClusters: pipeline.NClusters,
      nComponents: pipeline.NComponents,
      dataFile: pipeline.DataFile,
      trainingInstanceType: pipeline.TrainingInstanceType,
      inferenceInstanceType: pipeline.InferenceInstanceType,
    },
  };
}

export function toPipelineParameters(parameters: PipelineRunParameters): { Name: string; Value: string }[] {
  const entries: { Name: string; Value: string }[] = [];
  for (const [key, name] of PARAMETER_NAMES) {
    const value = parameters[key];
    if (value !== undefined) {
      entries.push({ Name: name, Value: String(value) });
    }
  }
  return entries;
}

const get = (path: string): JsonObject => ({ Get: path });

/** Script-mode hyperparameters are JSON-encoded strings. */
const encoded = (value: JsonValue): JsonObject => ({ 'Std:Join': { On: '', Values: [value] } });
const quoted = (value: string): string => JSON.stringify(value);

const modelArtifacts = get(`Steps.${TRAINING_STEP}.ModelArtifacts.S3ModelArtifacts`);

/**
 * Train → create model → register model → deploy endpoint, with the
 * deployment delegated to the deploy-endpoint Lambda.
 */
export function buildPipelineDefinition(settings: PipelineSettings): PipelineDefinition {
  const { defaults } = settings;
  const parameters: PipelineParameter[] = [
    { Name: 'NClusters', Type: 'Integer', DefaultValue: defaults.nClusters },
    { Name: 'NComponents', Type: 'Integer', DefaultValue: defaults.nComponents },
    { Name: 'DataFile', Type: 'String', DefaultValue: defaults.dataFile },
    { Name: 'TrainingInstanceType', Type: 'String', DefaultValue: defaults.trainingInstanceType },
    { Name: 'InferenceInstanceType', Type: 'String', DefaultValue: defaults.inferenceInstanceType },
  ];

  const training: PipelineStep = {
    Name: TRAINING_STEP,
    Type: 'Training',
    Arguments: {
      AlgorithmSpecification: { TrainingImage: settings.trainingImageUri, TrainingInputMode: 'File' },
      OutputDataConfig: { S3OutputPath: `s3://${settings.artifactBucket}/training-output` },
      StoppingCondition: { MaxRuntimeInSeconds: 86400 },
      ResourceConfig: {
        InstanceCount: 1,
        InstanceType: get('Parameters.TrainingInstanceType'),
        VolumeSizeInGB: 30,
      },
      RoleArn: settings.executionRoleArn,
      InputDataConfig: [{
        ChannelName: 'training',
        ContentType: 'text/csv',
        DataSource: {
          S3DataSource: {
            S3DataType: 'S3Prefix',
            S3Uri: `s3://${settings.artifactBucket}/data/`,
            S3DataDistributionType: 'FullyReplicated',
          },
        },
      }],
      HyperParameters: {
        'n-clusters': encoded(get('Parameters.NClusters')),
        'n-components': encoded(get('Parameters.NComponents')),
        'data-file': encoded(get('Parameters.DataFile')),
        sagemaker_program: quoted('train.py'),
        sagemaker_submit_directory: quoted(settings.sourceArchiveUri),
        sagemaker_container_log_level: '20',
        sagemaker_region: quoted(settings.region),
      },
      MetricDefinitions: [
        { Name: 'silhouette_score', Regex: 'Silhouette Score: ([0-9\\.]+)' },
        { Name: 'calinski_harabasz_score', Regex: 'Calinski-Harabasz Index: ([0-9\\.]+)' },
        { Name: 'davies_bouldin_score', Regex: 'Davies-Bouldin Index: ([0-9\\.]+)' },
      ],
    },
  };

  const createModel: PipelineStep = {
    Name: CREATE_MODEL_STEP,
    Type: 'Model',
    Arguments: {
      ExecutionRoleArn: settings.executionRoleArn,
      PrimaryContainer: {
        Image: settings.inferenceImageUri,
        ModelDataUrl: modelArtifacts,
        Environment: {
          SAGEMAKER_PROGRAM: 'inference.py',
          SAGEMAKER_SUBMIT_DIRECTORY: settings.sourceArchiveUri,
          SAGEMAKER_CONTAINER_LOG_LEVEL: '20',
          SAGEMAKER_REGION: settings.region,
        },
      },
    },
  };

  const registerModel: PipelineStep = {
    Name: REGISTER_MODEL_STEP,
    Type: 'RegisterModel',
    Arguments: {
      ModelPackageGroupName: settings.modelPackageGroupName,
      ModelApprovalStatus: 'PendingManualApproval',
      InferenceSpecification: {
        Containers: [{ Image: settings.inferenceImageUri, ModelDataUrl: modelArtifacts }],
        SupportedContentTypes: ['text/csv', 'application/json'],
        SupportedResponseMIMETypes: ['application/json'],
        SupportedRealtimeInferenceInstanceTypes: [defaults.inferenceInstanceType],
      },
    },
  };

  const deploy: PipelineStep = {
    Name: DEPLOY_STEP,
    Type: 'Lambda',
    FunctionArn: settings.deployFunctionArn,
    Arguments: {
      endpoint_name: settings.endpointName,
      model_name: get(`Steps.${CREATE_MODEL_STEP}.ModelName`),
      artifact_uri: modelArtifacts,
      training_job_id: get(`Steps.${TRAINING_STEP}.TrainingJobName`),
      instance_type: get('Parameters.InferenceInstanceType'),
      instance_count: settings.endpointInstanceCount,
    },
    OutputParameters: [
      { OutputName: 'action', OutputType: 'String' },
      { OutputName: 'status', OutputType: 'String' },
      { OutputName: 'config_id', OutputType: 'String' },
    ],
  };

  return {
    Version: PIPELINE_DEFINITION_VERSION,
    Metadata: {},
    Parameters: parameters,
    Steps: [training, createModel, registerModel, deploy],
  };
}
