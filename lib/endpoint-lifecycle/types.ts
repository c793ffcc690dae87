// lib/endpoint-lifecycle/types.ts

export enum EndpointState {
  ABSENT = 'ABSENT',
  CREATING = 'CREATING',
  IN_SERVICE = 'IN_SERVICE',
  UPDATING = 'UPDATING',
  FAILED = 'FAILED',
}

export enum LifecycleAction {
  CREATE = 'CREATE',
  UPDATE = 'UPDATE',
  NO_OP = 'NO_OP',
  CONFLICT = 'CONFLICT',
}

/**
 * What to do with an endpoint the platform reports as FAILED.
 */
export enum FailedEndpointPolicy {
  /** Delete the failed endpoint and create it again on the new config. */
  RECREATE = 'RECREATE',
  /** Point the failed endpoint at the new config with an update. */
  RESUME = 'RESUME',
  /** Leave it alone and report; an operator decides. */
  HALT = 'HALT',
}

export enum TransitionStatus {
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
  CONFLICT = 'CONFLICT',
  TIMEOUT = 'TIMEOUT',
  SKIPPED = 'SKIPPED',
}

export enum LifecycleErrorCode {
  ARTIFACT_NOT_FOUND = 'ARTIFACT_NOT_FOUND',
  PROBE_FAILED = 'PROBE_FAILED',
  REGISTRATION_FAILED = 'REGISTRATION_FAILED',
  CONFLICT = 'CONFLICT',
  TIMEOUT = 'TIMEOUT',
  TRANSITION_FAILED = 'TRANSITION_FAILED',
  RECORDING_FAILED = 'RECORDING_FAILED',
}

/**
 * Output of one successful training run.
 */
export interface TrainedArtifact {
  readonly artifactUri: string;
  readonly trainingJobId: string;
  readonly createdAt: Date;
}

/**
 * Live view of a serving endpoint, read fresh before every decision.
 */
export interface EndpointDescriptor {
  readonly name: string;
  readonly currentState: EndpointState;
  readonly activeConfigId?: string;
  readonly failureReason?: string;
}

export interface InstanceSizing {
  readonly instanceType: string;
  readonly instanceCount: number;
}

/**
 * Immutable, versioned binding of an endpoint to an artifact and hardware.
 */
export interface EndpointConfig extends InstanceSizing {
  readonly configId: string;
  readonly artifactUri: string;
  readonly modelName: string;
  readonly createdAt: Date;
}

export interface TransitionRequest {
  readonly endpointName: string;
  readonly targetConfigId: string;
  readonly action: LifecycleAction.CREATE | LifecycleAction.UPDATE;
  /** State the decision was based on; a different live state means someone else moved first. */
  readonly expectedState: EndpointState;
}

export interface TransitionErrorInfo {
  readonly code: LifecycleErrorCode;
  readonly message: string;
  readonly retryable: boolean;
}

export interface TransitionResult {
  readonly endpointName: string;
  readonly action: LifecycleAction;
  readonly status: TransitionStatus;
  readonly finalState: EndpointState;
  readonly configId?: string;
  /** Every state seen while polling, in order. */
  readonly observedStates: readonly EndpointState[];
  readonly error?: TransitionErrorInfo;
  /** Set when an outcome sink could not store this result. */
  readonly recordingFailures?: readonly string[];
}

export interface DeploymentRequest extends InstanceSizing {
  readonly endpointName: string;
  readonly trainingJobId?: string;
  /** Manual override; takes precedence over the training job convention. */
  readonly artifactUri?: string;
  /** Model already created upstream (pipeline CreateModel step). */
  readonly modelName?: string;
}
