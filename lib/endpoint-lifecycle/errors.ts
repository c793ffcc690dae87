// lib/endpoint-lifecycle/errors.ts
import { EndpointState, LifecycleErrorCode, TransitionErrorInfo } from './types';

export abstract class EndpointLifecycleError extends Error {
  abstract readonly code: LifecycleErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  public toErrorInfo(): TransitionErrorInfo {
    return { code: this.code, message: this.message, retryable: this.retryable };
  }
}

export class ArtifactNotFoundError extends EndpointLifecycleError {
  readonly code = LifecycleErrorCode.ARTIFACT_NOT_FOUND;
  readonly retryable = false;

  constructor(public readonly artifactUri: string, detail: string, options?: { cause?: unknown }) {
    super(`Model artifact ${artifactUri || '(unresolved)'} is not usable: ${detail}`, options);
  }
}

export class ProbeError extends EndpointLifecycleError {
  readonly code = LifecycleErrorCode.PROBE_FAILED;
  readonly retryable = true;

  constructor(public readonly endpointName: string, options?: { cause?: unknown }) {
    super(`Could not read the state of endpoint ${endpointName}: ${describeError(options?.cause)}`, options);
  }
}

export class RegistrationError extends EndpointLifecycleError {
  readonly code = LifecycleErrorCode.REGISTRATION_FAILED;
  readonly retryable = false;
}

export class TransitionConflictError extends EndpointLifecycleError {
  readonly code = LifecycleErrorCode.CONFLICT;
  readonly retryable = true;

  constructor(public readonly endpointName: string, reason: string) {
    super(`Endpoint ${endpointName} is busy: ${reason}`);
  }
}

export class TransitionTimeoutError extends EndpointLifecycleError {
  readonly code = LifecycleErrorCode.TIMEOUT;
  readonly retryable = true;

  constructor(
    public readonly endpointName: string,
    public readonly budgetMs: number,
    public readonly lastState: EndpointState,
  ) {
    super(`Endpoint ${endpointName} did not settle within ${budgetMs}ms (last state ${lastState})`);
  }
}

export class TransitionFailedError extends EndpointLifecycleError {
  readonly code = LifecycleErrorCode.TRANSITION_FAILED;
  readonly retryable = false;

  constructor(public readonly endpointName: string, reason: string, options?: { cause?: unknown }) {
    super(`Transition of endpoint ${endpointName} failed: ${reason}`, options);
  }
}

export class RecordingFailure extends EndpointLifecycleError {
  readonly code = LifecycleErrorCode.RECORDING_FAILED;
  readonly retryable = false;

  constructor(public readonly sink: string, options?: { cause?: unknown }) {
    super(`Outcome sink ${sink} rejected the record: ${describeError(options?.cause)}`, options);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return 'unknown error';
  return String(error);
}
