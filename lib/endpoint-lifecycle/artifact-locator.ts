// lib/endpoint-lifecycle/artifact-locator.ts
import { Clock, systemClock } from '../utils/clock';
import { ArtifactNotFoundError, describeError } from './errors';
import { TrainedArtifact } from './types';

export const MODEL_ARTIFACT_FILE = 'model.tar.gz';
export const MANUAL_OVERRIDE_JOB_ID = 'manual-override';

export interface StoredObject {
  readonly size: number;
  readonly lastModified?: Date;
}

/**
 * Read-only view of the object store holding training output.
 * `stat` resolves `undefined` when the object does not exist.
 */
export interface ArtifactStore {
  stat(uri: string): Promise<StoredObject | undefined>;
}

export interface ArtifactLocateRequest {
  readonly trainingJobId?: string;
  readonly artifactUri?: string;
}

export interface ArtifactLocatorProps {
  readonly store: ArtifactStore;
  /** Output path the training jobs write to, e.g. s3://bucket/training-output */
  readonly trainingOutputUri: string;
  readonly clock?: Clock;
}

export class ArtifactLocator {
  private readonly clock: Clock;

  constructor(private readonly props: ArtifactLocatorProps) {
    this.clock = props.clock ?? systemClock;
  }

  /**
   * An explicit URI is used verbatim; otherwise the SageMaker training output
   * convention `<output>/<job>/output/model.tar.gz` applies.
   */
  public resolveUri(request: ArtifactLocateRequest): string {
    if (request.artifactUri) {
      return request.artifactUri;
    }
    if (request.trainingJobId) {
      const base = this.props.trainingOutputUri.replace(/\/+$/, '');
      return `${base}/${request.trainingJobId}/output/${MODEL_ARTIFACT_FILE}`;
    }
    throw new ArtifactNotFoundError('', 'neither a training job id nor an artifact uri was given');
  }

  public async locate(request: ArtifactLocateRequest): Promise<TrainedArtifact> {
    const artifactUri = this.resolveUri(request);

    let stored: StoredObject | undefined;
    try {
      stored = await this.props.store.stat(artifactUri);
    } catch (error) {
      throw new ArtifactNotFoundError(artifactUri, `unreachable (${describeError(error)})`, { cause: error });
    }

    if (!stored) {
      throw new ArtifactNotFoundError(artifactUri, 'no such object');
    }
    if (stored.size <= 0) {
      throw new ArtifactNotFoundError(artifactUri, 'object is empty');
    }

    return {
      artifactUri,
      trainingJobId: request.trainingJobId ?? MANUAL_OVERRIDE_JOB_ID,
      createdAt: stored.lastModified ?? this.clock.now(),
    };
  }
}
