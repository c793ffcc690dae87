// lib/platform/s3-artifact-store.ts
import { HeadObjectCommand, NotFound, NoSuchKey, S3Client, S3ServiceException } from '@aws-sdk/client-s3';
import { ArtifactStore, StoredObject } from '../endpoint-lifecycle/artifact-locator';

export interface S3Location {
  readonly bucket: string;
  readonly key: string;
}

export function parseS3Uri(uri: string): S3Location {
  const match = /^s3:\/\/([^/]+)\/(.+)$/.exec(uri);
  if (!match) {
    throw new Error(`${uri} is not an s3://bucket/key URI`);
  }
  return { bucket: match[1], key: match[2] };
}

export class S3ArtifactStore implements ArtifactStore {
  constructor(private readonly client: S3Client = new S3Client({})) {}

  public async stat(uri: string): Promise<StoredObject | undefined> {
    const { bucket, key } = parseS3Uri(uri);
    try {
      const head = await this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
      return { size: head.ContentLength ?? 0, lastModified: head.LastModified };
    } catch (error) {
      if (isMissingObject(error)) return undefined;
      throw error;
    }
  }
}

export function isMissingObject(error: unknown): boolean {
  if (error instanceof NotFound || error instanceof NoSuchKey) return true;
  return error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404;
}
