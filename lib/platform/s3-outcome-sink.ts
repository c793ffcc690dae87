// lib/platform/s3-outcome-sink.ts
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { OutcomeRecord, OutcomeSink } from '../endpoint-lifecycle/outcome-recorder';

export interface S3OutcomeSinkProps {
  readonly bucket: string;
  readonly prefix: string;
  readonly client?: S3Client;
}

/**
 * Writes `<prefix>/<endpoint>/latest.json` for smoke tests and the model
 * registry, and a timestamped copy next to it as history.
 */
export class S3OutcomeSink implements OutcomeSink {
  public readonly name = 's3';
  private readonly client: S3Client;

  constructor(private readonly props: S3OutcomeSinkProps) {
    this.client = props.client ?? new S3Client({});
  }

  public async write(record: OutcomeRecord): Promise<void> {
    const body = JSON.stringify(record, null, 2);
    for (const key of outcomeKeys(this.props.prefix, record)) {
      await this.client.send(new PutObjectCommand({
        Bucket: this.props.bucket,
        Key: key,
        Body: body,
        ContentType: 'application/json',
      }));
    }
  }
}

export function outcomeKeys(prefix: string, record: OutcomeRecord): [string, string] {
  const base = [prefix.replace(/^\/+|\/+$/g, ''), record.endpointName].filter(Boolean).join('/');
  return [`${base}/latest.json`, `${base}/${record.recordedAt}.json`];
}
