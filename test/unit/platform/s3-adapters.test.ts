import {
  NotFound,
  S3Client,
  S3ServiceException,
  ServiceInputTypes,
  ServiceOutputTypes,
} from '@aws-sdk/client-s3';
import { OutcomeRecord } from '../../../lib/endpoint-lifecycle/outcome-recorder';
import { EndpointState, LifecycleAction, TransitionStatus } from '../../../lib/endpoint-lifecycle/types';
import { S3ArtifactStore, isMissingObject, parseS3Uri } from '../../../lib/platform/s3-artifact-store';
import { S3OutcomeSink, outcomeKeys } from '../../../lib/platform/s3-outcome-sink';

interface SentCommand {
  readonly command: string;
  readonly input: ServiceInputTypes;
}

function stubClient(respond: (command: string) => ServiceOutputTypes) {
  const client = new S3Client({
    region: 'us-east-1',
    credentials: { accessKeyId: 'test', secretAccessKey: 'test' },
  });
  const sent: SentCommand[] = [];
  client.middlewareStack.add(
    (_next, context) => async (args) => {
      const command = String(context.commandName ?? 'unknown');
      sent.push({ command, input: args.input });
      return { output: respond(command), response: {} };
    },
    { step: 'initialize', name: 'stubResponses' },
  );
  return { client, sent };
}

const record: OutcomeRecord = {
  endpointName: 'seg-endpoint',
  endpointState: EndpointState.IN_SERVICE,
  configId: 'seg-endpoint-20260301100000-0',
  action: LifecycleAction.CREATE,
  status: TransitionStatus.COMPLETED,
  recordedAt: '2026-03-01T10:00:02.000Z',
};

describe('parseS3Uri', () => {
  test('splits bucket and key', () => {
    expect(parseS3Uri('s3://test-artifacts/training-output/job/output/model.tar.gz')).toEqual({
      bucket: 'test-artifacts',
      key: 'training-output/job/output/model.tar.gz',
    });
  });

  test.each(['https://test-artifacts/model.tar.gz', 's3://test-artifacts', 's3://test-artifacts/'])('rejects %s', (uri) => {
    expect(() => parseS3Uri(uri)).toThrow(`${uri} is not an s3://bucket/key URI`);
  });
});

describe('isMissingObject', () => {
  test('recognises NotFound and bare 404s', () => {
    expect(isMissingObject(new NotFound({ $metadata: {}, message: 'Not Found' }))).toBe(true);
    expect(isMissingObject(new S3ServiceException({
      name: 'UnknownError',
      $fault: 'client',
      $metadata: { httpStatusCode: 404 },
    }))).toBe(true);
  });

  test('does not hide access errors', () => {
    expect(isMissingObject(new S3ServiceException({
      name: 'Forbidden',
      $fault: 'client',
      $metadata: { httpStatusCode: 403 },
    }))).toBe(false);
  });
});

describe('S3ArtifactStore', () => {
  test('reports size and modification time', async () => {
    const modified = new Date('2026-02-28T08:00:00.000Z');
    const { client, sent } = stubClient(() => ({ ContentLength: 2048, LastModified: modified, $metadata: {} }));

    await expect(new S3ArtifactStore(client).stat('s3://test-artifacts/model.tar.gz'))
      .resolves.toEqual({ size: 2048, lastModified: modified });
    expect(sent).toEqual([{ command: 'HeadObjectCommand', input: { Bucket: 'test-artifacts', Key: 'model.tar.gz' } }]);
  });

  test('returns nothing for a missing object', async () => {
    const { client } = stubClient(() => {
      throw new NotFound({ $metadata: {}, message: 'Not Found' });
    });
    await expect(new S3ArtifactStore(client).stat('s3://test-artifacts/model.tar.gz')).resolves.toBeUndefined();
  });
});

describe('outcomeKeys', () => {
  test('writes a latest pointer and a timestamped copy under the endpoint', () => {
    expect(outcomeKeys('/deployments/', record)).toEqual([
      'deployments/seg-endpoint/latest.json',
      'deployments/seg-endpoint/2026-03-01T10:00:02.000Z.json',
    ]);
  });

  test('works without a prefix', () => {
    expect(outcomeKeys('', record)[0]).toBe('seg-endpoint/latest.json');
  });
});

describe('S3OutcomeSink', () => {
  test('puts the record as JSON under both keys', async () => {
    const { client, sent } = stubClient(() => ({ $metadata: {} }));

    await new S3OutcomeSink({ bucket: 'test-artifacts', prefix: 'deployments', client }).write(record);

    const body = JSON.stringify(record, null, 2);
    expect(sent).toEqual([
      {
        command: 'PutObjectCommand',
        input: {
          Bucket: 'test-artifacts',
          Key: 'deployments/seg-endpoint/latest.json',
          Body: body,
          ContentType: 'application/json',
        },
      },
      {
        command: 'PutObjectCommand',
        input: {
          Bucket: 'test-artifacts',
          Key: 'deployments/seg-endpoint/2026-03-01T10:00:02.000Z.json',
          Body: body,
          ContentType: 'application/json',
        },
      },
    ]);
  });
});
