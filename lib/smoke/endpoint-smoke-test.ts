// lib/smoke/endpoint-smoke-test.ts
import { InvokeEndpointCommand, SageMakerRuntimeClient } from '@aws-sdk/client-sagemaker-runtime';
import { describeError } from '../endpoint-lifecycle/errors';
import {
  SAMPLE_CUSTOMER,
  SegmentationRequest,
  SegmentationResponse,
  SegmentationResponseSchema,
  countRecords,
} from '../inference/segmentation-contract';
import { Logger, logger as rootLogger } from '../utils/logger';
import { formatIssues } from '../utils/validation';

export interface SmokeTestResult<T> {
  readonly target: string;
  readonly passed: boolean;
  readonly detail: string;
  readonly response?: T;
}

export interface EndpointInvoker {
  invoke(endpointName: string, body: string): Promise<string>;
}

export class SageMakerEndpointInvoker implements EndpointInvoker {
  constructor(private readonly client: SageMakerRuntimeClient = new SageMakerRuntimeClient({})) {}

  public async invoke(endpointName: string, body: string): Promise<string> {
    const response = await this.client.send(new InvokeEndpointCommand({
      EndpointName: endpointName,
      ContentType: 'application/json',
      Accept: 'application/json',
      Body: new TextEncoder().encode(body),
    }));
    return new TextDecoder().decode(response.Body);
  }
}

/**
 * Sends a features request and checks that one well-formed prediction comes
 * back per record.
 */
export async function smokeTestEndpoint(
  invoker: EndpointInvoker,
  endpointName: string,
  request: SegmentationRequest = SAMPLE_CUSTOMER,
  logger: Logger = rootLogger,
): Promise<SmokeTestResult<SegmentationResponse>> {
  const fail = (detail: string): SmokeTestResult<SegmentationResponse> => {
    logger.error('endpoint smoke test failed', { endpointName, detail });
    return { target: endpointName, passed: false, detail };
  };

  let raw: string;
  try {
    raw = await invoker.invoke(endpointName, JSON.stringify(request));
  } catch (error) {
    return fail(`invocation failed: ${describeError(error)}`);
  }

  let body: unknown;
  try {
    body = JSON.parse(raw);
  } catch {
    return fail('response is not JSON');
  }

  const parsed = SegmentationResponseSchema.safeParse(body);
  if (!parsed.success) {
    return fail(`response does not match the contract: ${formatIssues(parsed.error).join('; ')}`);
  }

  const expected = countRecords(request);
  if (parsed.data.predictions.length !== expected) {
    return fail(`expected ${expected} prediction(s), got ${parsed.data.predictions.length}`);
  }

  logger.info('endpoint smoke test passed', { endpointName, predictions: parsed.data.predictions });
  return {
    target: endpointName,
    passed: true,
    detail: `${expected} prediction(s) returned`,
    response: parsed.data,
  };
}
