// lib/smoke/function-smoke-test.ts
import { InvokeCommand, LambdaClient } from '@aws-sdk/client-lambda';
import { z } from 'zod';
import { describeError } from '../endpoint-lifecycle/errors';
import { Logger, logger as rootLogger } from '../utils/logger';
import { SmokeTestResult } from './endpoint-smoke-test';

export const DEFAULT_SMOKE_PROMPT = 'Describe a loyal customer segment in one sentence.';

export interface FunctionInvocation {
  /** Set when the function threw. */
  readonly functionError?: string;
  readonly payload: string;
}

export interface FunctionInvoker {
  invoke(functionName: string, payload: string): Promise<FunctionInvocation>;
}

export class LambdaFunctionInvoker implements FunctionInvoker {
  constructor(private readonly client: LambdaClient = new LambdaClient({})) {}

  public async invoke(functionName: string, payload: string): Promise<FunctionInvocation> {
    const response = await this.client.send(new InvokeCommand({
      FunctionName: functionName,
      Payload: new TextEncoder().encode(payload),
    }));
    return {
      functionError: response.FunctionError,
      payload: response.Payload ? new TextDecoder().decode(response.Payload) : '',
    };
  }
}

const FunctionResponseSchema = z.object({
  statusCode: z.number(),
  body: z.string(),
});

const CompletionBodySchema = z.object({ completion: z.string().min(1) });

export interface CompletionResponse {
  readonly completion: string;
}

export async function smokeTestFunction(
  invoker: FunctionInvoker,
  functionName: string,
  text: string = DEFAULT_SMOKE_PROMPT,
  logger: Logger = rootLogger,
): Promise<SmokeTestResult<CompletionResponse>> {
  const fail = (detail: string): SmokeTestResult<CompletionResponse> => {
    logger.error('function smoke test failed', { functionName, detail });
    return { target: functionName, passed: false, detail };
  };

  let invocation: FunctionInvocation;
  try {
    invocation = await invoker.invoke(functionName, JSON.stringify({ text }));
  } catch (error) {
    return fail(`invocation failed: ${describeError(error)}`);
  }
  if (invocation.functionError) {
    return fail(`function error ${invocation.functionError}: ${invocation.payload}`);
  }

  let inner: unknown;
  try {
    const response = FunctionResponseSchema.safeParse(JSON.parse(invocation.payload));
    if (!response.success) {
      return fail('response is not an HTTP-style result');
    }
    if (response.data.statusCode !== 200) {
      return fail(`status ${response.data.statusCode}: ${response.data.body}`);
    }
    inner = JSON.parse(response.data.body);
  } catch {
    return fail('response is not JSON');
  }

  const body = CompletionBodySchema.safeParse(inner);
  if (!body.success) {
    return fail('response has no completion');
  }
  logger.info('function smoke test passed', { functionName });
  return { target: functionName, passed: true, detail: 'completion returned', response: body.data };
}
