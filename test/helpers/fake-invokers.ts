import { EndpointInvoker } from '../../lib/smoke/endpoint-smoke-test';
import { FunctionInvocation, FunctionInvoker } from '../../lib/smoke/function-smoke-test';

/** Answers every invocation with the same canned reply, or throws it. */
export class CannedEndpointInvoker implements EndpointInvoker {
  public readonly requests: { endpointName: string; body: string }[] = [];

  constructor(private readonly reply: string | Error) {}

  public async invoke(endpointName: string, body: string): Promise<string> {
    this.requests.push({ endpointName, body });
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

export class CannedFunctionInvoker implements FunctionInvoker {
  public readonly requests: { functionName: string; payload: string }[] = [];

  constructor(private readonly reply: FunctionInvocation | Error) {}

  public async invoke(functionName: string, payload: string): Promise<FunctionInvocation> {
    this.requests.push({ functionName, payload });
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

/** What the GenAI function returns through a direct invoke. */
export function functionReply(statusCode: number, body: Record<string, unknown>): FunctionInvocation {
  return { payload: JSON.stringify({ statusCode, headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(body) }) };
}
