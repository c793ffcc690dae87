// lib/genai/bedrock-handler.ts
import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { z } from 'zod';
import { describeError } from '../endpoint-lifecycle/errors';
import { logger as rootLogger } from '../utils/logger';

export const DEFAULT_MODEL_ID = 'anthropic.claude-v2';
export const DEFAULT_MAX_TOKENS = 400;
export const DEFAULT_TEMPERATURE = 0.7;
export const STOP_SEQUENCES = ['\n\nHuman:'];

export interface GenerationSettings {
  readonly modelId: string;
  readonly maxTokens: number;
  readonly temperature: number;
}

/** Text completion behind the GenAI function. */
export interface TextGenerator {
  complete(prompt: string, settings: GenerationSettings): Promise<string>;
}

export interface HttpResponse {
  readonly statusCode: number;
  readonly headers: Record<string, string>;
  readonly body: string;
}

const CompletionSchema = z.object({ completion: z.string() });

export class BedrockTextGenerator implements TextGenerator {
  constructor(private readonly client: BedrockRuntimeClient = new BedrockRuntimeClient({})) {}

  public async complete(prompt: string, settings: GenerationSettings): Promise<string> {
    const response = await this.client.send(new InvokeModelCommand({
      modelId: settings.modelId,
      contentType: 'application/json',
      accept: 'application/json',
      body: JSON.stringify({
        prompt,
        max_tokens_to_sample: settings.maxTokens,
        temperature: settings.temperature,
        stop_sequences: STOP_SEQUENCES,
      }),
    }));
    const payload: unknown = JSON.parse(new TextDecoder().decode(response.body));
    return CompletionSchema.parse(payload).completion;
  }
}

export function buildPrompt(text: string): string {
  return `\n\nHuman: ${text}\n\nAssistant:`;
}

export function settingsFromEnv(env: NodeJS.ProcessEnv): GenerationSettings {
  return {
    modelId: env.MODEL_ID || DEFAULT_MODEL_ID,
    maxTokens: numberOr(env.MAX_TOKENS, DEFAULT_MAX_TOKENS),
    temperature: numberOr(env.TEMPERATURE, DEFAULT_TEMPERATURE),
  };
}

function numberOr(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function respond(statusCode: number, body: Record<string, unknown>): HttpResponse {
  return {
    statusCode,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

type Payload = { ok: true; value: unknown } | { ok: false };

/**
 * API Gateway sends the request as a JSON string in `body`; a direct invoke
 * may send an object there, or the payload itself.
 */
function readPayload(event: unknown): Payload {
  if (!isRecord(event)) return { ok: true, value: event };
  const body = event.body;
  if (typeof body === 'string') {
    try {
      return { ok: true, value: JSON.parse(body || '{}') };
    } catch {
      return { ok: false };
    }
  }
  return { ok: true, value: body ?? event };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface GenAiHandlerDeps {
  readonly generator?: TextGenerator;
  readonly env?: NodeJS.ProcessEnv;
}

export function createGenAiHandler(deps: GenAiHandlerDeps = {}) {
  const generator = deps.generator ?? new BedrockTextGenerator();
  const settings = settingsFromEnv(deps.env ?? process.env);
  const log = rootLogger.child({ handler: 'genai', modelId: settings.modelId });

  return async (event: unknown): Promise<HttpResponse> => {
    const payload = readPayload(event);
    if (!payload.ok) {
      return respond(400, { error: 'Invalid JSON' });
    }

    const text = isRecord(payload.value) && typeof payload.value.text === 'string' ? payload.value.text.trim() : '';
    if (!text) {
      return respond(400, { error: "'text' field required" });
    }

    try {
      const completion = await generator.complete(buildPrompt(text), settings);
      return respond(200, { completion });
    } catch (error) {
      log.error('text generation failed', { error: describeError(error) });
      return respond(500, { error: describeError(error) });
    }
  };
}

export const handler = createGenAiHandler();
