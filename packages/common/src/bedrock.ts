import { BedrockRuntimeClient, InvokeModelWithResponseStreamCommand } from '@aws-sdk/client-bedrock-runtime';
import type { ResponseStream } from '@aws-sdk/client-bedrock-runtime';

import type { AppConfig } from './config';

// ===== Types =====
export interface InvokeOptions {
  maxTokens?: number; // optional -> falls back to config
}

export type ModelInvoker = (prompt: string, options?: InvokeOptions) => Promise<string>;

export interface LlamaInvoker {
  stream(prompt: string, options?: InvokeOptions): AsyncIterable<string>;
  invoke: ModelInvoker;
}

type InvokerConfig = Pick<AppConfig, 'region' | 'modelId' | 'maxTokens' | 'temperature' | 'systemPrompt'>;

// Allow-list pattern – helps early detection of misconfiguration
const ALLOWED_MODEL_PREFIXES = ['meta.llama3', 'us.meta.llama3'];

export class ModelInvocationError extends Error {
  constructor(message: string, readonly cause?: unknown) {
    super(message);
    this.name = 'ModelInvocationError';
  }
}

function validateModelId(modelId: string) {
  if (!modelId) throw new ModelInvocationError('modelId is empty (ENV not set?)');
  const ok = ALLOWED_MODEL_PREFIXES.some((p) => modelId.startsWith(p));
  if (!ok) console.warn('[bedrock] modelId not in allow-list (continuing but flagged)', { modelId });
  return modelId;
}

export function formatLlama3Prompt(prompt: string, systemPrompt: string) {
  return (
    '<|begin_of_text|><|start_header_id|>system<|end_header_id|>\n\n' +
    `${systemPrompt}<|eot_id|><|start_header_id|>user<|end_header_id|>\n\n` +
    `${prompt}<|eot_id|><|start_header_id|>assistant<|end_header_id|>\n\n`
  );
}

const decoder = new TextDecoder('utf-8');

function decodeChunk(bytes: Uint8Array): string {
  let payload: unknown;
  try {
    payload = JSON.parse(decoder.decode(bytes));
  } catch {
    throw new Error('Failed to parse Bedrock stream chunk');
  }
  if (payload && typeof payload === 'object' && 'generation' in payload) {
    const { generation } = payload;
    return typeof generation === 'string' ? generation : '';
  }
  return '';
}

function streamFailure(event: ResponseStream) {
  return (
    event.internalServerException ??
    event.modelStreamErrorException ??
    event.validationException ??
    event.throttlingException ??
    event.modelTimeoutException
  );
}

function describe(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

export function logInvokerEnv(config: InvokerConfig) {
  console.info('[bedrock] env', { region: config.region, model: config.modelId, maxTokens: config.maxTokens });
}

/**
 * Llama 3 instruct on Bedrock, read through the response stream.
 * `stream` yields generation fragments as they arrive; `invoke` joins them
 * and only returns once the stream has ended.
 */
export function createLlamaInvoker(
  config: InvokerConfig,
  client = new BedrockRuntimeClient({ region: config.region })
): LlamaInvoker {
  const modelId = validateModelId(config.modelId);

  async function* stream(prompt: string, { maxTokens = config.maxTokens }: InvokeOptions = {}) {
    console.info('[bedrock] invokeLlama start', { modelId, tokens: maxTokens });
    const command = new InvokeModelWithResponseStreamCommand({
      body: JSON.stringify({
        prompt: formatLlama3Prompt(prompt, config.systemPrompt),
        max_gen_len: maxTokens,
        temperature: config.temperature
      }),
      contentType: 'application/json',
      accept: 'application/json',
      modelId
    });

    let body: AsyncIterable<ResponseStream> | undefined;
    try {
      body = (await client.send(command)).body;
    } catch (error) {
      console.error('[bedrock] invokeLlama error', { modelId, error });
      throw new ModelInvocationError(`Error calling Bedrock model: ${describe(error)}`, error);
    }
    if (!body) {
      throw new ModelInvocationError('Error calling Bedrock model: empty response stream');
    }

    try {
      for await (const event of body) {
        const failure = streamFailure(event);
        if (failure) throw failure;
        if (event.chunk?.bytes) {
          const text = decodeChunk(event.chunk.bytes);
          if (text) yield text;
        }
      }
    } catch (error) {
      console.error('[bedrock] invokeLlama stream error', { modelId, error });
      throw new ModelInvocationError(`Error calling Bedrock model: ${describe(error)}`, error);
    }
  }

  async function invoke(prompt: string, options?: InvokeOptions) {
    let output = '';
    for await (const fragment of stream(prompt, options)) {
      output += fragment;
    }
    console.info('[bedrock] invokeLlama success', { modelId, length: output.length });
    return output;
  }

  return { stream, invoke };
}
