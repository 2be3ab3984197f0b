import { z } from 'zod';
import { Message } from '../../core/entities/Conversation.js';
import { ModelConfig } from '../../core/entities/Model.js';
import { IBackendAdapter } from '../../core/interfaces/IBackendAdapter.js';
import { ChatPayload } from '../../core/templates/types.js';
import { FragmentStream } from '../../core/stream/FragmentStream.js';
import { BackendError, ConfigError, CredentialError } from '../../core/errors.js';
import { DEFAULT_RETRY_CONFIG } from '../../utils/retry.js';
import { StreamingApiClient, StreamingClientOptions, describeError } from './StreamingApiClient.js';

export const ANTHROPIC_VERSION = '2023-06-01';

/**
 * Context is 100k-200k tokens, but output is capped separately
 */
export const ANTHROPIC_MAX_OUTPUT_TOKENS = 4096;

export const ANTHROPIC_MODEL_MAP: Readonly<Record<string, string>> = {
  opus: 'claude-3-opus-20240229',
  sonnet: 'claude-3-sonnet-20240229',
  haiku: 'claude-3-haiku-20240307',
};

const DATA_PREFIX = 'data: ';

const EventSchema = z.object({ type: z.string() });

const ContentBlockDeltaSchema = z.object({
  type: z.literal('content_block_delta'),
  delta: z.object({
    text: z.string().optional(),
  }),
});

export function resolveAnthropicModel(alias: string): string {
  if (!Object.prototype.hasOwnProperty.call(ANTHROPIC_MODEL_MAP, alias)) {
    throw new ConfigError(
      `Model ${alias} not found in Anthropic model map (expected one of: ${Object.keys(ANTHROPIC_MODEL_MAP).join(', ')})`
    );
  }
  return ANTHROPIC_MODEL_MAP[alias];
}

export interface AnthropicClientOptions extends StreamingClientOptions {
  apiKey?: string;
}

/**
 * Anthropic Messages API client (streaming, server-sent events)
 */
export class AnthropicApiClient extends StreamingApiClient implements IBackendAdapter<ChatPayload> {
  private readonly apiKey?: string;

  constructor(options: AnthropicClientOptions) {
    super('anthropic', options, DEFAULT_RETRY_CONFIG);
    this.apiKey = options.apiKey;
  }

  stream(payload: ChatPayload, model: ModelConfig): FragmentStream {
    return new FragmentStream((signal) => this.generate(payload, model, signal));
  }

  private async *generate(
    payload: ChatPayload,
    model: ModelConfig,
    signal: AbortSignal
  ): AsyncGenerator<string, void, undefined> {
    const modelId = resolveAnthropicModel(model.backendModelId ?? model.modelName);

    if (!this.apiKey) {
      throw new CredentialError('ANTHROPIC_API_KEY');
    }

    const response = await this.open(
      '/v1/messages',
      {
        'x-api-key': this.apiKey,
        'anthropic-version': ANTHROPIC_VERSION,
      },
      buildRequestBody(modelId, payload.messages),
      modelId,
      signal
    );

    for await (const line of this.lines(response, signal)) {
      if (!line.startsWith(DATA_PREFIX)) {
        continue;
      }

      const event = this.parseFrame(line.slice(DATA_PREFIX.length).trim());
      const header = EventSchema.safeParse(event);
      if (!header.success) {
        throw new BackendError('anthropic', 'Event without a type in anthropic stream');
      }

      if (header.data.type === 'content_block_delta') {
        const delta = ContentBlockDeltaSchema.safeParse(event);
        if (!delta.success) {
          throw new BackendError('anthropic', 'Malformed content_block_delta event');
        }
        // input_json_delta and friends have no text
        if (delta.data.delta.text) {
          yield delta.data.delta.text;
        }
      } else if (header.data.type === 'error') {
        const error = typeof event === 'object' && event !== null && 'error' in event ? event.error : undefined;
        throw new BackendError('anthropic', describeError(error));
      }
    }
  }
}

/**
 * The Messages API takes system prompts as a top-level field, not as a role
 */
export function buildRequestBody(modelId: string, messages: readonly Message[]) {
  const system = messages
    .filter((msg) => msg.role === 'system')
    .map((msg) => msg.content)
    .join('\n\n');

  return {
    model: modelId,
    max_tokens: ANTHROPIC_MAX_OUTPUT_TOKENS,
    ...(system ? { system } : {}),
    messages: messages
      .filter((msg) => msg.role !== 'system')
      .map((msg) => ({ role: msg.role, content: msg.content })),
    stream: true,
  };
}
