import { z } from 'zod';
import { ModelConfig } from '../../core/entities/Model.js';
import { IBackendAdapter } from '../../core/interfaces/IBackendAdapter.js';
import { ChatPayload } from '../../core/templates/types.js';
import { FragmentStream } from '../../core/stream/FragmentStream.js';
import { BackendError, CredentialError } from '../../core/errors.js';
import { DEFAULT_RETRY_CONFIG } from '../../utils/retry.js';
import { StreamingApiClient, StreamingClientOptions, describeError } from './StreamingApiClient.js';

const DATA_PREFIX = 'data:';
const DONE_MARKER = '[DONE]';

const ChatCompletionChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z.object({
          content: z.string().nullish(),
        }),
      })
    )
    .min(1),
});

export interface OpenAiClientOptions extends StreamingClientOptions {
  apiKey?: string;
}

/**
 * OpenAI chat-completions client (streaming, server-sent events)
 */
export class OpenAiApiClient extends StreamingApiClient implements IBackendAdapter<ChatPayload> {
  private readonly apiKey?: string;

  constructor(options: OpenAiClientOptions) {
    super('openai', options, DEFAULT_RETRY_CONFIG);
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
    if (!this.apiKey) {
      throw new CredentialError('OPENAI_API_KEY');
    }

    const modelId = model.backendModelId ?? model.modelName;
    const response = await this.open(
      '/chat/completions',
      { Authorization: `Bearer ${this.apiKey}` },
      {
        model: modelId,
        messages: payload.messages,
        n: 1,
        temperature: 1.0,
        stream: true,
      },
      modelId,
      signal
    );

    for await (const line of this.lines(response, signal)) {
      if (!line.startsWith(DATA_PREFIX)) {
        continue;
      }

      const data = line.slice(DATA_PREFIX.length).trim();
      if (data === DONE_MARKER) {
        return;
      }

      const chunk = this.parseFrame(data);
      if (typeof chunk === 'object' && chunk !== null && 'error' in chunk && chunk.error != null) {
        throw new BackendError('openai', describeError(chunk.error));
      }

      const parsed = ChatCompletionChunkSchema.safeParse(chunk);
      if (!parsed.success) {
        this.logger.debug('Skipping chunk with unexpected shape', { chunk: data });
        continue;
      }

      // Role-only and finish deltas carry no content
      const content = parsed.data.choices[0].delta.content;
      if (content) {
        yield content;
      }
    }
  }
}
