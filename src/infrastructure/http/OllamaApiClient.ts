import { z } from 'zod';
import { ModelConfig } from '../../core/entities/Model.js';
import { IBackendAdapter } from '../../core/interfaces/IBackendAdapter.js';
import { GeneratePayload } from '../../core/templates/types.js';
import { FragmentStream } from '../../core/stream/FragmentStream.js';
import { BackendError } from '../../core/errors.js';
import { NO_RETRY_CONFIG } from '../../utils/retry.js';
import { StreamingApiClient, StreamingClientOptions, describeError } from './StreamingApiClient.js';

const GenerateLineSchema = z.object({
  response: z.string().optional(),
  error: z.unknown().optional(),
  done: z.boolean().optional(),
});

/**
 * Ollama API client for the local /api/generate endpoint.
 * Takes a flattened prompt; the local service needs no credential and is
 * not retried.
 */
export class OllamaApiClient extends StreamingApiClient implements IBackendAdapter<GeneratePayload> {

  constructor(options: StreamingClientOptions) {
    // A timeout may be configured, extra attempts may not
    const retryConfig = { ...(options.retryConfig ?? NO_RETRY_CONFIG), maxAttempts: 1 };
    super('ollama', { ...options, retryConfig }, NO_RETRY_CONFIG);
  }

  stream(payload: GeneratePayload, model: ModelConfig): FragmentStream {
    return new FragmentStream((signal) => this.generate(payload, model, signal));
  }

  private async *generate(
    payload: GeneratePayload,
    model: ModelConfig,
    signal: AbortSignal
  ): AsyncGenerator<string, void, undefined> {
    const modelId = model.backendModelId ?? model.modelName;
    const response = await this.open(
      '/api/generate',
      {},
      {
        model: modelId,
        prompt: payload.prompt,
      },
      modelId,
      signal
    );

    for await (const line of this.lines(response, signal)) {
      if (!line.trim()) {
        continue;
      }

      const parsed = GenerateLineSchema.safeParse(this.parseFrame(line));
      if (!parsed.success) {
        throw new BackendError('ollama', `Unexpected line from ollama: ${line}`);
      }

      const chunk = parsed.data;
      if (chunk.error != null) {
        throw new BackendError('ollama', describeError(chunk.error));
      }
      if (chunk.response) {
        yield chunk.response;
      }
      if (chunk.done) {
        return;
      }
    }
  }
}
