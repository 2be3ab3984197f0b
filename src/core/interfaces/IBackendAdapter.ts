import { BackendKind, ModelConfig } from '../entities/Model.js';
import { ChatPayload, GeneratePayload, PromptPayload } from '../templates/types.js';
import { FragmentStream } from '../stream/FragmentStream.js';

/**
 * Interface for a streaming text-generation backend
 */
export interface IBackendAdapter<P extends PromptPayload = PromptPayload> {
  readonly kind: BackendKind;

  /**
   * Open a fresh request for the payload. Nothing is sent until the
   * returned stream is first iterated.
   */
  stream(payload: P, model: ModelConfig): FragmentStream;
}

/**
 * The closed set of adapters, one per backend kind
 */
export interface BackendAdapters {
  openai: IBackendAdapter<ChatPayload>;
  anthropic: IBackendAdapter<ChatPayload>;
  ollama: IBackendAdapter<GeneratePayload>;
}
