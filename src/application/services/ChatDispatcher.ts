import { Message } from '../../core/entities/Conversation.js';
import { ModelConfig } from '../../core/entities/Model.js';
import { BackendAdapters } from '../../core/interfaces/IBackendAdapter.js';
import { BackendRegistry } from '../../core/registry/BackendRegistry.js';
import { windowMessages } from '../../core/windowing/PromptWindower.js';
import { ChatTemplate, TranscriptTemplate } from '../../core/templates/index.js';
import { FragmentStream } from '../../core/stream/FragmentStream.js';
import { EmptyHistoryError } from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('dispatcher');

/**
 * Turns stored history into one backend request.
 *
 * Lookup and windowing run eagerly, so ConfigError and EmptyHistoryError
 * are thrown by respond() itself, before any backend is contacted. Backend
 * failures surface while the returned stream is iterated.
 */
export class ChatDispatcher {
  private readonly chatTemplate = new ChatTemplate();
  private readonly transcriptTemplate = new TranscriptTemplate();

  constructor(
    private readonly registry: BackendRegistry,
    private readonly adapters: BackendAdapters
  ) {}

  respond(history: readonly Message[], modelName: string): FragmentStream {
    const config = this.registry.lookup(modelName);
    const window = windowMessages(history, config.maxTokens);

    if (window.length === 0) {
      throw new EmptyHistoryError(
        history.length === 0
          ? 'Conversation history is empty'
          : `The most recent message does not fit in the ${config.maxTokens} token window of ${modelName}`
      );
    }

    logger.debug('Dispatching', {
      model: modelName,
      backend: config.backendKind,
      messages: window.length,
      dropped: history.length - window.length,
    });

    return this.dispatch(window, config);
  }

  private dispatch(window: Message[], config: ModelConfig): FragmentStream {
    switch (config.backendKind) {
      case 'openai':
      case 'anthropic': {
        logger.debug('Formatting prompt', { template: this.chatTemplate.getName() });
        return this.adapters[config.backendKind].stream(this.chatTemplate.formatPrompt(window), config);
      }
      case 'ollama':
        logger.debug('Formatting prompt', { template: this.transcriptTemplate.getName() });
        return this.adapters.ollama.stream(this.transcriptTemplate.formatPrompt(window), config);
    }
  }
}
