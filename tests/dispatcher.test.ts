/**
 * Tests for history dispatch to the backend adapters
 */

import { ChatDispatcher } from '../src/application/services/ChatDispatcher.js';
import { BackendRegistry } from '../src/core/registry/BackendRegistry.js';
import { Message } from '../src/core/entities/Conversation.js';
import { ModelConfig } from '../src/core/entities/Model.js';
import { ChatPayload, GeneratePayload } from '../src/core/templates/types.js';
import { FragmentStream } from '../src/core/stream/FragmentStream.js';
import { ConfigError, EmptyHistoryError } from '../src/core/errors.js';

function createAdapters() {
  return {
    openai: {
      kind: 'openai' as const,
      stream: jest.fn((_payload: ChatPayload, _model: ModelConfig) => FragmentStream.of(['from openai'])),
    },
    anthropic: {
      kind: 'anthropic' as const,
      stream: jest.fn((_payload: ChatPayload, _model: ModelConfig) => FragmentStream.of(['from anthropic'])),
    },
    ollama: {
      kind: 'ollama' as const,
      stream: jest.fn((_payload: GeneratePayload, _model: ModelConfig) => FragmentStream.of(['from ollama'])),
    },
  };
}

const registry = new BackendRegistry({
  'gpt-4o': { backend: 'openai', maxTokens: 8000 },
  small: { backend: 'anthropic', maxTokens: 5 },
  tiny: { backend: 'openai', maxTokens: 2 },
  llama3: { backend: 'ollama', maxTokens: 4000 },
});

const history: Message[] = [
  { role: 'user', content: 'abcd' },
  { role: 'assistant', content: 'hi' },
  { role: 'user', content: 'abcd' },
];

describe('ChatDispatcher', () => {
  let adapters: ReturnType<typeof createAdapters>;
  let dispatcher: ChatDispatcher;

  beforeEach(() => {
    adapters = createAdapters();
    dispatcher = new ChatDispatcher(registry, adapters);
  });

  test('should send structured messages to openai', async () => {
    const stream = dispatcher.respond(history, 'gpt-4o');

    expect(await stream.collect()).toBe('from openai');
    expect(adapters.openai.stream).toHaveBeenCalledWith(
      { type: 'chat', messages: history },
      { modelName: 'gpt-4o', backendKind: 'openai', maxTokens: 8000 }
    );
  });

  test('should send only the window that fits', () => {
    dispatcher.respond(history, 'small');

    expect(adapters.anthropic.stream).toHaveBeenCalledWith(
      {
        type: 'chat',
        messages: [
          { role: 'assistant', content: 'hi' },
          { role: 'user', content: 'abcd' },
        ],
      },
      registry.lookup('small')
    );
  });

  test('should flatten the window into a transcript for ollama', () => {
    dispatcher.respond(
      [
        { role: 'user', content: 'Hi' },
        { role: 'assistant', content: 'Hello' },
        { role: 'user', content: 'How are you?' },
      ],
      'llama3'
    );

    expect(adapters.ollama.stream).toHaveBeenCalledWith(
      { type: 'generate', prompt: 'user: Hi\nassistant: Hello\nuser: How are you?\n' },
      registry.lookup('llama3')
    );
  });

  test('should throw EmptyHistoryError for an empty history without contacting a backend', () => {
    expect(() => dispatcher.respond([], 'gpt-4o')).toThrow(new EmptyHistoryError('Conversation history is empty'));
    expect(adapters.openai.stream).not.toHaveBeenCalled();
  });

  test('should throw EmptyHistoryError when the newest message alone is too long', () => {
    expect(() => dispatcher.respond([{ role: 'user', content: 'this will not fit' }], 'tiny')).toThrow(
      'The most recent message does not fit in the 2 token window of tiny'
    );
    expect(adapters.openai.stream).not.toHaveBeenCalled();
  });

  test('should throw ConfigError for an unknown model', () => {
    expect(() => dispatcher.respond(history, 'nope')).toThrow(ConfigError);
  });
});
