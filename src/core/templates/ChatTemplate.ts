import { Message } from '../entities/Conversation.js';
import { ChatPayload, PromptTemplate } from './types.js';

/**
 * Chat template using structured messages array
 * Used for the OpenAI and Anthropic messages APIs, which apply their own
 * formatting server side.
 */
export class ChatTemplate implements PromptTemplate<ChatPayload> {
  formatPrompt(messages: readonly Message[]): ChatPayload {
    return {
      type: 'chat',
      messages: messages.map((msg) => ({ role: msg.role, content: msg.content })),
    };
  }

  getName(): string {
    return 'Chat (structured messages)';
  }
}
