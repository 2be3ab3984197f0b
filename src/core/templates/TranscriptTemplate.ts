import { Message } from '../entities/Conversation.js';
import { GeneratePayload, PromptTemplate } from './types.js';

/**
 * Plain-text template for completion endpoints without a messages API
 *
 * Format, one line per message:
 * user: question 1
 * assistant: response 1
 * user: question 2
 */
export class TranscriptTemplate implements PromptTemplate<GeneratePayload> {
  formatPrompt(messages: readonly Message[]): GeneratePayload {
    let prompt = '';
    messages.forEach((msg) => {
      prompt += `${msg.role}: ${msg.content}\n`;
    });

    return {
      type: 'generate',
      prompt,
    };
  }

  getName(): string {
    return 'Transcript (role: content)';
  }
}
