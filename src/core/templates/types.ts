import { Message } from '../entities/Conversation.js';

/**
 * Payload for backends with a structured messages API
 */
export interface ChatPayload {
  type: 'chat';
  messages: Message[];
}

/**
 * Payload for backends that take a single prompt string
 */
export interface GeneratePayload {
  type: 'generate';
  prompt: string;
}

export type PromptPayload = ChatPayload | GeneratePayload;

/**
 * Turns a windowed message list into the payload one backend family expects
 */
export interface PromptTemplate<P extends PromptPayload> {
  /**
   * @param messages - Windowed history, oldest first
   */
  formatPrompt(messages: readonly Message[]): P;

  getName(): string;
}
