/**
 * Conversation domain entities
 */
export type MessageRole = 'user' | 'assistant' | 'system';

export const MESSAGE_ROLES: readonly MessageRole[] = ['user', 'assistant', 'system'];

export interface Message {
  readonly role: MessageRole;
  readonly content: string;
}

/**
 * A message as the storage collaborator returns it, in creation order
 */
export interface StoredEntry extends Message {
  readonly id: number;
  readonly sessionId: number;
  readonly model?: string;
  readonly createdAt: Date;
}

export interface Session {
  id: number;
  name: string;
  createdAt: Date;
}

/**
 * Owned by the driving loop. Switching model produces a new state.
 */
export interface ConversationState {
  readonly modelName: string;
  readonly maxTokens: number;
  readonly sessionId: number;
}

export type TurnStatus =
  | 'idle'
  | 'windowing'
  | 'dispatching'
  | 'streaming'
  | 'completed'
  | 'failed';

export function isMessageRole(value: string): value is MessageRole {
  return (MESSAGE_ROLES as readonly string[]).includes(value);
}
