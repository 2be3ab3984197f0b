import { MessageRole, Session, StoredEntry } from '../entities/Conversation.js';

/**
 * Interface for conversation persistence
 */
export interface IConversationRepository {
  append(role: MessageRole, content: string, sessionId: number, model?: string): void;

  /**
   * Entries of a session created at or after `since`, in creation order
   */
  recentEntries(sessionId: number, since: Date): StoredEntry[];

  deleteEntry(entryId: number): void;

  createSession(name: string): number;

  findSession(name: string): Session | null;

  getSession(sessionId: number): Session | null;

  /**
   * Most recently created session, skipping `offset` newer ones
   */
  getLastSession(offset?: number): Session | null;

  renameSession(sessionId: number, name: string): void;

  listSessions(): Session[];
}
