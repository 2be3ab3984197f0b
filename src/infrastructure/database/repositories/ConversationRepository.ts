import Database from 'better-sqlite3';
import { IConversationRepository } from '../../../core/interfaces/IConversationRepository.js';
import { MessageRole, Session, StoredEntry, isMessageRole } from '../../../core/entities/Conversation.js';

interface EntryRow {
  id: number;
  session_id: number;
  role: string;
  content: string;
  model_name: string | null;
  created_at: string;
}

interface SessionRow {
  id: number;
  name: string;
  created_at: string;
}

/**
 * SQLite implementation of conversation repository.
 * Timestamps are stored as ISO-8601 UTC strings, which sort as text.
 */
export class ConversationRepository implements IConversationRepository {
  constructor(
    private db: Database.Database,
    private now: () => Date = () => new Date()
  ) {}

  append(role: MessageRole, content: string, sessionId: number, model?: string): void {
    const stmt = this.db.prepare(`
      INSERT INTO conversation_entries (session_id, role, content, model_name, created_at)
      VALUES (?, ?, ?, ?, ?)
    `);

    stmt.run(sessionId, role, content, model || null, this.now().toISOString());
  }

  recentEntries(sessionId: number, since: Date): StoredEntry[] {
    const stmt = this.db.prepare(`
      SELECT * FROM conversation_entries
      WHERE session_id = ? AND created_at >= ?
      ORDER BY id
    `);

    const rows = stmt.all(sessionId, since.toISOString()) as EntryRow[];
    return rows.map(toEntry);
  }

  deleteEntry(entryId: number): void {
    this.db.prepare('DELETE FROM conversation_entries WHERE id = ?').run(entryId);
  }

  createSession(name: string): number {
    const result = this.db
      .prepare('INSERT INTO sessions (name, created_at) VALUES (?, ?)')
      .run(name, this.now().toISOString());
    return Number(result.lastInsertRowid);
  }

  findSession(name: string): Session | null {
    const row = this.db.prepare('SELECT * FROM sessions WHERE name = ?').get(name) as
      | SessionRow
      | undefined;
    return row ? toSession(row) : null;
  }

  getSession(sessionId: number): Session | null {
    const row = this.db.prepare('SELECT * FROM sessions WHERE id = ?').get(sessionId) as
      | SessionRow
      | undefined;
    return row ? toSession(row) : null;
  }

  getLastSession(offset: number = 0): Session | null {
    const row = this.db
      .prepare('SELECT * FROM sessions ORDER BY created_at DESC, id DESC LIMIT 1 OFFSET ?')
      .get(offset) as SessionRow | undefined;
    return row ? toSession(row) : null;
  }

  renameSession(sessionId: number, name: string): void {
    this.db.prepare('UPDATE sessions SET name = ? WHERE id = ?').run(name, sessionId);
  }

  listSessions(): Session[] {
    const rows = this.db
      .prepare('SELECT * FROM sessions ORDER BY created_at DESC, id DESC')
      .all() as SessionRow[];
    return rows.map(toSession);
  }
}

function toEntry(row: EntryRow): StoredEntry {
  if (!isMessageRole(row.role)) {
    throw new Error(`Entry ${row.id} has unknown role "${row.role}"`);
  }
  return {
    id: row.id,
    sessionId: row.session_id,
    role: row.role,
    content: row.content,
    ...(row.model_name ? { model: row.model_name } : {}),
    createdAt: new Date(row.created_at),
  };
}

function toSession(row: SessionRow): Session {
  return {
    id: row.id,
    name: row.name,
    createdAt: new Date(row.created_at),
  };
}
