import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import type { MemoryContext, MemoryMessage, MemorySummary } from '../../../shared/types.js';
import { config } from '../config/app.js';
import { KeyedMutex } from '../utils/mutex.js';
import type { Logger } from '../utils/logger.js';

type MessageRole = MemoryMessage['role'];

interface MessageRow {
  role: MessageRole;
  content: string;
  created_at: string;
}

interface SummaryRow {
  summary: string;
  updated_at: string;
}

interface CountRow {
  total: number;
}

interface StoredMessage extends MemoryMessage {
  metadata?: Record<string, unknown>;
}

interface MemoryFallbackState {
  messages: Map<string, StoredMessage[]>;
  summaries: Map<string, MemorySummary>;
}

export interface MemoryStoreOptions {
  dbPath?: string;
  summaryInterval?: number;
  logger?: Logger;
}

function isMemoryPath(dbPath: string) {
  return dbPath === ':memory:' || dbPath.startsWith('file::memory:');
}

function ensureDirectory(path: string) {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/**
 * Per-thread conversation log plus one rolling summary per thread.
 * Falls back to in-process maps when the SQLite file cannot be opened.
 */
export class MemoryStore {
  readonly summaryInterval: number;
  private db: Database.Database | null = null;
  private fallback: MemoryFallbackState | null = null;
  private readonly locks = new KeyedMutex();

  constructor(options: MemoryStoreOptions = {}) {
    const dbPath = options.dbPath ?? config.MEMORY_DB_PATH;
    this.summaryInterval = options.summaryInterval ?? config.MEMORY_SUMMARY_INTERVAL;

    try {
      const inMemory = isMemoryPath(dbPath);
      const target = inMemory ? dbPath : resolve(dbPath);
      if (!inMemory) {
        ensureDirectory(target);
      }
      this.db = new Database(target);
      if (!inMemory) {
        this.db.pragma('journal_mode = WAL');
      }
      this.initialize();
    } catch (error) {
      options.logger?.warn({ err: error }, 'MemoryStore: falling back to in-memory storage');
      this.db = null;
      this.fallback = { messages: new Map(), summaries: new Map() };
    }
  }

  private initialize() {
    if (!this.db) {
      return;
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        thread_id TEXT NOT NULL,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        created_at TEXT NOT NULL,
        metadata TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_messages_thread ON messages (thread_id, id);

      CREATE TABLE IF NOT EXISTS summaries (
        thread_id TEXT PRIMARY KEY,
        summary TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
  }

  /**
   * Runs `fn` while holding the write lock of one thread. Reads do not take
   * the lock.
   */
  withThreadLock<T>(threadId: string, fn: () => Promise<T> | T): Promise<T> {
    return this.locks.runExclusive(threadId, fn);
  }

  addMessage(threadId: string, role: MessageRole, content: string, metadata?: Record<string, unknown>): void {
    const createdAt = new Date().toISOString();

    if (this.fallback) {
      const thread = this.fallback.messages.get(threadId) ?? [];
      thread.push({ threadId, role, content, createdAt, metadata });
      this.fallback.messages.set(threadId, thread);
      return;
    }

    if (!this.db) {
      return;
    }

    this.db
      .prepare(
        `
          INSERT INTO messages (thread_id, role, content, created_at, metadata)
          VALUES (@threadId, @role, @content, @createdAt, @metadata)
        `
      )
      .run({
        threadId,
        role,
        content,
        createdAt,
        metadata: metadata ? JSON.stringify(metadata) : null
      });
  }

  /** Most recent messages of a thread, oldest first. */
  getRecent(threadId: string, limit = 8): MemoryContext['recent'] {
    if (this.fallback) {
      const thread = this.fallback.messages.get(threadId) ?? [];
      return thread.slice(-limit).map(({ role, content, createdAt }) => ({ role, content, createdAt }));
    }

    if (!this.db) {
      return [];
    }

    const rows = this.db
      .prepare<[string, number], MessageRow>(
        `
          SELECT role, content, created_at
          FROM messages
          WHERE thread_id = ?
          ORDER BY id DESC
          LIMIT ?
        `
      )
      .all(threadId, limit);

    return rows.reverse().map((row) => ({ role: row.role, content: row.content, createdAt: row.created_at }));
  }

  getSummary(threadId: string): string | null {
    if (this.fallback) {
      return this.fallback.summaries.get(threadId)?.summary ?? null;
    }

    if (!this.db) {
      return null;
    }

    const row = this.db
      .prepare<[string], SummaryRow>('SELECT summary, updated_at FROM summaries WHERE thread_id = ?')
      .get(threadId);
    return row?.summary ?? null;
  }

  setSummary(threadId: string, summary: string): void {
    const updatedAt = new Date().toISOString();

    if (this.fallback) {
      this.fallback.summaries.set(threadId, { threadId, summary, updatedAt });
      return;
    }

    if (!this.db) {
      return;
    }

    this.db
      .prepare(
        `
          INSERT INTO summaries (thread_id, summary, updated_at)
          VALUES (@threadId, @summary, @updatedAt)
          ON CONFLICT(thread_id) DO UPDATE SET
            summary = excluded.summary,
            updated_at = excluded.updated_at
        `
      )
      .run({ threadId, summary, updatedAt });
  }

  countMessages(threadId: string): number {
    if (this.fallback) {
      return this.fallback.messages.get(threadId)?.length ?? 0;
    }

    if (!this.db) {
      return 0;
    }

    const row = this.db
      .prepare<[string], CountRow>('SELECT COUNT(*) AS total FROM messages WHERE thread_id = ?')
      .get(threadId);
    return row?.total ?? 0;
  }

  shouldSummarize(threadId: string): boolean {
    const count = this.countMessages(threadId);
    return count >= this.summaryInterval && count % this.summaryInterval === 0;
  }

  getContext(threadId: string, limit = 8): MemoryContext {
    return {
      summary: this.getSummary(threadId),
      recent: this.getRecent(threadId, limit)
    };
  }

  clearThread(threadId: string): void {
    if (this.fallback) {
      this.fallback.messages.delete(threadId);
      this.fallback.summaries.delete(threadId);
      return;
    }

    if (!this.db) {
      return;
    }

    const db = this.db;
    const clear = db.transaction((id: string) => {
      db.prepare('DELETE FROM messages WHERE thread_id = ?').run(id);
      db.prepare('DELETE FROM summaries WHERE thread_id = ?').run(id);
    });
    clear(threadId);
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }

  get usingFallback(): boolean {
    return this.fallback !== null;
  }
}
