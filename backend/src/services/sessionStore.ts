import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import type { Message } from '../../../shared/types.js';
import { config } from '../config/app.js';
import { componentLogger } from '../utils/logger.js';

const log = componentLogger('session-store');

export interface SessionSnapshot {
  sessionId: string;
  messages: Message[];
  updatedAt: string;
}

const StoredMessageValidator = z.object({
  role: z.enum(['user', 'agent']),
  content: z.string(),
  timestamp: z.string(),
  metadata: z
    .object({
      turnId: z.string(),
      retries: z.number().int().nonnegative(),
      lowConfidence: z.boolean(),
      validationSource: z.enum(['judge', 'fallback'])
    })
    .optional()
});

const StoredTranscriptValidator = z.array(StoredMessageValidator);

interface TranscriptRow {
  session_id: string;
  messages: string;
  updated_at: string;
}

function ensureDirectory(path: string) {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/**
 * Committed transcripts keyed by session id. Falls back to an in-process map
 * when the SQLite file cannot be opened.
 */
export class SessionStore {
  private db: Database.Database | null = null;
  private fallback: Map<string, SessionSnapshot> | null = null;

  constructor(dbPath: string = config.SESSION_DB_PATH) {
    try {
      if (dbPath === ':memory:') {
        this.db = new Database(dbPath);
      } else {
        const absolute = resolve(dbPath);
        ensureDirectory(absolute);
        this.db = new Database(absolute);
        this.db.pragma('journal_mode = WAL');
      }
      this.initialize();
    } catch (error) {
      log.warn({ err: error }, 'falling back to in-memory session storage');
      this.db = null;
      this.fallback = new Map();
    }
  }

  private initialize() {
    this.db?.exec(`
      CREATE TABLE IF NOT EXISTS session_transcripts (
        session_id TEXT PRIMARY KEY,
        messages TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
  }

  saveTranscript(sessionId: string, messages: readonly Message[]): void {
    if (!sessionId.trim()) {
      return;
    }

    const updatedAt = new Date().toISOString();

    if (this.fallback) {
      this.fallback.set(sessionId, { sessionId, messages: [...messages], updatedAt });
      return;
    }

    this.db
      ?.prepare<{ sessionId: string; messages: string; updatedAt: string }>(
        `
          INSERT INTO session_transcripts (session_id, messages, updated_at)
          VALUES (@sessionId, @messages, @updatedAt)
          ON CONFLICT(session_id) DO UPDATE SET
            messages = excluded.messages,
            updated_at = excluded.updated_at
        `
      )
      .run({ sessionId, messages: JSON.stringify(messages), updatedAt });
  }

  loadTranscript(sessionId: string): SessionSnapshot | null {
    if (!sessionId.trim()) {
      return null;
    }

    if (this.fallback) {
      return this.fallback.get(sessionId) ?? null;
    }

    const row = this.db
      ?.prepare<[string], TranscriptRow>(`SELECT session_id, messages, updated_at FROM session_transcripts WHERE session_id = ?`)
      .get(sessionId);

    if (!row) {
      return null;
    }

    try {
      const parsed = StoredTranscriptValidator.safeParse(JSON.parse(row.messages));
      if (!parsed.success) {
        log.warn({ sessionId, issues: parsed.error.issues.length }, 'stored transcript failed validation');
        return null;
      }
      return { sessionId: row.session_id, messages: parsed.data, updatedAt: row.updated_at };
    } catch (error) {
      log.warn({ sessionId, err: error }, 'failed to parse stored transcript');
      return null;
    }
  }

  removeSession(sessionId: string): void {
    if (!sessionId.trim()) {
      return;
    }

    if (this.fallback) {
      this.fallback.delete(sessionId);
      return;
    }

    this.db?.prepare<[string]>(`DELETE FROM session_transcripts WHERE session_id = ?`).run(sessionId);
  }

  clearAll(): void {
    if (this.fallback) {
      this.fallback.clear();
      return;
    }

    this.db?.exec(`DELETE FROM session_transcripts;`);
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }
}

let sharedStore: SessionStore | null = null;

export function getSessionStore(): SessionStore {
  if (!sharedStore) {
    sharedStore = new SessionStore();
  }
  return sharedStore;
}
