/**
 * Session Store - Storage Abstraction Layer
 *
 * Server-side session records keyed by a random token. A session stays valid
 * until either its absolute duration or its inactivity timeout runs out;
 * every successful validation moves `last_activity` forward.
 *
 * Implementations: in-memory, one JSON file per session, or SQLite.
 *
 * @module vipervault/session-store
 */

import * as crypto from 'crypto';
import { mkdir, readdir, readFile, writeFile, chmod, unlink } from 'fs/promises';
import * as path from 'path';
import Database from 'better-sqlite3';
import type { SessionStoreConfig, VaultConfig } from './config';

// ============================================================================
// Types
// ============================================================================

/**
 * Timestamps are seconds since the epoch.
 */
export interface SessionRecord {
  created: number;
  last_activity: number;
}

/**
 * Durations in seconds.
 */
export interface SessionPolicy {
  sessionDuration: number;
  inactivityTimeout: number;
}

/** Current time in seconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now() / 1000;

/**
 * Abstract interface for session storage.
 */
export interface SessionStore {
  /**
   * Initialize the store (create directory, tables, etc.)
   */
  init(): Promise<void>;

  /**
   * Release resources held by the store.
   */
  close(): Promise<void>;

  /**
   * Create a new session and return its token. Expired sessions are
   * removed first.
   */
  create(): Promise<string>;

  /**
   * True if the token names a live session; refreshes its activity time.
   * An expired session is deleted.
   */
  validate(token: string | null | undefined): Promise<boolean>;

  /**
   * Delete a session. Unknown tokens are ignored.
   */
  destroy(token: string | null | undefined): Promise<void>;

  /**
   * Remove expired (and unreadable) sessions. Returns how many were removed.
   */
  cleanup(): Promise<number>;

  count(): Promise<number>;
}

// ============================================================================
// Helpers
// ============================================================================

const TOKEN_PATTERN = /^[A-Za-z0-9_-]{16,128}$/;

/**
 * 32 random bytes, base64url encoded (43 characters).
 */
export function generateToken(): string {
  return crypto.randomBytes(32).toString('base64url');
}

export function isWellFormedToken(token: string | null | undefined): token is string {
  return typeof token === 'string' && TOKEN_PATTERN.test(token);
}

export function isExpired(record: SessionRecord, policy: SessionPolicy, now: number): boolean {
  return now - record.created > policy.sessionDuration ||
    now - record.last_activity > policy.inactivityTimeout;
}

export function policyFromConfig(config: Pick<VaultConfig, 'session_duration' | 'inactivity_timeout'>): SessionPolicy {
  return {
    sessionDuration: config.session_duration,
    inactivityTimeout: config.inactivity_timeout
  };
}

/**
 * Missing timestamps read as 0, which makes the record expired.
 */
function toRecord(value: unknown): SessionRecord | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }
  const created = 'created' in value ? value.created : 0;
  const lastActivity = 'last_activity' in value ? value.last_activity : 0;
  if (typeof created !== 'number' || typeof lastActivity !== 'number') {
    return null;
  }
  return { created, last_activity: lastActivity };
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

// ============================================================================
// In-Memory Implementation
// ============================================================================

/**
 * In-memory session store.
 * Sessions are lost on restart. Good for testing and single-process use.
 */
export class MemorySessionStore implements SessionStore {
  private sessions: Map<string, SessionRecord> = new Map();

  constructor(
    private readonly policy: SessionPolicy,
    private readonly clock: Clock = systemClock
  ) {}

  async init(): Promise<void> {
    // No-op for memory store
  }

  async close(): Promise<void> {
    this.sessions.clear();
  }

  async create(): Promise<string> {
    await this.cleanup();
    const token = generateToken();
    const now = this.clock();
    this.sessions.set(token, { created: now, last_activity: now });
    return token;
  }

  async validate(token: string | null | undefined): Promise<boolean> {
    if (!isWellFormedToken(token)) return false;

    const record = this.sessions.get(token);
    if (!record) return false;

    const now = this.clock();
    if (isExpired(record, this.policy, now)) {
      this.sessions.delete(token);
      return false;
    }

    record.last_activity = now;
    return true;
  }

  async destroy(token: string | null | undefined): Promise<void> {
    if (token) {
      this.sessions.delete(token);
    }
  }

  async cleanup(): Promise<number> {
    const now = this.clock();
    let removed = 0;
    for (const [token, record] of this.sessions.entries()) {
      if (isExpired(record, this.policy, now)) {
        this.sessions.delete(token);
        removed++;
      }
    }
    return removed;
  }

  async count(): Promise<number> {
    return this.sessions.size;
  }
}

// ============================================================================
// File-Based Implementation
// ============================================================================

/**
 * One `<token>.json` file per session.
 * Directory is created with mode 0700 and files with mode 0600.
 *
 * Reads and writes of one token run one at a time, so a `destroy` cannot be
 * undone by a `validate` that read the file before it.
 */
export class FileSessionStore implements SessionStore {
  private readonly pending = new Map<string, Promise<void>>();

  constructor(
    private readonly dir: string,
    private readonly policy: SessionPolicy,
    private readonly clock: Clock = systemClock
  ) {}

  async init(): Promise<void> {
    await mkdir(this.dir, { recursive: true, mode: 0o700 });
  }

  async close(): Promise<void> {
    // Nothing held open
  }

  private fileFor(token: string): string {
    return path.join(this.dir, `${token}.json`);
  }

  private serialize<T>(token: string, task: () => Promise<T>): Promise<T> {
    const previous = this.pending.get(token) ?? Promise.resolve();
    const run = previous.then(task);
    const tail: Promise<void> = run.then(() => undefined, () => undefined).then(() => {
      if (this.pending.get(token) === tail) this.pending.delete(token);
    });
    this.pending.set(token, tail);
    return run;
  }

  private async write(token: string, record: SessionRecord): Promise<void> {
    const file = this.fileFor(token);
    await writeFile(file, JSON.stringify(record), { mode: 0o600 });
    await chmod(file, 0o600);
  }

  private async remove(file: string): Promise<boolean> {
    try {
      await unlink(file);
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  /**
   * `undefined` when the file does not exist, `null` when it cannot be read
   * or parsed.
   */
  private async read(file: string): Promise<SessionRecord | null | undefined> {
    let text: string;
    try {
      text = await readFile(file, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return undefined;
      return null;
    }
    try {
      return toRecord(JSON.parse(text));
    } catch {
      return null;
    }
  }

  async create(): Promise<string> {
    await this.init();
    await this.cleanup();

    const token = generateToken();
    const now = this.clock();
    await this.write(token, { created: now, last_activity: now });
    return token;
  }

  async validate(token: string | null | undefined): Promise<boolean> {
    if (!isWellFormedToken(token)) return false;

    return this.serialize(token, async () => {
      const file = this.fileFor(token);
      const record = await this.read(file);
      if (!record) return false;

      const now = this.clock();
      if (isExpired(record, this.policy, now)) {
        await this.remove(file);
        return false;
      }

      await this.write(token, { ...record, last_activity: now });
      return true;
    });
  }

  async destroy(token: string | null | undefined): Promise<void> {
    if (!isWellFormedToken(token)) return;
    await this.serialize(token, async () => {
      await this.remove(this.fileFor(token));
    });
  }

  async cleanup(): Promise<number> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return 0;
      throw err;
    }

    const now = this.clock();
    let removed = 0;

    for (const name of entries) {
      if (!name.endsWith('.json')) continue;

      const file = path.join(this.dir, name);
      const sweep = async (): Promise<boolean> => {
        const record = await this.read(file);
        if (record === undefined) return false;
        if (record !== null && !isExpired(record, this.policy, now)) return false;
        try {
          return await this.remove(file);
        } catch (err) {
          console.error(`[sessions] could not remove ${file}:`, err);
          return false;
        }
      };

      const token = name.slice(0, -'.json'.length);
      const swept = isWellFormedToken(token) ? await this.serialize(token, sweep) : await sweep();
      if (swept) removed++;
    }

    return removed;
  }

  async count(): Promise<number> {
    try {
      const entries = await readdir(this.dir);
      return entries.filter(name => name.endsWith('.json')).length;
    } catch (err) {
      if (isNotFound(err)) return 0;
      throw err;
    }
  }
}

// ============================================================================
// SQLite Implementation
// ============================================================================

interface SessionRow {
  created: number;
  last_activity: number;
}

/**
 * SQLite-backed session store.
 * Survives restarts and can be shared by several server processes.
 */
export class SqliteSessionStore implements SessionStore {
  private db: Database.Database | null = null;

  constructor(
    private readonly dbPath: string,
    private readonly policy: SessionPolicy,
    private readonly clock: Clock = systemClock
  ) {}

  private get conn(): Database.Database {
    if (!this.db) {
      throw new Error('Session store not initialized; call init() first');
    }
    return this.db;
  }

  async init(): Promise<void> {
    if (this.db) return;

    if (this.dbPath !== ':memory:') {
      await mkdir(path.dirname(this.dbPath), { recursive: true, mode: 0o700 });
    }
    this.db = new Database(this.dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sessions (
        token TEXT PRIMARY KEY,
        created REAL NOT NULL,
        last_activity REAL NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_created ON sessions(created);
    `);
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  async create(): Promise<string> {
    await this.cleanup();

    const token = generateToken();
    const now = this.clock();
    this.conn
      .prepare('INSERT INTO sessions (token, created, last_activity) VALUES (?, ?, ?)')
      .run(token, now, now);
    return token;
  }

  async validate(token: string | null | undefined): Promise<boolean> {
    if (!isWellFormedToken(token)) return false;

    const row = this.conn
      .prepare<[string], SessionRow>('SELECT created, last_activity FROM sessions WHERE token = ?')
      .get(token);
    if (!row) return false;

    const now = this.clock();
    if (isExpired(row, this.policy, now)) {
      this.conn.prepare('DELETE FROM sessions WHERE token = ?').run(token);
      return false;
    }

    this.conn.prepare('UPDATE sessions SET last_activity = ? WHERE token = ?').run(now, token);
    return true;
  }

  async destroy(token: string | null | undefined): Promise<void> {
    if (!token) return;
    this.conn.prepare('DELETE FROM sessions WHERE token = ?').run(token);
  }

  async cleanup(): Promise<number> {
    const now = this.clock();
    const result = this.conn
      .prepare('DELETE FROM sessions WHERE (? - created) > ? OR (? - last_activity) > ?')
      .run(now, this.policy.sessionDuration, now, this.policy.inactivityTimeout);
    return result.changes;
  }

  async count(): Promise<number> {
    const row = this.conn
      .prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM sessions')
      .get();
    return row ? row.n : 0;
  }
}

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Create a session store based on options.
 */
export function createSessionStore(
  options: SessionStoreConfig,
  policy: SessionPolicy,
  clock: Clock = systemClock
): SessionStore {
  switch (options.type) {
    case 'memory':
      return new MemorySessionStore(policy, clock);

    case 'sqlite':
      return new SqliteSessionStore(options.path || ':memory:', policy, clock);

    case 'file':
      if (!options.path) {
        throw new Error('File session store requires a path');
      }
      return new FileSessionStore(options.path, policy, clock);
  }
}

/**
 * Create and initialize a store.
 */
export async function initSessionStore(
  options: SessionStoreConfig,
  policy: SessionPolicy,
  clock?: Clock
): Promise<SessionStore> {
  const store = createSessionStore(options, policy, clock);
  await store.init();
  return store;
}
