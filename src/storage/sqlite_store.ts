/**
 * ObjectStore backed by a single better-sqlite3 table.
 * Every process pointed at the same file sees the same objects.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { createChildLogger } from '@/utils/logger';
import type { ObjectStore } from './types';

const logger = createChildLogger('object_store');

interface ObjectRow {
  body: string;
}

interface KeyRow {
  key: string;
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

export class SqliteObjectStore implements ObjectStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('busy_timeout = 5000');
    }
    this.db.pragma('case_sensitive_like = ON');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS objects (
        key TEXT PRIMARY KEY,
        body TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      )
    `);
    logger.debug({ dbPath }, 'Object store ready');
  }

  async put(key: string, body: string): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO objects (key, body, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET body = excluded.body, updated_at = excluded.updated_at`
      )
      .run(key, body, Date.now());
  }

  async putIfAbsent(key: string, body: string): Promise<boolean> {
    const info = this.db
      .prepare('INSERT OR IGNORE INTO objects (key, body, updated_at) VALUES (?, ?, ?)')
      .run(key, body, Date.now());
    return info.changes === 1;
  }

  async get(key: string): Promise<string | null> {
    const row = this.db
      .prepare<[string], ObjectRow>('SELECT body FROM objects WHERE key = ?')
      .get(key);
    return row?.body ?? null;
  }

  async list(prefix: string): Promise<string[]> {
    return this.db
      .prepare<[string], KeyRow>(
        "SELECT key FROM objects WHERE key LIKE ? ESCAPE '\\' ORDER BY key"
      )
      .all(`${escapeLike(prefix)}%`)
      .map((row) => row.key);
  }

  async delete(key: string): Promise<void> {
    this.db.prepare('DELETE FROM objects WHERE key = ?').run(key);
  }

  close(): void {
    this.db.close();
  }
}
