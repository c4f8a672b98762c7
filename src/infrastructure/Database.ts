import BetterSqlite3 from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

import { ConnectionRepository } from '../repositories/connection-repository.js';
import { createSchema } from '../repositories/schema.js';
import { MOUNT_STORE_PATH } from './Config.js';

/**
 * Owns the SQLite handle and the repositories built on it.
 * The file location is passed in at startup rather than read globally.
 */
export class AppDatabase {
  private db: BetterSqlite3.Database | null = null;
  private repo: ConnectionRepository | null = null;

  /** Open (or create) the database file. */
  init(dbPath: string = MOUNT_STORE_PATH): void {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    this.open(new BetterSqlite3(dbPath));
  }

  /** @internal For tests only. Creates a fresh in-memory database. */
  _initTest(): void {
    this.open(new BetterSqlite3(':memory:'));
  }

  get connectionRepo(): ConnectionRepository {
    if (!this.repo) {
      throw new Error('Database not initialized: call init() first');
    }
    return this.repo;
  }

  close(): void {
    this.db?.close();
    this.db = null;
    this.repo = null;
  }

  private open(db: BetterSqlite3.Database): void {
    this.close();
    db.pragma('journal_mode = WAL');
    createSchema(db);
    this.db = db;
    this.repo = new ConnectionRepository(db);
  }
}

export const database = new AppDatabase();
