import BetterSqlite3 from 'better-sqlite3';

/** Create all tables and indexes. Safe to call multiple times (IF NOT EXISTS). */
export function createSchema(db: BetterSqlite3.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS connections (
      id TEXT PRIMARY KEY,
      position INTEGER NOT NULL,
      name TEXT NOT NULL,
      host TEXT NOT NULL,
      port INTEGER,
      username TEXT NOT NULL,
      remote_path TEXT,
      local_mount_point TEXT NOT NULL,
      ssh_key TEXT,
      extra_options TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_connections_position ON connections(position);
  `);
}
