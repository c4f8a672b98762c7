import BetterSqlite3 from 'better-sqlite3';

import { fromRecord, toRecord } from '../connections/connection-codec.js';
import type { ConnectionDefinition, ConnectionInput } from '../connections/types.js';
import type { IConnectionRepository } from '../interfaces/connection-repository.js';

interface ConnectionRow {
  id: string;
  position: number;
  name: string;
  host: string;
  port: number | null;
  username: string;
  remote_path: string | null;
  local_mount_point: string;
  ssh_key: string | null;
  extra_options: string | null;
}

export class ConnectionRepository implements IConnectionRepository {
  constructor(private db: BetterSqlite3.Database) {}

  load(): ConnectionInput[] {
    const rows = this.db
      .prepare<[], ConnectionRow>('SELECT * FROM connections ORDER BY position')
      .all();
    // Nullable columns fall back to the record defaults (port 22, remote path "/").
    return rows.map(({ position: _position, ...record }) => fromRecord(record));
  }

  /** Replace the stored list with `connections`, in order, atomically. */
  save(connections: readonly ConnectionDefinition[]): void {
    const insert = this.db.prepare(
      `INSERT INTO connections (id, position, name, host, port, username, remote_path, local_mount_point, ssh_key, extra_options)
       VALUES (@id, @position, @name, @host, @port, @username, @remote_path, @local_mount_point, @ssh_key, @extra_options)`,
    );
    const replaceAll = this.db.transaction((items: readonly ConnectionDefinition[]) => {
      this.db.prepare('DELETE FROM connections').run();
      items.forEach((connection, position) => {
        insert.run({ ...toRecord(connection), position });
      });
    });
    replaceAll(connections);
  }

  count(): number {
    const row = this.db
      .prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM connections')
      .get();
    return row?.n ?? 0;
  }
}
