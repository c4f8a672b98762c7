import fs from 'fs';
import path from 'path';

import { fromRecord, toRecord } from '../connections/connection-codec.js';
import type { ConnectionDefinition, ConnectionInput } from '../connections/types.js';
import type { IConnectionRepository } from '../interfaces/connection-repository.js';

/**
 * The legacy sshfs-gui connection list
 * (`~/.config/sshfs-gui/connections.json`): an array of records,
 * pretty-printed with two-space indent.
 */
export class JsonConnectionFile implements IConnectionRepository {
  constructor(readonly filePath: string) {}

  /** A missing file is an empty list; a malformed one is an error. */
  load(): ConnectionInput[] {
    if (!fs.existsSync(this.filePath)) return [];

    const raw = fs.readFileSync(this.filePath, 'utf-8');
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new Error(
        `${this.filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    if (!Array.isArray(data)) {
      throw new Error(`${this.filePath} must contain a JSON array of connections`);
    }
    return data.map((record) => fromRecord(record));
  }

  save(connections: readonly ConnectionDefinition[]): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(connections.map(toRecord), null, 2) + '\n');
    fs.renameSync(tmpPath, this.filePath);
  }
}
