import fs from 'fs';
import os from 'os';
import path from 'path';

import type { ConnectionDefinition } from '../connections/types.js';

export function makeConnection(
  overrides: Partial<ConnectionDefinition> = {},
): ConnectionDefinition {
  return {
    id: 'conn-1',
    name: 'home',
    host: 'h.example.com',
    port: 22,
    username: 'alice',
    remotePath: '/home/alice',
    localMountPoint: '/mnt/home',
    identityFile: '',
    extraArgs: [],
    ...overrides,
  };
}

/** Fresh temp directory; callers remove it in afterEach. */
export function makeTempDir(prefix = 'sshmount-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}
