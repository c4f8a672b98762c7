import os from 'os';
import path from 'path';

import type { ConnectionDefinition } from './types.js';

/** Expand a leading `~` or `~/` to the home directory. Other paths pass through. */
export function expandHome(p: string, home: string = os.homedir()): string {
  if (p === '~') return home;
  if (p.startsWith('~/')) return path.join(home, p.slice(2));
  return p;
}

export function resolveMountPoint(
  connection: Pick<ConnectionDefinition, 'localMountPoint'>,
  home?: string,
): string {
  return expandHome(connection.localMountPoint.trim(), home);
}

/**
 * Key for the per-mount-point lock: the absolute form of the expanded path,
 * so `~/mnt/x` and `/home/me/mnt/x/` contend for the same lock.
 */
export function mountLockKey(
  connection: Pick<ConnectionDefinition, 'localMountPoint'>,
  home?: string,
): string {
  return path.resolve(resolveMountPoint(connection, home));
}
