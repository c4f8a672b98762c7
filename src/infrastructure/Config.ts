import os from 'os';
import path from 'path';

import { readEnvFile } from './env.js';

// Values come from process.env, then the .env file, then the defaults below.
const envConfig = readEnvFile([
  'MOUNT_STORE_PATH',
  'LEGACY_CONFIG_PATH',
  'STATUS_POLL_INTERVAL',
  'MOUNT_TIMEOUT',
  'UNMOUNT_TIMEOUT',
  'PROBE_TIMEOUT',
  'SSHFS_BIN',
  'FUSERMOUNT_BIN',
  'UMOUNT_BIN',
  'MOUNTPOINT_BIN',
]);

function setting(key: string): string | undefined {
  return process.env[key] || envConfig[key];
}

function positiveInt(key: string, fallback: number): number {
  const raw = setting(key);
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

const HOME_DIR = os.homedir();

/** SQLite file holding the connection definitions. */
export const MOUNT_STORE_PATH =
  setting('MOUNT_STORE_PATH') ||
  path.join(HOME_DIR, '.config', 'sshmount', 'connections.db');

/** Legacy JSON connection list (sshfs-gui format), the default for import. */
export const LEGACY_CONFIG_PATH =
  setting('LEGACY_CONFIG_PATH') ||
  path.join(HOME_DIR, '.config', 'sshfs-gui', 'connections.json');

export const STATUS_POLL_INTERVAL = positiveInt('STATUS_POLL_INTERVAL', 5000);
export const MOUNT_TIMEOUT = positiveInt('MOUNT_TIMEOUT', 30_000);
export const UNMOUNT_TIMEOUT = positiveInt('UNMOUNT_TIMEOUT', 10_000);
export const PROBE_TIMEOUT = positiveInt('PROBE_TIMEOUT', 3000);

/** How long a timed-out child gets between SIGTERM and SIGKILL, and again before it is abandoned. */
export const KILL_GRACE_PERIOD = 2000;
export const MAX_TOOL_OUTPUT_SIZE = 1024 * 1024;

export interface ToolPaths {
  readonly sshfs: string;
  readonly fusermount: string;
  readonly umount: string;
  readonly mountpoint: string;
  readonly which: string;
}

export const DEFAULT_TOOLS: ToolPaths = {
  sshfs: setting('SSHFS_BIN') || 'sshfs',
  fusermount: setting('FUSERMOUNT_BIN') || 'fusermount',
  umount: setting('UMOUNT_BIN') || 'umount',
  mountpoint: setting('MOUNTPOINT_BIN') || 'mountpoint',
  which: 'which',
};

// --- Timeout configuration ---

export class TimeoutConfig {
  readonly mountTimeout: number;
  readonly unmountTimeout: number;
  readonly probeTimeout: number;

  constructor(
    mountTimeout: number = MOUNT_TIMEOUT,
    unmountTimeout: number = UNMOUNT_TIMEOUT,
    probeTimeout: number = PROBE_TIMEOUT,
  ) {
    this.mountTimeout = mountTimeout;
    this.unmountTimeout = unmountTimeout;
    this.probeTimeout = probeTimeout;
  }

  /** Whole seconds, as shown in timeout messages ("30s"). */
  static label(timeoutMs: number): string {
    return `${Math.max(1, Math.round(timeoutMs / 1000))}s`;
  }

  /**
   * Derive a config whose probe timeout fits inside one polling interval,
   * so a hung probe cannot overlap the next reconciliation cycle.
   */
  forPollInterval(intervalMs: number): TimeoutConfig {
    const ceiling = Math.max(500, intervalMs - 500);
    return new TimeoutConfig(
      this.mountTimeout,
      this.unmountTimeout,
      Math.min(this.probeTimeout, ceiling),
    );
  }
}
