import fs from 'fs';

import { expandHome, resolveMountPoint } from '../connections/paths.js';
import type { ConnectionDefinition } from '../connections/types.js';
import { DEFAULT_TOOLS } from '../infrastructure/Config.js';
import type { ToolPaths } from '../infrastructure/Config.js';

export function remoteTarget(
  connection: Pick<ConnectionDefinition, 'username' | 'host' | 'remotePath'>,
): string {
  return `${connection.username}@${connection.host}:${connection.remotePath}`;
}

export class SshfsCommandBuilder {
  constructor(
    readonly tools: ToolPaths = DEFAULT_TOOLS,
    private readonly fileExists: (p: string) => boolean = (p) => fs.existsSync(p),
    private readonly home?: string,
  ) {}

  /**
   * `sshfs user@host:remotePath mountPoint -p port [-o IdentityFile=key] [extra...]`
   *
   * The identity option is left out when the key file does not exist, so
   * ssh can fall back to its own key or password handling. Extra args are
   * appended as given.
   */
  mountCommand(connection: ConnectionDefinition): string[] {
    const args = [
      this.tools.sshfs,
      remoteTarget(connection),
      resolveMountPoint(connection, this.home),
      '-p',
      String(connection.port),
    ];

    const identity = connection.identityFile.trim();
    if (identity) {
      const keyPath = expandHome(identity, this.home);
      if (this.fileExists(keyPath)) {
        args.push('-o', `IdentityFile=${keyPath}`);
      }
    }

    args.push(...connection.extraArgs);
    return args;
  }

  /** FUSE-aware unmount, tried first. */
  gracefulUnmountCommand(mountPoint: string): string[] {
    return [this.tools.fusermount, '-u', mountPoint];
  }

  fallbackUnmountCommand(mountPoint: string): string[] {
    return [this.tools.umount, mountPoint];
  }

  presenceCheckCommand(): string[] {
    return [this.tools.which, this.tools.sshfs];
  }
}
