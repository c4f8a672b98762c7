/**
 * Asks `mountpoint -q <path>` whether a path is an active
 * mount point. Exit 0 means mounted, any other exit means not mounted.
 * If the probe itself fails the answer is `unknown`, which isMounted()
 * reports as not mounted.
 */
import { DEFAULT_TOOLS, PROBE_TIMEOUT } from '../infrastructure/Config.js';
import { logger } from '../infrastructure/Logger.js';
import type { IMountProbe, ProbeResult } from '../interfaces/mount-probe.js';
import type { IProcessRunner } from '../interfaces/process-runner.js';
import { ProcessRunner } from './ProcessRunner.js';

export class MountpointProbe implements IMountProbe {
  constructor(
    private readonly runner: IProcessRunner = new ProcessRunner(),
    private readonly timeoutMs: number = PROBE_TIMEOUT,
    private readonly bin: string = DEFAULT_TOOLS.mountpoint,
  ) {}

  async probe(mountPoint: string): Promise<ProbeResult> {
    try {
      const result = await this.runner.run([this.bin, '-q', mountPoint], this.timeoutMs);
      switch (result.kind) {
        case 'exited':
          return result.exitCode === 0 ? 'mounted' : 'unmounted';
        case 'timeout':
          logger.debug({ mountPoint, timeoutMs: this.timeoutMs }, 'Mount probe timed out');
          return 'unknown';
        case 'spawn-error':
          logger.debug({ mountPoint, error: result.message }, 'Mount probe could not run');
          return 'unknown';
      }
    } catch (err) {
      logger.debug({ mountPoint, err }, 'Mount probe failed');
      return 'unknown';
    }
  }

  async isMounted(mountPoint: string): Promise<boolean> {
    return (await this.probe(mountPoint)) === 'mounted';
  }
}
