/**
 * ProcessRunner — spawns external tools (sshfs, fusermount, mountpoint)
 * without a shell and enforces a hard timeout on every run.
 */
import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';

import { KILL_GRACE_PERIOD, MAX_TOOL_OUTPUT_SIZE } from '../infrastructure/Config.js';
import { logger } from '../infrastructure/Logger.js';
import type { IProcessRunner, RunResult } from '../interfaces/process-runner.js';

export interface ProcessRunnerOptions {
  /** Delay between SIGTERM and SIGKILL, and between SIGKILL and giving up on the child. */
  killGracePeriod?: number;
  maxOutputSize?: number;
}

export class ProcessRunner implements IProcessRunner {
  private readonly killGracePeriod: number;
  private readonly maxOutputSize: number;

  constructor(opts?: ProcessRunnerOptions) {
    this.killGracePeriod = opts?.killGracePeriod ?? KILL_GRACE_PERIOD;
    this.maxOutputSize = opts?.maxOutputSize ?? MAX_TOOL_OUTPUT_SIZE;
  }

  run(command: readonly string[], timeoutMs: number): Promise<RunResult> {
    const [bin, ...args] = command;
    if (!bin) {
      return Promise.resolve({ kind: 'spawn-error', message: 'Empty command' });
    }

    const startTime = Date.now();

    return new Promise((resolve) => {
      let child: ChildProcess;
      try {
        child = spawn(bin, args, { stdio: ['ignore', 'pipe', 'pipe'] });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ bin, err }, 'Failed to spawn command');
        resolve({ kind: 'spawn-error', message });
        return;
      }

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;
      let escalation: ReturnType<typeof setTimeout> | null = null;

      const capped = (current: string, chunk: string, stream: string): string => {
        const remaining = this.maxOutputSize - current.length;
        if (remaining <= 0) return current;
        if (chunk.length > remaining) {
          logger.warn({ bin, stream, size: this.maxOutputSize }, 'Command output truncated due to size limit');
          return current + chunk.slice(0, remaining);
        }
        return current + chunk;
      };

      child.stdout?.on('data', (data: Buffer | string) => {
        stdout = capped(stdout, data.toString(), 'stdout');
      });
      child.stderr?.on('data', (data: Buffer | string) => {
        stderr = capped(stderr, data.toString(), 'stderr');
      });

      const finish = (result: RunResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        if (escalation) clearTimeout(escalation);
        resolve(result);
      };

      // SIGTERM, then SIGKILL, then stop waiting. The promise always settles
      // within timeoutMs + 2 * killGracePeriod even if the child is stuck in
      // uninterruptible I/O (a hung FUSE mount can do that).
      const onTimeout = () => {
        timedOut = true;
        logger.warn({ bin, timeoutMs }, 'Command timed out, terminating');
        child.kill('SIGTERM');
        escalation = setTimeout(() => {
          logger.warn({ bin, pid: child.pid }, 'Command ignored SIGTERM, force killing');
          child.kill('SIGKILL');
          escalation = setTimeout(() => {
            logger.error({ bin, pid: child.pid }, 'Command did not exit after SIGKILL, abandoning it');
            child.unref();
            finish({ kind: 'timeout', timeoutMs, stdout, stderr });
          }, this.killGracePeriod);
        }, this.killGracePeriod);
      };

      const timeout = setTimeout(onTimeout, timeoutMs);

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        const duration = Date.now() - startTime;
        if (timedOut) {
          logger.debug({ bin, duration, signal }, 'Timed-out command exited');
          finish({ kind: 'timeout', timeoutMs, stdout, stderr });
          return;
        }
        logger.debug({ bin, code, signal, duration }, 'Command exited');
        finish({ kind: 'exited', exitCode: code, signal, stdout, stderr });
      });

      child.on('error', (err: Error) => {
        if (timedOut) {
          logger.warn({ bin, err }, 'Failed to signal timed-out command');
          return;
        }
        logger.debug({ bin, err }, 'Command spawn error');
        finish({ kind: 'spawn-error', message: err.message });
      });
    });
  }
}
