/**
 * MountOperator — performs single mount and unmount attempts for a
 * connection. Every attempt holds the lock for its mount point for its
 * whole duration, timeout window included. Results come back as
 * OperationOutcome; tool and OS failures are never thrown.
 */
import fs from 'fs';

import { mountLockKey, resolveMountPoint } from '../connections/paths.js';
import type { ConnectionDefinition } from '../connections/types.js';
import { mountTargetProblems } from '../connections/validation.js';
import { TimeoutConfig } from '../infrastructure/Config.js';
import { KeyedLock } from '../infrastructure/lock.js';
import { logger } from '../infrastructure/Logger.js';
import type { IMountProbe, ProbeResult } from '../interfaces/mount-probe.js';
import { diagnosticOf, succeeded } from '../interfaces/process-runner.js';
import type { IProcessRunner, RunResult } from '../interfaces/process-runner.js';
import { SshfsCommandBuilder } from './MountCommandBuilder.js';
import { MountpointProbe } from './MountProbe.js';
import { ProcessRunner } from './ProcessRunner.js';
import { failedWith, succeededWith } from './types.js';
import type { OperationOutcome } from './types.js';

export interface MountOperatorDeps {
  runner?: IProcessRunner;
  probe?: IMountProbe;
  commands?: SshfsCommandBuilder;
  timeouts?: TimeoutConfig;
  locks?: KeyedLock;
}

export class MountOperator {
  readonly locks: KeyedLock;
  readonly probe: IMountProbe;
  private readonly runner: IProcessRunner;
  private readonly commands: SshfsCommandBuilder;
  private readonly timeouts: TimeoutConfig;

  constructor(deps?: MountOperatorDeps) {
    this.runner = deps?.runner ?? new ProcessRunner();
    this.timeouts = deps?.timeouts ?? new TimeoutConfig();
    this.probe = deps?.probe ?? new MountpointProbe(this.runner, this.timeouts.probeTimeout);
    this.commands = deps?.commands ?? new SshfsCommandBuilder();
    this.locks = deps?.locks ?? new KeyedLock();
  }

  /** True while a mount, unmount or locked probe holds this connection's mount point. */
  isBusy(connection: ConnectionDefinition): boolean {
    return this.locks.isLocked(mountLockKey(connection));
  }

  /** Run `fn` while holding the mount-point lock for `connection`. */
  withLock<T>(connection: ConnectionDefinition, fn: () => Promise<T>): Promise<T> {
    return this.locks.run(mountLockKey(connection), fn);
  }

  /** Whether the mount tool is on PATH. */
  async checkToolInstalled(): Promise<boolean> {
    const result = await this.runner.run(
      this.commands.presenceCheckCommand(),
      this.timeouts.probeTimeout,
    );
    return succeeded(result);
  }

  mount(connection: ConnectionDefinition): Promise<OperationOutcome> {
    const invalid = refuseMount(connection);
    if (invalid) return Promise.resolve(invalid);
    return this.withLock(connection, () => this.mountLocked(connection));
  }

  unmount(connection: ConnectionDefinition): Promise<OperationOutcome> {
    const invalid = refuseUnmount(connection);
    if (invalid) return Promise.resolve(invalid);
    return this.withLock(connection, () => this.unmountLocked(connection));
  }

  /** Unmount if mounted, otherwise mount. The check and the action share one lock hold. */
  toggle(connection: ConnectionDefinition): Promise<OperationOutcome> {
    const invalid = refuseUnmount(connection);
    if (invalid) return Promise.resolve(invalid);
    return this.withLock(connection, async () => {
      const state = await this.probe.probe(resolveMountPoint(connection));
      if (state === 'mounted') return this.unmountLocked(connection);
      return refuseMount(connection) ?? this.mountLocked(connection);
    });
  }

  /** Current mount state, read while holding the mount-point lock. */
  observe(connection: ConnectionDefinition): Promise<ProbeResult> {
    return this.withLock(connection, () => this.probe.probe(resolveMountPoint(connection)));
  }

  // --- Private: attempts (lock held) ---

  private async mountLocked(connection: ConnectionDefinition): Promise<OperationOutcome> {
    const mountPoint = resolveMountPoint(connection);

    try {
      fs.mkdirSync(mountPoint, { recursive: true });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      logger.error({ id: connection.id, mountPoint, err }, 'Failed to create mount point');
      return failedWith('MountPointCreationFailed', `Failed to create mount point: ${reason}`);
    }

    // Whatever holds the path may not be this connection.
    const before = await this.probe.probe(mountPoint);
    if (before === 'mounted') {
      logger.info({ id: connection.id, mountPoint }, 'Mount point already in use');
      return { ...failedWith('AlreadyMounted', 'Mount point is already in use'), observed: before };
    }

    const command = this.commands.mountCommand(connection);
    logger.info(
      { id: connection.id, name: connection.name, mountPoint, probe: before },
      'Mounting connection',
    );
    logger.debug({ command: command.join(' ') }, 'Mount command');

    const result = await this.runner.run(command, this.timeouts.mountTimeout);
    const outcome = this.classifyMount(result);

    if (outcome.success || outcome.failure === 'TimedOut') {
      // A timed-out sshfs may still have mounted; report what the OS says.
      outcome.observed = await this.probe.probe(mountPoint);
      logger.info({ id: connection.id, mountPoint, state: outcome.observed }, 'Post-mount probe');
    }
    if (!outcome.success) {
      logger.warn({ id: connection.id, mountPoint, message: outcome.message }, 'Mount failed');
    }
    return outcome;
  }

  private classifyMount(result: RunResult): OperationOutcome {
    switch (result.kind) {
      case 'exited':
        return result.exitCode === 0
          ? succeededWith('Successfully mounted')
          : failedWith('ToolExecutionFailed', `Mount failed: ${diagnosticOf(result)}`);
      case 'timeout':
        return failedWith(
          'TimedOut',
          `Mount operation timed out (${TimeoutConfig.label(this.timeouts.mountTimeout)})`,
        );
      case 'spawn-error':
        return failedWith('SpawnFailed', `Mount error: ${result.message}`);
    }
  }

  private async unmountLocked(connection: ConnectionDefinition): Promise<OperationOutcome> {
    const mountPoint = resolveMountPoint(connection);

    const before = await this.probe.probe(mountPoint);
    if (before !== 'mounted') {
      return { ...succeededWith('Not mounted'), observed: before, skipped: true };
    }

    logger.info({ id: connection.id, name: connection.name, mountPoint }, 'Unmounting connection');

    const graceful = await this.runner.run(
      this.commands.gracefulUnmountCommand(mountPoint),
      this.timeouts.unmountTimeout,
    );
    if (succeeded(graceful)) {
      return succeededWith('Successfully unmounted');
    }
    // Only the fallback's diagnostic is reported; the first one is logged and dropped.
    logger.debug(
      { id: connection.id, kind: graceful.kind, diagnostic: diagnosticOf(graceful) },
      'Graceful unmount failed, falling back',
    );

    const fallback = await this.runner.run(
      this.commands.fallbackUnmountCommand(mountPoint),
      this.timeouts.unmountTimeout,
    );
    const outcome = this.classifyUnmount(fallback);
    if (!outcome.success) {
      logger.warn({ id: connection.id, mountPoint, message: outcome.message }, 'Unmount failed');
    }
    return outcome;
  }

  private classifyUnmount(result: RunResult): OperationOutcome {
    switch (result.kind) {
      case 'exited':
        return result.exitCode === 0
          ? succeededWith('Successfully unmounted')
          : failedWith('ToolExecutionFailed', `Unmount failed: ${diagnosticOf(result)}`);
      case 'timeout':
        return failedWith('TimedOut', 'Unmount operation timed out');
      case 'spawn-error':
        return failedWith('SpawnFailed', `Unmount error: ${result.message}`);
    }
  }
}

function refuseMount(connection: ConnectionDefinition): OperationOutcome | undefined {
  const problems = mountTargetProblems(connection);
  if (problems.length === 0) return undefined;
  logger.warn({ id: connection.id, problems }, 'Refusing to mount invalid connection');
  return failedWith('InvalidDefinition', `Invalid connection definition: ${problems.join('; ')}`);
}

function refuseUnmount(connection: ConnectionDefinition): OperationOutcome | undefined {
  if (connection.localMountPoint.trim()) return undefined;
  return failedWith('InvalidDefinition', 'Invalid connection definition: local mount point is required');
}
