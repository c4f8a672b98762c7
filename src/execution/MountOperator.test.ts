import fs from 'fs';
import path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../infrastructure/Logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import { TimeoutConfig } from '../infrastructure/Config.js';
import type { RunResult } from '../interfaces/process-runner.js';
import { exited, FakeOs, spawnError, timedOut } from '../test/fake-os.js';
import { makeConnection, makeTempDir } from '../test/fixtures.js';
import { MountOperator } from './MountOperator.js';
import { MountpointProbe } from './MountProbe.js';
import { SshfsCommandBuilder } from './MountCommandBuilder.js';

describe('MountOperator', () => {
  let tmpDir: string;
  let mountPoint: string;
  let os: FakeOs;
  let operator: MountOperator;

  beforeEach(() => {
    tmpDir = makeTempDir();
    mountPoint = path.join(tmpDir, 'mnt', 'home');
    os = new FakeOs();
    operator = new MountOperator({
      runner: os,
      probe: new MountpointProbe(os, 3000),
      commands: new SshfsCommandBuilder(undefined, () => false),
      timeouts: new TimeoutConfig(30_000, 10_000, 3000),
    });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('mount', () => {
    it('creates the mount point and mounts', async () => {
      const conn = makeConnection({ localMountPoint: mountPoint });

      const outcome = await operator.mount(conn);

      expect(outcome).toEqual({ success: true, message: 'Successfully mounted', observed: 'mounted' });
      expect(fs.statSync(mountPoint).isDirectory()).toBe(true);
      expect(os.calls.map((c) => c[0])).toEqual(['mountpoint', 'sshfs', 'mountpoint']);
      expect(os.mounted.has(mountPoint)).toBe(true);
    });

    it('reports mounted on the next probe after a successful mount', async () => {
      const conn = makeConnection({ localMountPoint: mountPoint });
      await operator.mount(conn);
      expect(await operator.probe.probe(mountPoint)).toBe('mounted');
    });

    it('refuses an occupied mount point without running sshfs', async () => {
      fs.mkdirSync(mountPoint, { recursive: true });
      os.mounted.add(mountPoint);

      const outcome = await operator.mount(makeConnection({ localMountPoint: mountPoint }));

      expect(outcome).toEqual({
        success: false,
        message: 'Mount point is already in use',
        failure: 'AlreadyMounted',
        observed: 'mounted',
      });
      expect(os.callsTo('sshfs')).toHaveLength(0);
    });

    it('reports the tool diagnostic on a non-zero exit', async () => {
      os.on('sshfs', () => exited(1, '', 'read: Connection reset by peer\n'));

      const outcome = await operator.mount(makeConnection({ localMountPoint: mountPoint }));

      expect(outcome).toEqual({
        success: false,
        message: 'Mount failed: read: Connection reset by peer',
        failure: 'ToolExecutionFailed',
      });
      expect(os.callsTo('mountpoint')).toHaveLength(1);
    });

    it('falls back to stdout, then to a generic diagnostic', async () => {
      os.on('sshfs', () => exited(1, 'bad option\n', ''));
      const fromStdout = await operator.mount(makeConnection({ localMountPoint: mountPoint }));
      expect(fromStdout.message).toBe('Mount failed: bad option');

      os.on('sshfs', () => exited(1));
      const generic = await operator.mount(makeConnection({ localMountPoint: mountPoint }));
      expect(generic.message).toBe('Mount failed: Unknown error');
    });

    it('reports a timeout and probes afterwards', async () => {
      os.on('sshfs', () => timedOut(30_000));

      const outcome = await operator.mount(makeConnection({ localMountPoint: mountPoint }));

      expect(outcome).toEqual({
        success: false,
        message: 'Mount operation timed out (30s)',
        failure: 'TimedOut',
        observed: 'unmounted',
      });
      expect(os.callsTo('mountpoint')).toHaveLength(2);
    });

    it('returns the mounted state when sshfs mounted before timing out', async () => {
      os.on('sshfs', (command) => {
        os.mounted.add(command[2] ?? '');
        return timedOut(30_000);
      });

      const outcome = await operator.mount(makeConnection({ localMountPoint: mountPoint }));

      expect(outcome.failure).toBe('TimedOut');
      expect(outcome.observed).toBe('mounted');
    });

    it('reports a spawn failure', async () => {
      os.on('sshfs', () => spawnError('spawn sshfs ENOENT'));

      const outcome = await operator.mount(makeConnection({ localMountPoint: mountPoint }));

      expect(outcome).toEqual({
        success: false,
        message: 'Mount error: spawn sshfs ENOENT',
        failure: 'SpawnFailed',
      });
    });

    it('reports a mount point that cannot be created', async () => {
      const blocker = path.join(tmpDir, 'file');
      fs.writeFileSync(blocker, 'x');

      const outcome = await operator.mount(
        makeConnection({ localMountPoint: path.join(blocker, 'mnt') }),
      );

      expect(outcome.success).toBe(false);
      expect(outcome.failure).toBe('MountPointCreationFailed');
      expect(outcome.message.startsWith('Failed to create mount point: ')).toBe(true);
      expect(os.calls).toEqual([]);
    });

    it('rejects an invalid definition before touching anything', async () => {
      const outcome = await operator.mount(
        makeConnection({ host: ' ', localMountPoint: mountPoint }),
      );

      expect(outcome).toEqual({
        success: false,
        message: 'Invalid connection definition: host is required',
        failure: 'InvalidDefinition',
      });
      expect(os.calls).toEqual([]);
      expect(fs.existsSync(mountPoint)).toBe(false);
    });
  });

  describe('unmount', () => {
    it('reports Not mounted without running any unmount tool', async () => {
      const outcome = await operator.unmount(makeConnection({ localMountPoint: mountPoint }));

      expect(outcome).toEqual({
        success: true,
        message: 'Not mounted',
        observed: 'unmounted',
        skipped: true,
      });
      expect(os.calls.map((c) => c[0])).toEqual(['mountpoint']);
    });

    it('unmounts with fusermount, then reports Not mounted the second time', async () => {
      const conn = makeConnection({ localMountPoint: mountPoint });
      await operator.mount(conn);

      const first = await operator.unmount(conn);
      const second = await operator.unmount(conn);

      expect(first).toEqual({ success: true, message: 'Successfully unmounted' });
      expect(second).toEqual({
        success: true,
        message: 'Not mounted',
        observed: 'unmounted',
        skipped: true,
      });
      expect(os.callsTo('fusermount')).toEqual([['fusermount', '-u', mountPoint]]);
      expect(os.callsTo('umount')).toHaveLength(0);
    });

    it('falls back to umount when fusermount fails', async () => {
      os.mounted.add(mountPoint);
      os.on('fusermount', () => exited(1, '', 'fusermount: entry not found'));

      const outcome = await operator.unmount(makeConnection({ localMountPoint: mountPoint }));

      expect(outcome).toEqual({ success: true, message: 'Successfully unmounted' });
      expect(os.callsTo('umount')).toEqual([['umount', mountPoint]]);
    });

    it("drops the fusermount diagnostic and reports umount's when both fail", async () => {
      os.mounted.add(mountPoint);
      os.on('fusermount', () => exited(1, '', 'fusermount: entry not found'));
      os.on('umount', () => exited(32, '', 'umount: target is busy.\n'));

      const outcome = await operator.unmount(makeConnection({ localMountPoint: mountPoint }));

      expect(outcome).toEqual({
        success: false,
        message: 'Unmount failed: umount: target is busy.',
        failure: 'ToolExecutionFailed',
      });
    });

    it('falls through to umount when fusermount times out', async () => {
      os.mounted.add(mountPoint);
      os.on('fusermount', () => timedOut(10_000));

      const outcome = await operator.unmount(makeConnection({ localMountPoint: mountPoint }));

      expect(outcome.message).toBe('Successfully unmounted');
      expect(os.callsTo('umount')).toHaveLength(1);
    });

    it('reports a fallback timeout', async () => {
      os.mounted.add(mountPoint);
      os.on('fusermount', () => exited(1));
      os.on('umount', () => timedOut(10_000));

      const outcome = await operator.unmount(makeConnection({ localMountPoint: mountPoint }));

      expect(outcome).toEqual({
        success: false,
        message: 'Unmount operation timed out',
        failure: 'TimedOut',
      });
    });

    it('reports a fallback spawn failure', async () => {
      os.mounted.add(mountPoint);
      os.on('fusermount', () => spawnError('spawn fusermount ENOENT'));
      os.on('umount', () => spawnError('spawn umount ENOENT'));

      const outcome = await operator.unmount(makeConnection({ localMountPoint: mountPoint }));

      expect(outcome).toEqual({
        success: false,
        message: 'Unmount error: spawn umount ENOENT',
        failure: 'SpawnFailed',
      });
    });
  });

  describe('toggle', () => {
    it('mounts an unmounted connection', async () => {
      const outcome = await operator.toggle(makeConnection({ localMountPoint: mountPoint }));

      expect(outcome.message).toBe('Successfully mounted');
      expect(os.mounted.has(mountPoint)).toBe(true);
    });

    it('unmounts a mounted connection', async () => {
      os.mounted.add(mountPoint);

      const outcome = await operator.toggle(makeConnection({ localMountPoint: mountPoint }));

      expect(outcome).toEqual({ success: true, message: 'Successfully unmounted' });
      expect(os.callsTo('sshfs')).toHaveLength(0);
    });

    it('unmounts without validating the remote side', async () => {
      os.mounted.add(mountPoint);

      const outcome = await operator.toggle(
        makeConnection({ host: ' ', localMountPoint: mountPoint }),
      );

      expect(outcome.message).toBe('Successfully unmounted');
    });

    it('rejects an invalid definition when it would mount', async () => {
      const outcome = await operator.toggle(
        makeConnection({ host: ' ', localMountPoint: mountPoint }),
      );

      expect(outcome).toEqual({
        success: false,
        message: 'Invalid connection definition: host is required',
        failure: 'InvalidDefinition',
      });
      expect(os.callsTo('sshfs')).toHaveLength(0);
    });

    it('rejects an empty mount point without running anything', async () => {
      const outcome = await operator.toggle(makeConnection({ localMountPoint: ' ' }));

      expect(outcome.failure).toBe('InvalidDefinition');
      expect(os.calls).toEqual([]);
    });
  });

  describe('locking', () => {
    it('serializes actions on the same mount point', async () => {
      const conn = makeConnection({ localMountPoint: mountPoint });
      let finishMount = (): void => {};
      os.on(
        'sshfs',
        (command) =>
          new Promise<RunResult>((resolve) => {
            finishMount = () => {
              os.mounted.add(command[2] ?? '');
              resolve(exited(0));
            };
          }),
      );

      const mounting = operator.mount(conn);
      const unmounting = operator.unmount(conn);

      await vi.waitFor(() => expect(os.callsTo('sshfs')).toHaveLength(1));
      expect(operator.isBusy(conn)).toBe(true);
      expect(os.callsTo('fusermount')).toHaveLength(0);

      finishMount();

      expect(await mounting).toEqual({
        success: true,
        message: 'Successfully mounted',
        observed: 'mounted',
      });
      expect(await unmounting).toEqual({ success: true, message: 'Successfully unmounted' });
      expect(operator.isBusy(conn)).toBe(false);
    });

    it('reads the state only once the mount point is free', async () => {
      const conn = makeConnection({ localMountPoint: mountPoint });
      let release = (): void => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const held = operator.withLock(conn, () => gate);

      const observing = operator.observe(conn);
      await new Promise((resolve) => setTimeout(resolve, 0));
      expect(os.callsTo('mountpoint')).toHaveLength(0);

      os.mounted.add(mountPoint);
      release();
      await held;
      expect(await observing).toBe('mounted');
    });

    it('treats a trailing slash as the same mount point', () => {
      const a = makeConnection({ localMountPoint: mountPoint });
      const b = makeConnection({ id: 'conn-2', localMountPoint: `${mountPoint}/` });
      return operator.withLock(a, async () => {
        expect(operator.isBusy(b)).toBe(true);
      });
    });
  });

  describe('checkToolInstalled', () => {
    it('is true when which finds sshfs', async () => {
      expect(await operator.checkToolInstalled()).toBe(true);
      expect(os.calls).toEqual([['which', 'sshfs']]);
    });

    it('is false when which fails', async () => {
      os.on('which', () => exited(1));
      expect(await operator.checkToolInstalled()).toBe(false);
    });
  });
});
