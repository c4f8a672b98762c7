/**
 * StatusMonitor — the reconciliation loop. Re-probes every connection on a
 * fixed interval and publishes what the OS reports. Also owns the shutdown
 * sequence for mounted connections.
 */
import type { ConnectionDefinition, MountStatusText } from '../connections/types.js';
import { STATUS_POLL_INTERVAL } from '../infrastructure/Config.js';
import { logger } from '../infrastructure/Logger.js';
import { startPollLoop } from '../infrastructure/poll-loop.js';
import type { PollLoopHandle } from '../infrastructure/poll-loop.js';
import type { ProbeResult } from '../interfaces/mount-probe.js';
import type { MountOperator } from '../execution/MountOperator.js';

export interface StatusEntry {
  id: string;
  name: string;
  state: ProbeResult;
  status: MountStatusText;
}

export interface StatusSnapshot {
  /** Epoch ms when the snapshot was taken. */
  at: number;
  entries: StatusEntry[];
}

export type StatusListener = (snapshot: StatusSnapshot) => void;

export type ShutdownDecision = 'unmount' | 'keep' | 'cancel';

export type ShutdownDecider = (
  mounted: readonly ConnectionDefinition[],
) => ShutdownDecision | Promise<ShutdownDecision>;

export interface ShutdownReport {
  /** False only when the decider cancelled; the loop is running again. */
  proceed: boolean;
  unmounted: string[];
  failed: Array<{ id: string; name: string; message: string }>;
}

export interface StatusMonitorDeps {
  connections: () => readonly ConnectionDefinition[];
  operator: MountOperator;
  intervalMs?: number;
  now?: () => number;
}

/** `unknown` shows as not mounted. */
export function statusText(state: ProbeResult): MountStatusText {
  return state === 'mounted' ? 'Mounted' : 'Not Mounted';
}

export class StatusMonitor {
  private readonly connections: () => readonly ConnectionDefinition[];
  private readonly operator: MountOperator;
  private readonly intervalMs: number;
  private readonly now: () => number;
  private states = new Map<string, ProbeResult>();
  private listeners = new Set<StatusListener>();
  private loop: PollLoopHandle | null = null;

  constructor(deps: StatusMonitorDeps) {
    this.connections = deps.connections;
    this.operator = deps.operator;
    this.intervalMs = deps.intervalMs ?? STATUS_POLL_INTERVAL;
    this.now = deps.now ?? Date.now;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) return;
    this.loop = startPollLoop('status', this.intervalMs, async () => {
      await this.refresh();
    });
  }

  stop(): void {
    if (!this.loop) return;
    this.loop.stop();
    this.loop = null;
    logger.debug('Status loop stopped');
  }

  /**
   * Probe every connection concurrently and publish the result. A connection
   * whose mount point is locked by an in-flight action keeps its previous
   * state for this cycle.
   */
  async refresh(): Promise<StatusSnapshot> {
    const connections = this.connections();
    await Promise.all(connections.map((c) => this.refreshOne(c)));

    const live = new Set(connections.map((c) => c.id));
    for (const id of this.states.keys()) {
      if (!live.has(id)) this.states.delete(id);
    }

    const snapshot = this.buildSnapshot(connections);
    this.publish(snapshot);
    return snapshot;
  }

  snapshot(): StatusSnapshot {
    return this.buildSnapshot(this.connections());
  }

  stateOf(id: string): ProbeResult {
    return this.states.get(id) ?? 'unknown';
  }

  /** Record a state observed outside the loop (after a user action) and publish it. */
  setObserved(id: string, state: ProbeResult): void {
    this.states.set(id, state);
    this.publish(this.snapshot());
  }

  forget(id: string): void {
    this.states.delete(id);
  }

  subscribe(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Stop polling, find what is still mounted and let `decide` choose.
   * Unmount failures at this stage are logged and do not stop the shutdown.
   */
  async shutdown(decide: ShutdownDecider): Promise<ShutdownReport> {
    this.stop();
    const report: ShutdownReport = { proceed: true, unmounted: [], failed: [] };

    const mounted = await this.findMounted();
    if (mounted.length === 0) return report;

    const decision = await decide(mounted);
    logger.info({ decision, mounted: mounted.map((c) => c.id) }, 'Shutdown decision');

    if (decision === 'cancel') {
      this.start();
      return { ...report, proceed: false };
    }
    if (decision === 'keep') return report;

    await Promise.all(
      mounted.map(async (connection) => {
        try {
          const outcome = await this.operator.unmount(connection);
          if (outcome.success) {
            report.unmounted.push(connection.id);
          } else {
            report.failed.push({ id: connection.id, name: connection.name, message: outcome.message });
            logger.warn(
              { id: connection.id, message: outcome.message },
              'Unmount during shutdown failed',
            );
          }
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          report.failed.push({ id: connection.id, name: connection.name, message });
          logger.error({ id: connection.id, err }, 'Unmount during shutdown threw');
        }
      }),
    );
    return report;
  }

  // --- Private ---

  private async refreshOne(connection: ConnectionDefinition): Promise<void> {
    if (this.operator.isBusy(connection)) {
      logger.debug({ id: connection.id }, 'Skipping probe, action in progress');
      return;
    }
    try {
      const state = await this.operator.observe(connection);
      this.states.set(connection.id, state);
    } catch (err) {
      logger.warn({ id: connection.id, err }, 'Status probe failed');
      this.states.set(connection.id, 'unknown');
    }
  }

  private async findMounted(): Promise<ConnectionDefinition[]> {
    const connections = this.connections();
    const states = await Promise.all(
      connections.map((c) => this.operator.observe(c)),
    );
    connections.forEach((c, i) => {
      const state = states[i];
      if (state) this.states.set(c.id, state);
    });
    return connections.filter((_c, i) => states[i] === 'mounted');
  }

  private buildSnapshot(connections: readonly ConnectionDefinition[]): StatusSnapshot {
    return {
      at: this.now(),
      entries: connections.map((c) => {
        const state = this.stateOf(c.id);
        return { id: c.id, name: c.name, state, status: statusText(state) };
      }),
    };
  }

  private publish(snapshot: StatusSnapshot): void {
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (err) {
        logger.error({ err }, 'Status listener threw');
      }
    }
  }
}
