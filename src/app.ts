import { ConnectionStore } from './connections/ConnectionStore.js';
import type { ConnectionDefinition, ConnectionInput } from './connections/types.js';
import { AmbiguousConnectionError, UnknownConnectionError } from './errors.js';
import { MountOperator } from './execution/MountOperator.js';
import type { OperationOutcome } from './execution/types.js';
import { STATUS_POLL_INTERVAL, TimeoutConfig } from './infrastructure/Config.js';
import { logger } from './infrastructure/Logger.js';
import type { IConnectionRepository } from './interfaces/connection-repository.js';
import { StatusMonitor } from './monitoring/StatusMonitor.js';
import type { ShutdownDecider, ShutdownReport, StatusSnapshot } from './monitoring/StatusMonitor.js';
import { JsonConnectionFile } from './repositories/json-connection-file.js';

export interface LoadReport {
  loaded: number;
  /** Set when the repository could not be read; the store is then empty. */
  error?: string;
}

export interface InitReport extends LoadReport {
  toolInstalled: boolean;
}

export interface ChangeResult {
  connection: ConnectionDefinition;
  persisted: boolean;
}

export interface RemoveResult extends ChangeResult {
  /** Present when the connection was mounted and an unmount tool ran. */
  unmount?: OperationOutcome;
}

export interface ImportResult {
  imported: ConnectionDefinition[];
  persisted: boolean;
}

export interface MountManagerDeps {
  repository: IConnectionRepository;
  store?: ConnectionStore;
  operator?: MountOperator;
  monitor?: StatusMonitor;
}

/**
 * Application service over the store, the operator and the
 * status loop. Every change to the connection list is saved straight away;
 * every action is keyed by connection id.
 */
export class MountManager {
  readonly store: ConnectionStore;
  readonly operator: MountOperator;
  readonly monitor: StatusMonitor;
  private readonly repository: IConnectionRepository;

  constructor(deps: MountManagerDeps) {
    this.repository = deps.repository;
    this.store = deps.store ?? new ConnectionStore();
    this.operator =
      deps.operator ??
      new MountOperator({ timeouts: new TimeoutConfig().forPollInterval(STATUS_POLL_INTERVAL) });
    this.monitor =
      deps.monitor ??
      new StatusMonitor({ connections: () => this.store.list(), operator: this.operator });
  }

  async init(): Promise<InitReport> {
    const report = this.load();
    const toolInstalled = await this.operator.checkToolInstalled();
    if (!toolInstalled) {
      logger.warn('sshfs was not found on PATH; mounts will fail until it is installed');
    }
    return { ...report, toolInstalled };
  }

  /** Replace the store with the repository contents. On failure the store is left empty. */
  load(): LoadReport {
    try {
      const inputs = this.repository.load();
      this.store.replaceAll(inputs);
      logger.info({ count: this.store.size }, 'Connections loaded');
      return { loaded: this.store.size };
    } catch (err) {
      this.store.replaceAll([]);
      logger.error({ err }, 'Failed to load connections');
      return { loaded: 0, error: err instanceof Error ? err.message : String(err) };
    }
  }

  // --- Lookup ---

  list(): ConnectionDefinition[] {
    return this.store.list();
  }

  /** Resolve an id, or failing that a unique name. */
  find(ref: string): ConnectionDefinition {
    const byId = this.store.getById(ref);
    if (byId) return byId;

    const byName = this.store.findByName(ref);
    if (byName.length === 1) return byName[0];
    if (byName.length > 1) {
      throw new AmbiguousConnectionError(ref, byName.map((c) => c.id));
    }
    throw new UnknownConnectionError(ref);
  }

  // --- Changes ---

  add(input: ConnectionInput): ChangeResult {
    const connection = this.store.add(input);
    logger.info({ id: connection.id, name: connection.name }, 'Connection added');
    return { connection, persisted: this.persist() };
  }

  update(id: string, input: ConnectionInput): ChangeResult {
    const index = this.store.indexOf(id);
    if (index < 0) throw new UnknownConnectionError(id);

    const connection = this.store.update(index, input);
    logger.info({ id, name: connection.name }, 'Connection updated');
    return { connection, persisted: this.persist() };
  }

  /**
   * Remove a connection. One unmount is attempted first, behind any action
   * already running on the mount point; the connection is removed whatever
   * that attempt returns.
   */
  async remove(id: string): Promise<RemoveResult> {
    const connection = this.store.getById(id);
    if (!connection) throw new UnknownConnectionError(id);

    const attempt = await this.operator.unmount(connection);
    const unmount = attempt.skipped ? undefined : attempt;
    if (unmount && !unmount.success) {
      logger.warn({ id, message: unmount.message }, 'Removing connection that failed to unmount');
    }

    const index = this.store.indexOf(id);
    if (index >= 0) this.store.remove(index);
    this.monitor.forget(id);
    logger.info({ id, name: connection.name }, 'Connection removed');

    return { connection, unmount, persisted: this.persist() };
  }

  // --- Actions ---

  async mount(id: string): Promise<OperationOutcome> {
    const connection = this.store.getById(id);
    if (!connection) return unknownConnection(id);

    const outcome = await this.operator.mount(connection);
    await this.publish(connection, outcome);
    return outcome;
  }

  async unmount(id: string): Promise<OperationOutcome> {
    const connection = this.store.getById(id);
    if (!connection) return unknownConnection(id);

    const outcome = await this.operator.unmount(connection);
    await this.publish(connection, outcome);
    return outcome;
  }

  /** Unmount if currently mounted, otherwise mount. */
  async toggle(id: string): Promise<OperationOutcome> {
    const connection = this.store.getById(id);
    if (!connection) return unknownConnection(id);

    const outcome = await this.operator.toggle(connection);
    await this.publish(connection, outcome);
    return outcome;
  }

  // --- Status ---

  refreshStatus(): Promise<StatusSnapshot> {
    return this.monitor.refresh();
  }

  startMonitoring(): void {
    this.monitor.start();
  }

  shutdown(decide: ShutdownDecider): Promise<ShutdownReport> {
    return this.monitor.shutdown(decide);
  }

  // --- Legacy JSON list ---

  /** Append every connection in a legacy JSON list. Read errors propagate. */
  importLegacy(filePath: string): ImportResult {
    const inputs = new JsonConnectionFile(filePath).load();
    const imported = inputs.map((input) => this.store.add(input));
    logger.info({ filePath, count: imported.length }, 'Connections imported');
    return { imported, persisted: imported.length > 0 ? this.persist() : true };
  }

  /** Write the current list in the legacy JSON format. Write errors propagate. */
  exportLegacy(filePath: string): number {
    const connections = this.store.list();
    new JsonConnectionFile(filePath).save(connections);
    logger.info({ filePath, count: connections.length }, 'Connections exported');
    return connections.length;
  }

  // --- Private ---

  private persist(): boolean {
    try {
      this.repository.save(this.store.list());
      return true;
    } catch (err) {
      logger.error({ err }, 'Failed to save connections');
      return false;
    }
  }

  /** Record the state an action ended in, reading it under the lock if the action did not. */
  private async publish(connection: ConnectionDefinition, outcome: OperationOutcome): Promise<void> {
    const state = outcome.observed ?? (await this.operator.observe(connection));
    // A remove may have run while the action was queued.
    if (this.store.getById(connection.id)) {
      this.monitor.setObserved(connection.id, state);
    }
  }
}

function unknownConnection(id: string): OperationOutcome {
  return { success: false, message: `Unknown connection: ${id}` };
}
