import type { MountManager } from '../app.js';
import type { ConnectionDefinition } from '../connections/types.js';
import {
  AmbiguousConnectionError,
  ConnectionValidationError,
  UnknownConnectionError,
  UsageError,
} from '../errors.js';
import type { OperationOutcome } from '../execution/types.js';
import { LEGACY_CONFIG_PATH } from '../infrastructure/Config.js';
import type { ShutdownDecider, ShutdownReport, StatusSnapshot } from '../monitoring/StatusMonitor.js';
import type { ParsedArgs } from './args.js';
import { formatConnections, formatDetail, formatOutcome, formatStatus } from './format.js';
import { connectionFromFlags } from './input.js';

/** Everything a command needs from the terminal. */
export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  confirm(question: string): Promise<boolean>;
  decideShutdown: ShutdownDecider;
  /** Resolves at the next interrupt (Ctrl-C) while watching. */
  nextInterrupt(): Promise<void>;
}

export const USAGE = [
  'Usage: sshmount <command> [args] [options]',
  '',
  'Commands:',
  '  list                       List configured connections',
  '  status                     Probe every connection and show its state',
  '  show <ref>                 Show one connection',
  '  add --name N --host H --user U --mount PATH [--port P] [--remote PATH] [--key FILE] [--options "..."]',
  '  edit <ref> [same options as add]',
  '  remove <ref> [--yes]       Remove a connection, unmounting it first if mounted',
  '  mount <ref>                Mount a connection',
  '  unmount <ref>              Unmount a connection',
  '  toggle <ref>               Mount if unmounted, unmount if mounted',
  '  watch                      Show status changes until Ctrl-C',
  '  import [file]              Append connections from a JSON list',
  '  export <file>              Write connections as a JSON list',
  '',
  '<ref> is a connection id, or a name that matches exactly one connection.',
];

type Handler = (manager: MountManager, args: ParsedArgs, io: CliIo) => Promise<number>;

const SAVE_WARNING = 'Warning: the connection list could not be saved; see the log for details.';

function requireRef(args: ParsedArgs, command: string): string {
  const ref = args.positionals[0];
  if (!ref) throw new UsageError(`${command} needs a connection id or name`);
  return ref;
}

function report(io: CliIo, connection: ConnectionDefinition, outcome: OperationOutcome): number {
  const line = formatOutcome(connection.name, outcome);
  if (outcome.success) {
    io.out(line);
    return 0;
  }
  io.err(line);
  return 1;
}

function action(
  run: (manager: MountManager, id: string) => Promise<OperationOutcome>,
  command: string,
): Handler {
  return async (manager, args, io) => {
    const connection = manager.find(requireRef(args, command));
    return report(io, connection, await run(manager, connection.id));
  };
}

function statusSignature(snapshot: StatusSnapshot): string {
  return snapshot.entries.map((e) => `${e.id}=${e.status}`).join(',');
}

function reportShutdown(io: CliIo, result: ShutdownReport): number {
  for (const id of result.unmounted) io.out(`✓ Unmounted ${id}`);
  for (const failure of result.failed) io.err(`✗ ${failure.name}: ${failure.message}`);
  return result.failed.length > 0 ? 1 : 0;
}

const handlers: Record<string, Handler> = {
  async list(manager, _args, io) {
    formatConnections(manager.list()).forEach((line) => io.out(line));
    return 0;
  },

  async status(manager, _args, io) {
    const snapshot = await manager.refreshStatus();
    formatStatus(snapshot, manager.list()).forEach((line) => io.out(line));
    return 0;
  },

  async show(manager, args, io) {
    formatDetail(manager.find(requireRef(args, 'show'))).forEach((line) => io.out(line));
    return 0;
  },

  async add(manager, args, io) {
    const { connection, persisted } = manager.add(connectionFromFlags(args.values));
    io.out(`Added ${connection.name} (${connection.id})`);
    if (!persisted) io.err(SAVE_WARNING);
    return persisted ? 0 : 1;
  },

  async edit(manager, args, io) {
    const existing = manager.find(requireRef(args, 'edit'));
    if (Object.keys(args.values).length === 0) {
      throw new UsageError('edit needs at least one option to change');
    }
    const { connection, persisted } = manager.update(
      existing.id,
      connectionFromFlags(args.values, existing),
    );
    io.out(`Updated ${connection.name} (${connection.id})`);
    if (!persisted) io.err(SAVE_WARNING);
    return persisted ? 0 : 1;
  },

  async remove(manager, args, io) {
    const connection = manager.find(requireRef(args, 'remove'));
    if (!args.switches.has('yes')) {
      const ok = await io.confirm(`Remove connection "${connection.name}"?`);
      if (!ok) {
        io.out('Cancelled');
        return 0;
      }
    }

    const result = await manager.remove(connection.id);
    if (result.unmount) {
      const line = formatOutcome(connection.name, result.unmount);
      if (result.unmount.success) io.out(line);
      else io.err(line);
    }
    io.out(`Removed ${connection.name} (${connection.id})`);
    if (!result.persisted) io.err(SAVE_WARNING);
    return result.persisted ? 0 : 1;
  },

  mount: action((manager, id) => manager.mount(id), 'mount'),
  unmount: action((manager, id) => manager.unmount(id), 'unmount'),
  toggle: action((manager, id) => manager.toggle(id), 'toggle'),

  async watch(manager, _args, io) {
    let last = '';
    const unsubscribe = manager.monitor.subscribe((snapshot) => {
      const signature = statusSignature(snapshot);
      if (signature === last) return;
      last = signature;
      io.out(`[${new Date(snapshot.at).toISOString()}]`);
      formatStatus(snapshot, manager.list()).forEach((line) => io.out(line));
    });

    manager.startMonitoring();
    try {
      for (;;) {
        await io.nextInterrupt();
        const result = await manager.shutdown(io.decideShutdown);
        if (result.proceed) return reportShutdown(io, result);
        io.out('Shutdown cancelled, still watching.');
      }
    } finally {
      unsubscribe();
    }
  },

  async import(manager, args, io) {
    const filePath = args.positionals[0] ?? LEGACY_CONFIG_PATH;
    const { imported, persisted } = manager.importLegacy(filePath);
    io.out(`Imported ${imported.length} connection(s) from ${filePath}`);
    if (!persisted) io.err(SAVE_WARNING);
    return persisted ? 0 : 1;
  },

  async export(manager, args, io) {
    const filePath = args.positionals[0];
    if (!filePath) throw new UsageError('export needs a file path');
    const count = manager.exportLegacy(filePath);
    io.out(`Exported ${count} connection(s) to ${filePath}`);
    return 0;
  },
};

/**
 * Run one command and return the process exit code: 0 on success, 1 when
 * the action failed, 2 for usage errors. Errors other than the expected
 * lookup, validation and usage errors propagate.
 */
export async function runCommand(
  manager: MountManager,
  args: ParsedArgs,
  io: CliIo,
): Promise<number> {
  if (!args.command || args.command === 'help' || args.switches.has('help')) {
    USAGE.forEach((line) => io.out(line));
    return args.command ? 0 : 2;
  }

  const handler = Object.hasOwn(handlers, args.command) ? handlers[args.command] : undefined;
  try {
    if (!handler) throw new UsageError(`Unknown command: ${args.command}`);
    return await handler(manager, args, io);
  } catch (err) {
    if (err instanceof UsageError) {
      io.err(err.message);
      io.err("Run 'sshmount help' for usage.");
      return 2;
    }
    if (err instanceof ConnectionValidationError) {
      io.err(err.message);
      return 1;
    }
    if (err instanceof UnknownConnectionError || err instanceof AmbiguousConnectionError) {
      io.err(err.message);
      return 1;
    }
    throw err;
  }
}
