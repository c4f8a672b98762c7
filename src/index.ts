#!/usr/bin/env node
import fs from 'fs';

import { MountManager } from './app.js';
import { parseArgs } from './cli/args.js';
import type { ParsedArgs } from './cli/args.js';
import { runCommand } from './cli/commands.js';
import type { CliIo } from './cli/commands.js';
import { createInterruptSource } from './cli/interrupts.js';
import { askShutdownDecision, confirm } from './cli/prompt.js';
import { UsageError } from './errors.js';
import { MOUNT_STORE_PATH } from './infrastructure/Config.js';
import { database } from './infrastructure/Database.js';
import { logger } from './infrastructure/Logger.js';

// --- Exports for embedding ---

export { MountManager } from './app.js';
export type { InitReport, LoadReport } from './app.js';
export { StatusMonitor } from './monitoring/StatusMonitor.js';
export type { StatusSnapshot, ShutdownDecision } from './monitoring/StatusMonitor.js';
export type { ConnectionDefinition, ConnectionInput } from './connections/types.js';
export type { OperationOutcome, MountFailureKind } from './execution/types.js';

const INSTALL_HINTS = [
  'sshfs is not installed or not on PATH. Install it with your package manager:',
  '  Debian/Ubuntu: sudo apt install sshfs',
  '  Fedora:        sudo dnf install fuse-sshfs',
  '  Arch:          sudo pacman -S sshfs',
];

const interrupts = createInterruptSource((signal) => {
  logger.debug({ signal }, 'Signal ignored while shutting down');
  console.error('Shutdown already in progress');
});

const terminal: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  confirm,
  decideShutdown: askShutdownDecision,
  nextInterrupt: () => interrupts.next(),
};

// --- Entry point ---

function parseCommandLine(): ParsedArgs | null {
  try {
    return parseArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    terminal.err(err.message);
    return null;
  }
}

async function main(): Promise<number> {
  const args = parseCommandLine();
  if (!args) return 2;

  // One-shot commands keep the terminal quiet unless asked otherwise.
  if (!process.env.LOG_LEVEL && args.command !== 'watch') {
    logger.level = 'warn';
  }

  database.init(MOUNT_STORE_PATH);
  try {
    const manager = new MountManager({ repository: database.connectionRepo });
    const init = await manager.init();
    if (init.error) {
      terminal.err(`Could not load connections from ${MOUNT_STORE_PATH}: ${init.error}`);
    }
    if (!init.toolInstalled) {
      INSTALL_HINTS.forEach((line) => terminal.err(line));
    }
    return await runCommand(manager, args, terminal);
  } finally {
    interrupts.close();
    database.close();
  }
}

// Guard: only run when executed directly (or through the bin symlink), not when imported
const isDirectRun =
  process.argv[1] !== undefined &&
  fs.existsSync(process.argv[1]) &&
  new URL(import.meta.url).pathname ===
    new URL(`file://${fs.realpathSync(process.argv[1])}`).pathname;

if (isDirectRun) {
  process.on('unhandledRejection', (reason) => {
    logger.error({ err: reason }, 'Unhandled rejection');
  });

  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      logger.error({ err }, 'sshmount failed');
      console.error(err instanceof Error ? err.message : String(err));
      process.exit(1);
    });
}
