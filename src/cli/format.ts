import { remoteTarget } from '../execution/MountCommandBuilder.js';
import type { ConnectionDefinition } from '../connections/types.js';
import type { OperationOutcome } from '../execution/types.js';
import type { StatusSnapshot } from '../monitoring/StatusMonitor.js';

/** Left-aligned columns separated by two spaces; no trailing whitespace. */
export function formatTable(headers: readonly string[], rows: readonly (readonly string[])[]): string[] {
  const widths = headers.map((h, col) =>
    Math.max(h.length, ...rows.map((row) => (row[col] ?? '').length)),
  );
  const line = (cells: readonly string[]) =>
    cells
      .map((cell, col) => cell.padEnd(widths[col] ?? 0))
      .join('  ')
      .trimEnd();
  return [line(headers), ...rows.map(line)];
}

export function formatConnections(connections: readonly ConnectionDefinition[]): string[] {
  if (connections.length === 0) return ['No connections configured.'];
  return formatTable(
    ['ID', 'NAME', 'REMOTE', 'MOUNT POINT'],
    connections.map((c) => [c.id, c.name, `${remoteTarget(c)} -p ${c.port}`, c.localMountPoint]),
  );
}

export function formatStatus(
  snapshot: StatusSnapshot,
  connections: readonly ConnectionDefinition[],
): string[] {
  if (snapshot.entries.length === 0) return ['No connections configured.'];
  const mountPoints = new Map(connections.map((c) => [c.id, c.localMountPoint]));
  return formatTable(
    ['NAME', 'MOUNT POINT', 'STATUS'],
    snapshot.entries.map((e) => [e.name, mountPoints.get(e.id) ?? '', e.status]),
  );
}

export function formatOutcome(name: string, outcome: OperationOutcome): string {
  return `${outcome.success ? '✓' : '✗'} ${name}: ${outcome.message}`;
}

export function formatDetail(connection: ConnectionDefinition): string[] {
  return [
    `id:          ${connection.id}`,
    `name:        ${connection.name}`,
    `remote:      ${remoteTarget(connection)}`,
    `port:        ${connection.port}`,
    `mount point: ${connection.localMountPoint}`,
    `ssh key:     ${connection.identityFile || '(none)'}`,
    `options:     ${connection.extraArgs.join(' ') || '(none)'}`,
  ];
}
