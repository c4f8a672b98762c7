import type { ConnectionInput } from './types.js';

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

/**
 * Problems that make a definition impossible to act on. Checked by the
 * mount operator before it touches the filesystem.
 */
export function mountTargetProblems(
  connection: Pick<ConnectionInput, 'host' | 'username' | 'localMountPoint' | 'port'>,
): string[] {
  const problems: string[] = [];
  if (!connection.host.trim()) problems.push('host is required');
  if (!connection.username.trim()) problems.push('username is required');
  if (!connection.localMountPoint.trim()) problems.push('local mount point is required');
  if (!isValidPort(connection.port)) problems.push('port must be an integer between 1 and 65535');
  return problems;
}

/** Full input validation for user-entered definitions. */
export function validateConnection(connection: ConnectionInput): string[] {
  const problems: string[] = [];
  if (!connection.name.trim()) problems.push('connection name is required');
  return problems.concat(mountTargetProblems(connection));
}
