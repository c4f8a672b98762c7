import { DEFAULT_PORT, DEFAULT_REMOTE_PATH } from './types.js';
import type { ConnectionDefinition, ConnectionInput } from './types.js';

/**
 * On-disk shape of one connection, as in the legacy sshfs-gui JSON list.
 * `id` is only present in files this project wrote.
 */
export interface ConnectionRecord {
  id?: string;
  name: string;
  host: string;
  port: number;
  username: string;
  remote_path: string;
  local_mount_point: string;
  ssh_key: string;
  extra_options: string;
}

export function splitExtraArgs(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

export function joinExtraArgs(args: readonly string[]): string {
  return args.join(' ');
}

function isRecordObject(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === 'object' && raw !== null && !Array.isArray(raw);
}

function text(raw: Record<string, unknown>, key: string, fallback: string): string {
  const value = raw[key];
  if (value === undefined || value === null) return fallback;
  return typeof value === 'string' ? value : String(value);
}

function port(raw: Record<string, unknown>): number {
  const value = raw.port;
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return DEFAULT_PORT;
}

/**
 * Build an input from a stored record. Missing fields take their defaults
 * (port 22, remote path "/", empty strings); null counts as missing.
 */
export function fromRecord(raw: unknown): ConnectionInput {
  if (!isRecordObject(raw)) {
    throw new Error('Connection record must be an object');
  }
  const id = text(raw, 'id', '');
  const input: ConnectionInput = {
    name: text(raw, 'name', ''),
    host: text(raw, 'host', ''),
    port: port(raw),
    username: text(raw, 'username', ''),
    remotePath: text(raw, 'remote_path', DEFAULT_REMOTE_PATH),
    localMountPoint: text(raw, 'local_mount_point', ''),
    identityFile: text(raw, 'ssh_key', ''),
    extraArgs: splitExtraArgs(text(raw, 'extra_options', '')),
  };
  return id ? { ...input, id } : input;
}

export function toRecord(connection: ConnectionDefinition): ConnectionRecord {
  return {
    id: connection.id,
    name: connection.name,
    host: connection.host,
    port: connection.port,
    username: connection.username,
    remote_path: connection.remotePath,
    local_mount_point: connection.localMountPoint,
    ssh_key: connection.identityFile,
    extra_options: joinExtraArgs(connection.extraArgs),
  };
}

/** Fill in defaults for a partially specified connection. */
export function withDefaults(
  fields: Partial<ConnectionInput> & Pick<ConnectionInput, 'name' | 'host' | 'username' | 'localMountPoint'>,
): ConnectionInput {
  return {
    ...(fields.id ? { id: fields.id } : {}),
    name: fields.name,
    host: fields.host,
    port: fields.port ?? DEFAULT_PORT,
    username: fields.username,
    remotePath: fields.remotePath || DEFAULT_REMOTE_PATH,
    localMountPoint: fields.localMountPoint,
    identityFile: fields.identityFile ?? '',
    extraArgs: fields.extraArgs ?? [],
  };
}
