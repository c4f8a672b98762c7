export const DEFAULT_PORT = 22;
export const DEFAULT_REMOTE_PATH = '/';

/**
 * One SSHFS mount target. `id` is assigned by the store on creation and is
 * the key for every action; `name` is for people and may repeat.
 */
export interface ConnectionDefinition {
  readonly id: string;
  readonly name: string;
  readonly host: string;
  readonly port: number;
  readonly username: string;
  readonly remotePath: string;
  /** May start with `~`; expanded when acted on. */
  readonly localMountPoint: string;
  /** Empty when none is configured. */
  readonly identityFile: string;
  /** Passed to sshfs verbatim, after the generated options. */
  readonly extraArgs: readonly string[];
}

export type ConnectionInput = Omit<ConnectionDefinition, 'id'> & {
  readonly id?: string;
};

export type MountStatusText = 'Mounted' | 'Not Mounted';
