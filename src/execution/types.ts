import type { ProbeResult } from '../interfaces/mount-probe.js';

export type MountFailureKind =
  | 'InvalidDefinition'
  | 'MountPointCreationFailed'
  | 'AlreadyMounted'
  | 'ToolExecutionFailed'
  | 'TimedOut'
  | 'SpawnFailed';

/**
 * Result of one mount or unmount attempt. `message` is for display only;
 * code that needs to branch reads `failure`.
 */
export interface OperationOutcome {
  success: boolean;
  message: string;
  failure?: MountFailureKind;
  /** Mount state read under the lock at the end of the attempt, when one was read. */
  observed?: ProbeResult;
  /** Set when no tool ran because the mount point was not mounted. */
  skipped?: boolean;
}

export function succeededWith(message: string): OperationOutcome {
  return { success: true, message };
}

export function failedWith(failure: MountFailureKind, message: string): OperationOutcome {
  return { success: false, message, failure };
}
