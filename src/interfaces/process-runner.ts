/**
 * Runs one external command with a bounded timeout.
 * Implementations never reject; OS-level failures come back as data.
 */

export type RunResult =
  | {
      kind: 'exited';
      exitCode: number | null;
      signal: NodeJS.Signals | null;
      stdout: string;
      stderr: string;
    }
  | {
      kind: 'timeout';
      timeoutMs: number;
      stdout: string;
      stderr: string;
    }
  | {
      kind: 'spawn-error';
      message: string;
    };

export interface IProcessRunner {
  run(command: readonly string[], timeoutMs: number): Promise<RunResult>;
}

/**
 * The text to show for a failed run. Tools disagree on which stream carries
 * their errors, so stderr wins, then stdout, then a generic fallback.
 */
export function diagnosticOf(result: RunResult): string {
  if (result.kind === 'spawn-error') return result.message || 'Unknown error';
  return result.stderr.trim() || result.stdout.trim() || 'Unknown error';
}

export function succeeded(result: RunResult): boolean {
  return result.kind === 'exited' && result.exitCode === 0;
}
