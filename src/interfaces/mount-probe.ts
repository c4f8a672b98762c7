/**
 * Read-only query of the OS mount table for one path.
 */

/** `unknown` means the probe itself failed (missing tool, timeout). */
export type ProbeResult = 'mounted' | 'unmounted' | 'unknown';

export interface IMountProbe {
  probe(mountPoint: string): Promise<ProbeResult>;

  /** Fail-open view of probe(): only a confirmed mount counts. */
  isMounted(mountPoint: string): Promise<boolean>;
}
