import type { EventEmitter } from 'events';

export interface InterruptSource {
  /** Resolves on the next signal. */
  next(): Promise<void>;
  /** Remove the signal listeners. */
  close(): void;
}

/**
 * Turns SIGINT / SIGTERM into awaitable interrupts. Listeners go in on the
 * first next() and stay until close(), so a signal that arrives while
 * nobody is waiting (a shutdown prompt, say) goes to `onIgnored` rather
 * than to the default handler that would end the process.
 */
export function createInterruptSource(
  onIgnored: (signal: string) => void,
  emitter: EventEmitter = process,
  signals: readonly string[] = ['SIGINT', 'SIGTERM'],
): InterruptSource {
  let waiter: (() => void) | null = null;
  let listening = false;

  const onSignal = (signal: string): void => {
    const wake = waiter;
    if (!wake) {
      onIgnored(signal);
      return;
    }
    waiter = null;
    wake();
  };

  return {
    next() {
      if (!listening) {
        signals.forEach((s) => emitter.on(s, onSignal));
        listening = true;
      }
      return new Promise<void>((resolve) => {
        waiter = resolve;
      });
    },
    close() {
      signals.forEach((s) => emitter.off(s, onSignal));
      listening = false;
    },
  };
}
