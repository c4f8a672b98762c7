import { logger } from './Logger.js';

export interface PollLoopHandle {
  stop: () => void;
}

/**
 * Start a polling loop that runs `fn` every `intervalMs` milliseconds,
 * measured from the end of the previous run. Errors are logged and the
 * loop continues. `stop()` cancels the pending tick.
 */
export function startPollLoop(
  name: string,
  intervalMs: number,
  fn: () => Promise<void>,
): PollLoopHandle {
  let stopped = false;
  let timer: ReturnType<typeof setTimeout> | null = null;

  const loop = async () => {
    timer = null;
    if (stopped) return;
    try {
      await fn();
    } catch (err) {
      logger.error({ err }, `Error in ${name} loop`);
    }
    if (!stopped) {
      timer = setTimeout(() => void loop(), intervalMs);
    }
  };

  void loop();
  logger.info({ intervalMs }, `${name} loop started`);

  return {
    stop() {
      stopped = true;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    },
  };
}
