import { logger } from '../config/logger';

export interface Timer {
  /** Stop the timer, log the duration and return it in ms. */
  stop(extra?: Record<string, unknown>): number;
}

/**
 * Measure how long an operation takes.
 *   const timer = startTimer('pms.pull', { pms: 'Mews' });
 *   await pull();
 *   const durationMs = timer.stop();
 */
export function startTimer(label: string, context: Record<string, unknown> = {}): Timer {
  const start = performance.now();

  return {
    stop(extra = {}): number {
      const durationMs = Math.round(performance.now() - start);
      logger.debug({ label, durationMs, ...context, ...extra }, 'Timer completed');
      return durationMs;
    },
  };
}
