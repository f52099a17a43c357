import { logger } from '../config/logger';
import { pmsConfig } from '../config/pms';
import type { PmsRegistry } from '../integrations/registry';
import { systemClock, type Clock } from '../types/common';

/** Vendor name → whether its pull of tomorrow's arrivals succeeded. */
export type DailyPullResult = Record<string, boolean>;

/**
 * Run pullTomorrowsStays() on every registered adapter.
 * Adapters run one after another and independently: a failing or
 * throwing vendor is reported as false and the next one still runs.
 */
export async function runDailyPull(registry: PmsRegistry): Promise<DailyPullResult> {
  const result: DailyPullResult = {};

  for (const adapter of registry.list()) {
    try {
      result[adapter.pmsName] = await adapter.pullTomorrowsStays();
    } catch (err) {
      logger.error({ pms: adapter.pmsName, err }, 'Daily pull threw');
      result[adapter.pmsName] = false;
    }
  }

  logger.info({ result }, 'Daily pull finished');
  return result;
}

/** Milliseconds from `now` until the next local HH:00:00.000 strictly after it. */
export function msUntilNextRun(now: Date, hour: number = pmsConfig.DAILY_PULL_HOUR): number {
  const next = new Date(now);
  next.setHours(hour, 0, 0, 0);
  if (next.getTime() <= now.getTime()) {
    next.setDate(next.getDate() + 1);
    next.setHours(hour, 0, 0, 0);
  }
  return next.getTime() - now.getTime();
}

export interface DailyPullSchedule {
  stop(): void;
}

export interface ScheduleDailyPullOptions {
  run: () => Promise<unknown>;
  clock?: Clock;
  hour?: number;
}

/**
 * Fire `run` every day at the configured local hour (00:00 by default).
 * The next run is armed only after the current one settles, so runs never overlap.
 */
export function scheduleDailyPull(options: ScheduleDailyPullOptions): DailyPullSchedule {
  const clock = options.clock ?? systemClock;
  const hour = options.hour ?? pmsConfig.DAILY_PULL_HOUR;
  let timer: NodeJS.Timeout | null = null;
  let stopped = false;

  const arm = (): void => {
    if (stopped) return;
    const delayMs = msUntilNextRun(clock(), hour);
    logger.debug({ delayMs }, 'Daily pull scheduled');
    timer = setTimeout(() => {
      void options
        .run()
        .catch((err: unknown) => {
          logger.error({ err }, 'Scheduled daily pull failed');
        })
        .finally(arm);
    }, delayMs);
  };

  arm();

  return {
    stop(): void {
      stopped = true;
      if (timer) clearTimeout(timer);
      timer = null;
    },
  };
}
