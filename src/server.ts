import { buildApp } from './app';
import { env } from './config/env';
import { logger } from './config/logger';
import { buildContainer } from './container';
import { db } from './db/client';
import { ensureSchema } from './db/schema';
import { runDailyPull, scheduleDailyPull, type DailyPullSchedule } from './services/daily-pull.service';
import { logEvent } from './services/telemetry.service';

const container = buildContainer(db);
const app = buildApp(container);
let schedule: DailyPullSchedule | null = null;

const start = async (): Promise<void> => {
  try {
    await ensureSchema(db);
    await app.listen({ port: env.PORT, host: '0.0.0.0' });

    if (env.DAILY_PULL_ENABLED) {
      schedule = scheduleDailyPull({
        run: () => runDailyPull(container.registry),
        clock: container.clock,
      });
    }

    await logEvent(container.events, {
      type: 'server.started',
      payload: { port: env.PORT, env: env.NODE_ENV, dailyPull: env.DAILY_PULL_ENABLED },
    });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

const shutdown = async (signal: string): Promise<void> => {
  logger.info({ signal }, 'Shutting down');
  schedule?.stop();
  await app.close();
  await db.destroy();
  process.exit(0);
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

void start();
