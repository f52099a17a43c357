import knexLib from 'knex';
import type { Knex } from 'knex';
import { env } from '../config/env';
import { logger } from '../config/logger';

interface QueryInfo {
  __knexQueryUid: string;
  sql: string;
}

export interface SlowQueryWatch {
  /** Queries started but not yet answered or failed. */
  pending(): number;
}

/** Log queries slower than `thresholdMs`. */
export function watchSlowQueries(instance: Knex, thresholdMs = 100): SlowQueryWatch {
  const startedAt = new Map<string, number>();

  const finish = (query: QueryInfo): void => {
    const start = startedAt.get(query.__knexQueryUid);
    startedAt.delete(query.__knexQueryUid);
    if (start === undefined) return;
    const duration = Math.round(performance.now() - start);
    if (duration > thresholdMs) {
      logger.warn({ duration, query: query.sql }, 'Slow query detected');
    }
  };

  instance.on('query', (query: QueryInfo) => {
    startedAt.set(query.__knexQueryUid, performance.now());
  });
  instance.on('query-response', (_response: unknown, query: QueryInfo) => finish(query));
  instance.on('query-error', (_error: unknown, query: QueryInfo) => finish(query));

  return { pending: () => startedAt.size };
}

/** Build a knex instance over a SQLite file (or ':memory:'). */
export function createDb(filename: string): Knex {
  const instance = knexLib({
    client: 'better-sqlite3',
    connection: { filename },
    useNullAsDefault: true,
  });

  if (env.NODE_ENV === 'development') {
    watchSlowQueries(instance);
  }

  return instance;
}

// Single knex instance reused across the app.
// Tests build their own in-memory instance instead of importing this one.
export const db = createDb(env.DATABASE_FILE);
