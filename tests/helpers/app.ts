import type { FastifyInstance } from 'fastify';
import type { Knex } from 'knex';
import { buildApp } from '@/app';
import { buildContainer, type Container, type ContainerOptions } from '@/container';
import { createTestDb } from './db';

export interface TestApp {
  app: FastifyInstance;
  container: Container;
  db: Knex;
  close(): Promise<void>;
}

/** Fastify app over a seeded in-memory database. */
export async function createTestApp(options: ContainerOptions = {}): Promise<TestApp> {
  const db = await createTestDb({ seed: true });
  const container = buildContainer(db, options);
  const app = buildApp(container);
  await app.ready();

  return {
    app,
    container,
    db,
    async close() {
      await app.close();
      await db.destroy();
    },
  };
}
