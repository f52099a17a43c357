import type { FastifyInstance } from 'fastify';
import { env } from '../config/env';
import pkg from '../../package.json';

/**
 * GET /version: returns app name, version and environment.
 */
export async function versionRoutes(app: FastifyInstance): Promise<void> {
  app.get('/version', async (_request, reply) => {
    return reply.send({
      name: pkg.name,
      version: pkg.version,
      environment: env.NODE_ENV,
    });
  });
}
