import type { FastifyInstance } from 'fastify';
import type { PmsRegistry } from '../integrations/registry';

export interface HealthRouteOptions {
  registry: PmsRegistry;
}

/**
 * GET /health: liveness probe. Lists the PMS adapters this instance serves.
 */
export async function healthRoutes(app: FastifyInstance, opts: HealthRouteOptions): Promise<void> {
  app.get('/health', async (_request, reply) => {
    return reply.send({
      ok: true,
      timestamp: new Date().toISOString(),
      pms: opts.registry.list().map((adapter) => adapter.pmsName),
    });
  });
}
