import fastify, { type FastifyInstance } from 'fastify';
import { loggerOptions } from './config/logger';
import { buildContainer, type Container } from './container';
import { db } from './db/client';
import requestContextPlugin from './api/middleware/request-context';
import { healthRoutes } from './api/health';
import { versionRoutes } from './api/version';
import { webhookRoutes } from './api/webhooks';
import { stayRoutes } from './api/stays';

/**
 * Creates and configures the Fastify application.
 * Exported as a factory so tests can pass an isolated container.
 */
export function buildApp(container: Container = buildContainer(db)): FastifyInstance {
  const app = fastify({ logger: loggerOptions });

  // Middleware: request_id + structured logging on all routes
  void app.register(requestContextPlugin, { events: container.events });

  // Register routes
  void app.register(healthRoutes, { registry: container.registry });
  void app.register(versionRoutes);
  void app.register(webhookRoutes, { registry: container.registry });
  void app.register(stayRoutes, {
    registry: container.registry,
    stays: container.stays,
    hotels: container.hotels,
  });

  return app;
}
