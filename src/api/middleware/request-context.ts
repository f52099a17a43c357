import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { v4 as uuid } from 'uuid';
import type { EventsDal } from '../../dal/events.dal';
import { logEvent } from '../../services/telemetry.service';

declare module 'fastify' {
  interface FastifyRequest {
    requestId: string;
  }
}

export interface RequestContextOptions {
  events: EventsDal;
}

/**
 * Fastify plugin: attaches a request_id to every request (honouring an
 * incoming x-request-id) and records api.request.start / api.request.end
 * with route, status_code and duration_ms.
 */
async function requestContextPlugin(
  app: FastifyInstance,
  opts: RequestContextOptions,
): Promise<void> {
  app.decorateRequest('requestId', '');

  app.addHook('onRequest', async (request: FastifyRequest) => {
    const header = request.headers['x-request-id'];
    request.requestId = typeof header === 'string' && header ? header : uuid();
  });

  app.addHook('preHandler', async (request: FastifyRequest) => {
    const route = request.routeOptions?.url ?? request.url;
    request.log.info(
      { requestId: request.requestId, route, method: request.method },
      'api.request.start',
    );

    // Fire-and-forget; logEvent never rejects.
    void logEvent(opts.events, {
      type: 'api.request.start',
      payload: { route, method: request.method },
      requestId: request.requestId,
    });
  });

  app.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
    const durationMs = Math.round(reply.elapsedTime);
    const route = request.routeOptions?.url ?? request.url;

    request.log.info(
      {
        requestId: request.requestId,
        route,
        method: request.method,
        statusCode: reply.statusCode,
        durationMs,
      },
      'api.request.end',
    );

    void logEvent(opts.events, {
      type: 'api.request.end',
      payload: { route, method: request.method, statusCode: reply.statusCode },
      requestId: request.requestId,
      durationMs,
    });
  });
}

export default fp(requestContextPlugin, {
  name: 'request-context',
});
