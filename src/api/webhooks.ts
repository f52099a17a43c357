import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { MalformedPayloadError } from '../integrations/errors';
import type { CleanedPayload } from '../integrations/interfaces/pms';
import type { PmsRegistry } from '../integrations/registry';
import { pmsNameSchema } from '../types/common';

const paramsSchema = z.object({
  pms: pmsNameSchema,
});

export interface WebhookRouteOptions {
  registry: PmsRegistry;
}

/**
 * POST /webhooks/:pms: inbound reservation notifications.
 *
 * The body is handed to the vendor adapter as raw text: each vendor
 * decides what valid JSON looks like, so Fastify's JSON parser is
 * replaced with a pass-through for this plugin only.
 */
export async function webhookRoutes(app: FastifyInstance, opts: WebhookRouteOptions): Promise<void> {
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  app.post<{ Params: { pms: string }; Body: string | undefined }>(
    '/webhooks/:pms',
    async (request, reply) => {
      const params = paramsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
      }

      const adapter = opts.registry.resolve(params.data.pms);
      if (!adapter) {
        return reply
          .status(404)
          .send({ error: 'unknown_pms', message: `No PMS adapter for "${params.data.pms}"` });
      }

      let payload: CleanedPayload;
      try {
        payload = adapter.cleanPayload(typeof request.body === 'string' ? request.body : '');
      } catch (err) {
        if (err instanceof MalformedPayloadError) {
          request.log.warn({ requestId: request.requestId, pms: adapter.pmsName, err }, 'Malformed webhook');
          return reply.status(400).send({ error: 'malformed_payload', message: err.message });
        }
        throw err;
      }

      const ok = await adapter.handleWebhook(payload);
      if (!ok) {
        return reply.status(502).send({ ok: false, error: 'webhook_failed' });
      }

      return reply.send({ ok: true });
    },
  );
}
