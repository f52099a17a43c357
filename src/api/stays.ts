import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { HotelDal } from '../dal/hotel.dal';
import type { StayDal } from '../dal/stay.dal';
import type { PmsRegistry } from '../integrations/registry';
import { entityIdSchema } from '../types/common';

const stayParamSchema = z.object({
  stayId: entityIdSchema,
});

export interface StayRouteOptions {
  registry: PmsRegistry;
  stays: StayDal;
  hotels: HotelDal;
}

/**
 * GET /stays/:stayId/breakfast: asks the hotel's PMS live whether the
 * stay includes breakfast. The answer is never stored; null means the
 * PMS could not say.
 */
export async function stayRoutes(app: FastifyInstance, opts: StayRouteOptions): Promise<void> {
  app.get<{ Params: { stayId: string } }>('/stays/:stayId/breakfast', async (request, reply) => {
    const params = stayParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'invalid_params', message: params.error.message });
    }

    const stay = await opts.stays.findById(params.data.stayId);
    if (!stay) {
      return reply.status(404).send({ error: 'stay_not_found' });
    }

    const hotel = await opts.hotels.findById(stay.hotelId);
    const adapter = hotel ? opts.registry.resolve(hotel.pms) : null;
    if (!adapter) {
      return reply
        .status(409)
        .send({ error: 'pms_unavailable', message: 'No PMS adapter for this stay\'s hotel' });
    }

    const hasBreakfast = await adapter.stayHasBreakfast(stay);
    return reply.send({ stayId: stay.id, hasBreakfast });
  });
}
