import type { Knex } from 'knex';
import { HotelDal, type CreateHotelInput } from '../dal/hotel.dal';
import { systemClock, type Clock } from '../types/common';
import demoHotels from './seed-hotels.json';
import { ensureSchema } from './schema';

/**
 * Insert hotels that are not there yet (matched on pmsHotelId).
 * Returns how many were inserted.
 */
export async function seedHotels(
  db: Knex,
  hotels: readonly CreateHotelInput[] = demoHotels,
  clock: Clock = systemClock,
): Promise<number> {
  await ensureSchema(db);
  const hotelDal = new HotelDal(db);
  let inserted = 0;

  for (const hotel of hotels) {
    if (await hotelDal.findByPmsHotelId(hotel.pmsHotelId)) continue;
    await hotelDal.create(hotel, clock());
    inserted++;
  }

  return inserted;
}
