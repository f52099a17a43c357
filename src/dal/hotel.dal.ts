import type { Knex } from 'knex';
import { v4 as uuid } from 'uuid';

interface HotelRow {
  id: string;
  name: string;
  pms: string;
  pms_hotel_id: string;
  created_at: string;
}

export interface HotelRecord {
  id: string;
  name: string;
  /** Vendor name the hotel is managed in, e.g. "Mews". */
  pms: string;
  pmsHotelId: string;
}

export interface CreateHotelInput {
  name: string;
  pms: string;
  pmsHotelId: string;
}

function toRecord(row: HotelRow): HotelRecord {
  return { id: row.id, name: row.name, pms: row.pms, pmsHotelId: row.pms_hotel_id };
}

/**
 * Data Access Layer for hotels. Reconciliation only reads from it;
 * create() exists for seeding.
 */
export class HotelDal {
  constructor(private readonly db: Knex) {}

  async findById(id: string): Promise<HotelRecord | null> {
    const row = await this.db<HotelRow>('hotels').where({ id }).first();
    return row ? toRecord(row) : null;
  }

  async findByPmsHotelId(pmsHotelId: string): Promise<HotelRecord | null> {
    const row = await this.db<HotelRow>('hotels').where({ pms_hotel_id: pmsHotelId }).first();
    return row ? toRecord(row) : null;
  }

  async create(input: CreateHotelInput, now: Date): Promise<string> {
    const id = uuid();
    await this.db<HotelRow>('hotels').insert({
      id,
      name: input.name,
      pms: input.pms,
      pms_hotel_id: input.pmsHotelId,
      created_at: now.toISOString(),
    });
    return id;
  }
}
