import type { Knex } from 'knex';
import { v4 as uuid } from 'uuid';

export const STAY_STATUSES = ['before', 'in_house', 'after', 'cancelled', 'unknown'] as const;
export type StayStatus = (typeof STAY_STATUSES)[number];

interface StayRow {
  id: string;
  hotel_id: string;
  pms_reservation_id: string;
  pms_guest_id: string;
  guest_id: string | null;
  status: string;
  checkin: string;
  checkout: string;
  created_at: string;
  updated_at: string;
}

export interface StayRecord {
  id: string;
  hotelId: string;
  pmsReservationId: string;
  pmsGuestId: string;
  guestId: string | null;
  status: StayStatus;
  checkIn: string; // ISO YYYY-MM-DD
  checkOut: string; // ISO YYYY-MM-DD
  createdAt: Date;
  updatedAt: Date;
}

export interface StayFields {
  hotelId: string;
  pmsReservationId: string;
  pmsGuestId: string;
  guestId: string | null;
  status: StayStatus;
  checkIn: string;
  checkOut: string;
}

function toStatus(value: string): StayStatus {
  return STAY_STATUSES.find((s) => s === value) ?? 'unknown';
}

function toRecord(row: StayRow): StayRecord {
  return {
    id: row.id,
    hotelId: row.hotel_id,
    pmsReservationId: row.pms_reservation_id,
    pmsGuestId: row.pms_guest_id,
    guestId: row.guest_id,
    status: toStatus(row.status),
    checkIn: row.checkin,
    checkOut: row.checkout,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function toColumns(fields: StayFields) {
  return {
    hotel_id: fields.hotelId,
    pms_reservation_id: fields.pmsReservationId,
    pms_guest_id: fields.pmsGuestId,
    guest_id: fields.guestId,
    status: fields.status,
    checkin: fields.checkIn,
    checkout: fields.checkOut,
  };
}

/**
 * Data Access Layer for stays.
 * The vendor reservation id is the natural key and is unique.
 */
export class StayDal {
  constructor(private readonly db: Knex) {}

  async findById(id: string): Promise<StayRecord | null> {
    const row = await this.db<StayRow>('stays').where({ id }).first();
    return row ? toRecord(row) : null;
  }

  async findByReservationId(pmsReservationId: string): Promise<StayRecord | null> {
    const row = await this.db<StayRow>('stays')
      .where({ pms_reservation_id: pmsReservationId })
      .first();
    return row ? toRecord(row) : null;
  }

  /**
   * Insert the stay, or overwrite every mutable field of the one with this
   * reservation id, in one statement. Returns the stay's id.
   */
  async upsertByReservationId(fields: StayFields, now: Date): Promise<string> {
    const [row] = await this.db<StayRow>('stays')
      .insert({
        id: uuid(),
        ...toColumns(fields),
        created_at: now.toISOString(),
        updated_at: now.toISOString(),
      })
      .onConflict('pms_reservation_id')
      .merge([
        'hotel_id',
        'pms_guest_id',
        'guest_id',
        'status',
        'checkin',
        'checkout',
        'updated_at',
      ])
      .returning('id');
    if (!row) {
      throw new Error(`Stay upsert returned no row for reservation ${fields.pmsReservationId}`);
    }
    return row.id;
  }

  async list(): Promise<StayRecord[]> {
    const rows = await this.db<StayRow>('stays').orderBy('checkin', 'asc');
    return rows.map(toRecord);
  }
}
