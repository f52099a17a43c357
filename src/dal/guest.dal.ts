import type { Knex } from 'knex';
import { v4 as uuid } from 'uuid';

interface GuestRow {
  id: string;
  name: string;
  phone: string;
  language: string;
  created_at: string;
  updated_at: string;
}

export interface GuestRecord {
  id: string;
  name: string;
  phone: string;
  language: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface GuestFields {
  name: string;
  phone: string;
  language: string;
}

function toRecord(row: GuestRow): GuestRecord {
  return {
    id: row.id,
    name: row.name,
    phone: row.phone,
    language: row.language,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

/**
 * Data Access Layer for guests.
 * Phone is the natural key; the table enforces it as unique.
 */
export class GuestDal {
  constructor(private readonly db: Knex) {}

  async findById(id: string): Promise<GuestRecord | null> {
    const row = await this.db<GuestRow>('guests').where({ id }).first();
    return row ? toRecord(row) : null;
  }

  async findByPhone(phone: string): Promise<GuestRecord | null> {
    const row = await this.db<GuestRow>('guests').where({ phone }).first();
    return row ? toRecord(row) : null;
  }

  /**
   * Insert the guest, or update the one holding this phone, in one statement.
   * created_at is only written on insert. Returns the guest's id.
   */
  async upsertByPhone(fields: GuestFields, now: Date): Promise<string> {
    const [row] = await this.db<GuestRow>('guests')
      .insert({
        id: uuid(),
        name: fields.name,
        phone: fields.phone,
        language: fields.language,
        created_at: now.toISOString(),
        updated_at: now.toISOString(),
      })
      .onConflict('phone')
      .merge(['name', 'language', 'updated_at'])
      .returning('id');
    if (!row) {
      throw new Error(`Guest upsert returned no row for phone ${fields.phone}`);
    }
    return row.id;
  }

  async count(): Promise<number> {
    const rows = await this.db<GuestRow>('guests').select('id');
    return rows.length;
  }
}
