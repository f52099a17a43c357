import type { Knex } from 'knex';
import { v4 as uuid } from 'uuid';

interface EventRow {
  id: string;
  type: string;
  payload: string;
  request_id: string | null;
  duration_ms: number | null;
  entity_type: string | null;
  entity_id: string | null;
  created_at: string;
}

export interface EventRecord {
  id: string;
  type: string;
  payload: string;
  requestId: string | null;
  durationMs: number | null;
  entityType: string | null;
  entityId: string | null;
  createdAt: Date;
}

export interface CreateEventInput {
  type: string;
  payload: string;
  requestId?: string;
  durationMs?: number;
  entityType?: string;
  entityId?: string;
}

function toRecord(row: EventRow): EventRecord {
  return {
    id: row.id,
    type: row.type,
    payload: row.payload,
    requestId: row.request_id,
    durationMs: row.duration_ms,
    entityType: row.entity_type,
    entityId: row.entity_id,
    createdAt: new Date(row.created_at),
  };
}

/**
 * Data Access Layer for the events table.
 * Accepts a knex instance so it can be tested with isolated DBs.
 */
export class EventsDal {
  constructor(private readonly db: Knex) {}

  async create(data: CreateEventInput): Promise<string> {
    const id = uuid();
    await this.db<EventRow>('events').insert({
      id,
      type: data.type,
      payload: data.payload,
      request_id: data.requestId ?? null,
      duration_ms: data.durationMs ?? null,
      entity_type: data.entityType ?? null,
      entity_id: data.entityId ?? null,
      created_at: new Date().toISOString(),
    });
    return id;
  }

  async findByType(type: string, limit = 100): Promise<EventRecord[]> {
    const rows = await this.db<EventRow>('events')
      .where({ type })
      .orderBy('created_at', 'desc')
      .limit(limit);
    return rows.map(toRecord);
  }

  async findByRequestId(requestId: string): Promise<EventRecord[]> {
    const rows = await this.db<EventRow>('events')
      .where({ request_id: requestId })
      .orderBy('created_at', 'asc');
    return rows.map(toRecord);
  }
}
