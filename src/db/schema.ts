import type { Knex } from 'knex';

/**
 * Create the tables this service owns if they are missing.
 * Called on server start and by every test that needs a database.
 */
export async function ensureSchema(db: Knex): Promise<void> {
  if (!(await db.schema.hasTable('hotels'))) {
    await db.schema.createTable('hotels', (t) => {
      t.string('id').primary();
      t.string('name').notNullable();
      t.string('pms').notNullable();
      t.string('pms_hotel_id').notNullable().unique();
      t.string('created_at').notNullable();
    });
  }

  if (!(await db.schema.hasTable('guests'))) {
    await db.schema.createTable('guests', (t) => {
      t.string('id').primary();
      t.string('name').notNullable();
      t.string('phone').notNullable().unique();
      t.string('language').notNullable();
      t.string('created_at').notNullable();
      t.string('updated_at').notNullable();
    });
  }

  if (!(await db.schema.hasTable('stays'))) {
    await db.schema.createTable('stays', (t) => {
      t.string('id').primary();
      t.string('hotel_id').notNullable().references('id').inTable('hotels');
      t.string('pms_reservation_id').notNullable().unique();
      t.string('pms_guest_id').notNullable();
      t.string('guest_id').nullable().references('id').inTable('guests');
      t.string('status').notNullable();
      t.string('checkin').notNullable();
      t.string('checkout').notNullable();
      t.string('created_at').notNullable();
      t.string('updated_at').notNullable();
      t.index(['checkin']);
    });
  }

  if (!(await db.schema.hasTable('events'))) {
    await db.schema.createTable('events', (t) => {
      t.string('id').primary();
      t.string('type').notNullable();
      t.text('payload').notNullable();
      t.string('request_id').nullable();
      t.integer('duration_ms').nullable();
      t.string('entity_type').nullable();
      t.string('entity_id').nullable();
      t.string('created_at').notNullable();
      t.index(['type']);
    });
  }
}
