import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Knex } from 'knex';
import { GuestDal } from '@/dal/guest.dal';
import { createTestDb } from '../../helpers/db';

const T0 = new Date('2026-10-18T10:00:00.000Z');
const T1 = new Date('2026-10-18T12:00:00.000Z');

describe('GuestDal', () => {
  let db: Knex;
  let dal: GuestDal;

  beforeEach(async () => {
    db = await createTestDb();
    dal = new GuestDal(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('inserts a new guest and returns its id', async () => {
    const id = await dal.upsertByPhone({ name: 'Anna', phone: '+31 0001', language: 'Dutch' }, T0);

    expect(await dal.findById(id)).toEqual({
      id,
      name: 'Anna',
      phone: '+31 0001',
      language: 'Dutch',
      createdAt: T0,
      updatedAt: T0,
    });
  });

  it('finds a guest by exact phone', async () => {
    const id = await dal.upsertByPhone({ name: 'Anna', phone: '+31 0001', language: 'Dutch' }, T0);

    expect((await dal.findByPhone('+31 0001'))?.id).toBe(id);
    expect(await dal.findByPhone('+31 0002')).toBeNull();
  });

  it('updates the guest holding the phone and keeps created_at', async () => {
    const id = await dal.upsertByPhone({ name: 'Anna', phone: '+31 0001', language: 'Dutch' }, T0);

    const again = await dal.upsertByPhone(
      { name: 'Anna B', phone: '+31 0001', language: 'English' },
      T1,
    );

    expect(again).toBe(id);
    expect(await dal.count()).toBe(1);
    expect(await dal.findById(id)).toMatchObject({
      name: 'Anna B',
      language: 'English',
      createdAt: T0,
      updatedAt: T1,
    });
  });

  it('leaves one row when the same phone is written concurrently', async () => {
    const ids = await Promise.all([
      dal.upsertByPhone({ name: 'Anna', phone: '+31 0001', language: 'Dutch' }, T0),
      dal.upsertByPhone({ name: 'Other', phone: '+31 0001', language: 'Dutch' }, T0),
    ]);

    expect(ids[1]).toBe(ids[0]);
    expect(await dal.count()).toBe(1);
  });
});
