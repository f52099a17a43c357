import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Knex } from 'knex';
import { GuestDal } from '@/dal/guest.dal';
import { HotelDal } from '@/dal/hotel.dal';
import { StayDal } from '@/dal/stay.dal';
import { IncorrectHotelIdError } from '@/integrations/errors';
import type { VendorGuest, VendorStay } from '@/integrations/interfaces/pms';
import { ReconciliationService } from '@/services/reconciliation.service';
import { createTestDb } from '../../helpers/db';

const T0 = new Date('2026-10-18T10:00:00.000Z');
const T1 = new Date('2026-10-18T11:30:00.000Z');

function vendorGuest(overrides: Partial<VendorGuest> = {}): VendorGuest {
  return {
    pmsGuestId: 'g-1',
    name: 'Anna de Vries',
    phone: '+31 6 0000 0001',
    country: 'NL',
    ...overrides,
  };
}

function vendorStay(overrides: Partial<VendorStay> = {}): VendorStay {
  return {
    pmsReservationId: 'res-1',
    pmsHotelId: 'ext-hotel-1',
    pmsGuestId: 'g-1',
    status: 'before',
    checkIn: '2026-10-19',
    checkOut: '2026-10-22',
    ...overrides,
  };
}

describe('ReconciliationService', () => {
  let db: Knex;
  let guests: GuestDal;
  let stays: StayDal;
  let hotels: HotelDal;
  let hotelId: string;
  let now: Date;
  let service: ReconciliationService;

  beforeEach(async () => {
    db = await createTestDb();
    guests = new GuestDal(db);
    stays = new StayDal(db);
    hotels = new HotelDal(db);
    hotelId = await hotels.create({ name: 'Test Hotel', pms: 'Mews', pmsHotelId: 'ext-hotel-1' }, T0);
    now = T0;
    service = new ReconciliationService({ guests, stays, hotels, clock: () => now });
  });

  afterEach(async () => {
    await db.destroy();
  });

  describe('upsertGuest', () => {
    it('does not persist a guest without a phone', async () => {
      expect(await service.upsertGuest(vendorGuest({ phone: null }))).toBeNull();
      expect(await service.upsertGuest(vendorGuest({ phone: '' }))).toBeNull();
      expect(await service.upsertGuest(vendorGuest({ phone: '   ' }))).toBeNull();
      expect(await guests.count()).toBe(0);
    });

    it('does not persist a guest whose phone is "Not available"', async () => {
      expect(await service.upsertGuest(vendorGuest({ phone: 'Not available' }))).toBeNull();
      expect(await guests.count()).toBe(0);
    });

    it('creates a guest with resolved language and timestamps', async () => {
      const id = await service.upsertGuest(vendorGuest());

      expect(id).not.toBeNull();
      const guest = await guests.findById(id ?? '');
      expect(guest).toEqual({
        id,
        name: 'Anna de Vries',
        phone: '+31 6 0000 0001',
        language: 'Dutch',
        createdAt: T0,
        updatedAt: T0,
      });
    });

    it('keeps one guest per phone and applies the latest details', async () => {
      const first = await service.upsertGuest(vendorGuest());
      now = T1;
      const second = await service.upsertGuest(
        vendorGuest({ pmsGuestId: 'g-2', name: 'Anna Jansen', country: 'DE' }),
      );

      expect(second).toBe(first);
      expect(await guests.count()).toBe(1);

      const guest = await guests.findByPhone('+31 6 0000 0001');
      expect(guest?.name).toBe('Anna Jansen');
      expect(guest?.language).toBe('German');
      expect(guest?.createdAt).toEqual(T0);
      expect(guest?.updatedAt).toEqual(T1);
    });

    it('matches phones after trimming', async () => {
      const first = await service.upsertGuest(vendorGuest());
      const second = await service.upsertGuest(vendorGuest({ phone: ' +31 6 0000 0001 ' }));
      expect(second).toBe(first);
    });

    it('generates a placeholder name when the vendor sends none', async () => {
      const id = await service.upsertGuest(vendorGuest({ name: '' }));
      const guest = await guests.findById(id ?? '');
      expect(guest?.name).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    });

    it('uses None as language for an unknown country', async () => {
      const id = await service.upsertGuest(vendorGuest({ country: null }));
      expect((await guests.findById(id ?? ''))?.language).toBe('None');
    });
  });

  describe('upsertStay', () => {
    it('rejects a stay for an unknown hotel and writes nothing', async () => {
      await expect(
        service.upsertStay(vendorStay({ pmsHotelId: 'nope' }), null),
      ).rejects.toBeInstanceOf(IncorrectHotelIdError);
      expect(await stays.list()).toEqual([]);
    });

    it('creates a stay linked to the internal hotel', async () => {
      const action = await service.upsertStay(vendorStay(), null);

      expect(action).toBe('created');
      const stay = await stays.findByReservationId('res-1');
      expect(stay).toMatchObject({
        hotelId,
        pmsReservationId: 'res-1',
        pmsGuestId: 'g-1',
        guestId: null,
        status: 'before',
        checkIn: '2026-10-19',
        checkOut: '2026-10-22',
        createdAt: T0,
        updatedAt: T0,
      });
    });

    it('is idempotent: same input twice leaves one stay and only moves updatedAt', async () => {
      await service.upsertStay(vendorStay(), null);
      const before = await stays.findByReservationId('res-1');

      now = T1;
      const action = await service.upsertStay(vendorStay(), null);
      const after = await stays.findByReservationId('res-1');

      expect(action).toBe('updated');
      expect(await stays.list()).toHaveLength(1);
      expect(after).toEqual({ ...before, updatedAt: T1 });
    });

    it('overwrites status, dates and guest link on a later sighting', async () => {
      await service.upsertStay(vendorStay(), null);
      const guestId = await service.upsertGuest(vendorGuest());

      now = T1;
      await service.upsertStay(
        vendorStay({ status: 'in_house', checkIn: '2026-10-20', checkOut: '2026-10-23' }),
        guestId,
      );

      const stay = await stays.findByReservationId('res-1');
      expect(stay).toMatchObject({
        guestId,
        status: 'in_house',
        checkIn: '2026-10-20',
        checkOut: '2026-10-23',
        createdAt: T0,
        updatedAt: T1,
      });
    });
  });

  describe('reconcile', () => {
    it('upserts the guest first and links the stay to it', async () => {
      await service.reconcile(vendorGuest(), vendorStay());

      const guest = await guests.findByPhone('+31 6 0000 0001');
      const stay = await stays.findByReservationId('res-1');
      expect(stay?.guestId).toBe(guest?.id);
    });

    it('stores the stay without a guest link when the guest has no phone', async () => {
      await service.reconcile(vendorGuest({ phone: 'Not available' }), vendorStay());

      const stay = await stays.findByReservationId('res-1');
      expect(stay?.guestId).toBeNull();
      expect(await guests.count()).toBe(0);
    });
  });
});
