import { v4 as uuid } from 'uuid';
import { logger } from '../config/logger';
import { pmsConfig } from '../config/pms';
import type { GuestDal } from '../dal/guest.dal';
import type { HotelDal } from '../dal/hotel.dal';
import type { StayDal, StayFields } from '../dal/stay.dal';
import { IncorrectHotelIdError } from '../integrations/errors';
import type { VendorGuest, VendorStay } from '../integrations/interfaces/pms';
import { systemClock, type Clock } from '../types/common';
import { resolveLanguage, type LanguageResolver } from './language.service';

export interface ReconciliationDeps {
  guests: GuestDal;
  stays: StayDal;
  hotels: HotelDal;
  clock?: Clock;
  resolveLanguage?: LanguageResolver;
}

export type StayUpsertAction = 'created' | 'updated';

/**
 * Maps vendor guests and reservations onto our Guest and Stay records.
 * Vendor-agnostic: every PMS adapter funnels its data through here.
 *
 * Guests are keyed by phone, stays by vendor reservation id.
 * Running the same input twice leaves one row per key and only moves updated_at.
 */
export class ReconciliationService {
  private readonly clock: Clock;
  private readonly resolveLanguage: LanguageResolver;

  constructor(private readonly deps: ReconciliationDeps) {
    this.clock = deps.clock ?? systemClock;
    this.resolveLanguage = deps.resolveLanguage ?? resolveLanguage;
  }

  /**
   * Create or update the guest with this phone number.
   * Returns null (and writes nothing) when the vendor gave no usable phone.
   */
  async upsertGuest(guest: VendorGuest): Promise<string | null> {
    const language = this.resolveLanguage(guest.country);
    const phone = guest.phone?.trim();
    if (!phone || phone === pmsConfig.PHONE_NOT_AVAILABLE) {
      logger.debug({ pmsGuestId: guest.pmsGuestId }, 'Guest has no phone, not persisted');
      return null;
    }

    const fields = {
      name: guest.name?.trim() || uuid(),
      phone,
      language,
    };

    return this.deps.guests.upsertByPhone(fields, this.clock());
  }

  /**
   * Create or fully overwrite the stay for this vendor reservation.
   * Throws IncorrectHotelIdError, leaving the table untouched, when the hotel is unknown.
   */
  async upsertStay(stay: VendorStay, guestId: string | null): Promise<StayUpsertAction> {
    const hotel = await this.deps.hotels.findByPmsHotelId(stay.pmsHotelId);
    if (!hotel) {
      throw new IncorrectHotelIdError(stay.pmsHotelId);
    }

    const fields: StayFields = {
      hotelId: hotel.id,
      pmsReservationId: stay.pmsReservationId,
      pmsGuestId: stay.pmsGuestId,
      guestId,
      status: stay.status,
      checkIn: stay.checkIn,
      checkOut: stay.checkOut,
    };

    // The lookup only labels the outcome; the write itself is atomic on the reservation id.
    const existing = await this.deps.stays.findByReservationId(stay.pmsReservationId);
    await this.deps.stays.upsertByReservationId(fields, this.clock());
    return existing ? 'updated' : 'created';
  }

  /** Guest first, so the stay can link to it. */
  async reconcile(guest: VendorGuest, stay: VendorStay): Promise<StayUpsertAction> {
    const guestId = await this.upsertGuest(guest);
    return this.upsertStay(stay, guestId);
  }
}
