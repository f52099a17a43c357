import type { StayStatus } from '../../dal/stay.dal';
import type { CleanedPayload, VendorGuest, VendorStay } from '../interfaces/pms';
import {
  mewsBreakfastSchema,
  mewsGuestSchema,
  mewsReservationListSchema,
  mewsReservationSchema,
  mewsWebhookSchema,
  parseVendorPayload,
} from '../validation';
import { BasePmsAdapter } from './base-pms';

// Mews reservation states → our stay status.
const STATUS_MAP: Record<string, StayStatus> = {
  enquired: 'before',
  optional: 'before',
  confirmed: 'before',
  started: 'in_house',
  processed: 'after',
  canceled: 'cancelled',
};

/**
 * Mews adapter. Webhooks arrive as { Events: [{ Value: { ReservationId } }] };
 * reservation and guest details come back PascalCased.
 */
export class MewsPmsAdapter extends BasePmsAdapter {
  readonly registryKey = 'PMS_Mews';

  protected parseWebhookReservationIds(payload: CleanedPayload): string[] {
    const webhook = parseVendorPayload(mewsWebhookSchema, payload, 'Mews webhook');
    return webhook.Events.map((event) => event.Value.ReservationId);
  }

  protected parseReservationList(payload: CleanedPayload): unknown[] {
    return parseVendorPayload(mewsReservationListSchema, payload, 'Mews reservation list');
  }

  protected toVendorStay(payload: unknown): VendorStay {
    const r = parseVendorPayload(mewsReservationSchema, payload, 'Mews reservation');
    return {
      pmsReservationId: r.ReservationId,
      pmsHotelId: r.HotelId,
      pmsGuestId: r.GuestId,
      status: STATUS_MAP[r.Status.toLowerCase()] ?? 'unknown',
      checkIn: r.CheckInDate,
      checkOut: r.CheckOutDate,
    };
  }

  protected toVendorGuest(payload: unknown): VendorGuest {
    const g = parseVendorPayload(mewsGuestSchema, payload, 'Mews guest');
    return {
      pmsGuestId: g.GuestId,
      name: g.Name ?? null,
      phone: g.Phone ?? null,
      country: g.Country ?? null,
    };
  }

  protected breakfastOf(payload: CleanedPayload): boolean | null {
    return parseVendorPayload(mewsBreakfastSchema, payload, 'Mews reservation').BreakfastIncluded ?? null;
  }
}
