import type { StayStatus } from '../../dal/stay.dal';
import type { CleanedPayload, VendorGuest, VendorStay } from '../interfaces/pms';
import {
  cloudbedsGuestSchema,
  cloudbedsMealPlanSchema,
  cloudbedsReservationListSchema,
  cloudbedsReservationSchema,
  cloudbedsWebhookSchema,
  parseVendorPayload,
} from '../validation';
import { BasePmsAdapter } from './base-pms';

const STATUS_MAP: Record<string, StayStatus> = {
  not_confirmed: 'before',
  confirmed: 'before',
  checked_in: 'in_house',
  checked_out: 'after',
  canceled: 'cancelled',
  no_show: 'cancelled',
};

// Meal plans that include breakfast. Anything else that is set means no breakfast.
const BREAKFAST_PLANS = new Set(['breakfast', 'half_board', 'full_board', 'all_inclusive']);

/**
 * Cloudbeds adapter. Webhooks carry { notifications: [{ reservation_id }] },
 * lists are wrapped in { data }, and guest names come split in two.
 */
export class CloudbedsPmsAdapter extends BasePmsAdapter {
  readonly registryKey = 'PMS_Cloudbeds';

  protected parseWebhookReservationIds(payload: CleanedPayload): string[] {
    const webhook = parseVendorPayload(cloudbedsWebhookSchema, payload, 'Cloudbeds webhook');
    return webhook.notifications.map((n) => n.reservation_id);
  }

  protected parseReservationList(payload: CleanedPayload): unknown[] {
    return parseVendorPayload(cloudbedsReservationListSchema, payload, 'Cloudbeds reservation list')
      .data;
  }

  protected toVendorStay(payload: unknown): VendorStay {
    const r = parseVendorPayload(cloudbedsReservationSchema, payload, 'Cloudbeds reservation');
    return {
      pmsReservationId: r.reservation_id,
      pmsHotelId: r.property_id,
      pmsGuestId: r.guest_id,
      status: STATUS_MAP[r.status.toLowerCase()] ?? 'unknown',
      checkIn: r.start_date,
      checkOut: r.end_date,
    };
  }

  protected toVendorGuest(payload: unknown): VendorGuest {
    const g = parseVendorPayload(cloudbedsGuestSchema, payload, 'Cloudbeds guest');
    const name = [g.first_name, g.last_name].filter(Boolean).join(' ');
    return {
      pmsGuestId: g.guest_id,
      name: name || null,
      phone: g.phone ?? null,
      country: g.country_code ?? null,
    };
  }

  protected breakfastOf(payload: CleanedPayload): boolean | null {
    const { meal_plan } = parseVendorPayload(cloudbedsMealPlanSchema, payload, 'Cloudbeds reservation');
    if (!meal_plan) return null;
    return BREAKFAST_PLANS.has(meal_plan.toLowerCase());
  }
}
