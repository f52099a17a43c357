/**
 * Zod schemas for vendor payloads.
 * cleanPayload only guarantees JSON; these decide whether the JSON carries
 * the fields reconciliation needs. A failed parse is an InvalidValueError,
 * which batch loops treat as a skippable item.
 */
import { z } from 'zod';
import { InvalidValueError } from './errors';

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

const idField = z.string().min(1);
const isoDateField = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be ISO YYYY-MM-DD');
const optionalText = z.string().nullish();

/** Parse a cleaned payload against a vendor schema, or throw InvalidValueError. */
export function parseVendorPayload<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  payload: unknown,
  label: string,
): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InvalidValueError(`Invalid ${label}: ${detail}`, { cause: result.error });
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Mews
// ---------------------------------------------------------------------------

export const mewsWebhookSchema = z.object({
  Action: z.string().optional(),
  Events: z.array(
    z.object({
      Name: z.string().optional(),
      Value: z.object({ ReservationId: idField }),
    }),
  ),
});

export const mewsReservationSchema = z
  .object({
    ReservationId: idField,
    HotelId: idField,
    GuestId: idField,
    Status: z.string().min(1),
    CheckInDate: isoDateField,
    CheckOutDate: isoDateField,
    BreakfastIncluded: z.boolean().nullish(),
  })
  .refine((r) => r.CheckOutDate >= r.CheckInDate, {
    message: 'CheckOutDate must not precede CheckInDate',
    path: ['CheckOutDate'],
  });

// Items are checked one by one so a single bad reservation is skipped, not the whole list.
export const mewsReservationListSchema = z.array(z.unknown());

// Breakfast lookups only need this one field.
export const mewsBreakfastSchema = z.object({
  BreakfastIncluded: z.boolean().nullish(),
});

export const mewsGuestSchema = z.object({
  GuestId: idField,
  Name: optionalText,
  Phone: optionalText,
  Country: optionalText,
});

// ---------------------------------------------------------------------------
// Cloudbeds
// ---------------------------------------------------------------------------

// Cloudbeds sends numeric property ids; we key hotels by their string form.
const cloudbedsIdField = z.union([idField, z.number().int()]).transform(String);

export const cloudbedsWebhookSchema = z.object({
  notifications: z.array(
    z.object({
      event: z.string().optional(),
      reservation_id: cloudbedsIdField,
    }),
  ),
});

export const cloudbedsReservationSchema = z
  .object({
    reservation_id: cloudbedsIdField,
    property_id: cloudbedsIdField,
    guest_id: cloudbedsIdField,
    status: z.string().min(1),
    start_date: isoDateField,
    end_date: isoDateField,
    meal_plan: optionalText,
  })
  .refine((r) => r.end_date >= r.start_date, {
    message: 'end_date must not precede start_date',
    path: ['end_date'],
  });

export const cloudbedsReservationListSchema = z.object({
  data: z.array(z.unknown()),
});

export const cloudbedsMealPlanSchema = z.object({
  meal_plan: optionalText,
});

export const cloudbedsGuestSchema = z.object({
  guest_id: cloudbedsIdField,
  first_name: optionalText,
  last_name: optionalText,
  phone: optionalText,
  country_code: optionalText,
});

