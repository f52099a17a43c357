/**
 * Contract for Property Management System (PMS) integrations.
 * The PMS is the source of truth for reservations and guest details;
 * each vendor gets one adapter implementing IPmsAdapter.
 */
import type { StayRecord, StayStatus } from '../../dal/stay.dal';

/**
 * A vendor response after cleanPayload: valid JSON, object or array,
 * not yet checked for the fields a vendor schema needs.
 */
export type CleanedPayload = Record<string, unknown> | unknown[];

// Guest details as every adapter hands them to reconciliation.
export interface VendorGuest {
  pmsGuestId: string;
  name: string | null;
  phone: string | null;
  country: string | null;
}

// A reservation as every adapter hands it to reconciliation.
export interface VendorStay {
  pmsReservationId: string;
  pmsHotelId: string;
  pmsGuestId: string;
  status: StayStatus;
  checkIn: string; // ISO YYYY-MM-DD
  checkOut: string; // ISO YYYY-MM-DD
}

/**
 * The three remote calls every vendor API offers. Each resolves with raw
 * JSON text or rejects with VendorApiError when the vendor is unavailable.
 */
export interface PmsApi {
  getReservationsForCheckinDate(date: string): Promise<string>;
  getReservationDetails(reservationId: string): Promise<string>;
  getGuestDetails(guestId: string): Promise<string>;
}

export interface IPmsAdapter {
  /** Lookup key in the registry, "PMS_" + capitalized vendor name. */
  readonly registryKey: string;

  /** Short vendor name, e.g. "Mews". */
  readonly pmsName: string;

  /** Parse a raw body into JSON. Throws MalformedPayloadError. */
  cleanPayload(raw: string): CleanedPayload;

  /** Reconcile every event in a webhook delivery. False means the batch was aborted. */
  handleWebhook(payload: CleanedPayload): Promise<boolean>;

  /** Reconcile all reservations checking in tomorrow. */
  pullTomorrowsStays(): Promise<boolean>;

  /** Live breakfast lookup. Null when the vendor cannot tell. */
  stayHasBreakfast(stay: StayRecord): Promise<boolean | null>;
}
