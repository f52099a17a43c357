/**
 * Error taxonomy for PMS synchronisation.
 *
 * Batch loops (webhook events, daily pull) skip an item on InvalidValueError
 * or IncorrectHotelIdError and abort on everything else. VendorApiError is
 * retried by PmsApiCaller before it ever reaches a batch loop.
 */

export class PmsSyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Vendor data is present but unusable (missing fields, bad dates, ...). */
export class InvalidValueError extends PmsSyncError {}

/** Body is empty or not a JSON object/array. */
export class MalformedPayloadError extends InvalidValueError {}

/** A stay points at a vendor hotel id we have no Hotel row for. */
export class IncorrectHotelIdError extends PmsSyncError {
  constructor(readonly pmsHotelId: string) {
    super(`Hotel ID not found: ${pmsHotelId}`);
  }
}

/** The vendor API did not answer. Transient; see PmsApiCaller. */
export class VendorApiError extends PmsSyncError {}

/** No adapter is registered for a vendor name the code asked for. */
export class UnknownPmsError extends PmsSyncError {
  constructor(readonly pmsName: string) {
    super(`No PMS adapter registered for "${pmsName}"`);
  }
}

export function isSkippableError(err: unknown): boolean {
  return err instanceof InvalidValueError || err instanceof IncorrectHotelIdError;
}
