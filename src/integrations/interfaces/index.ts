// Re-export all integration interfaces from a single entry point.
export type {
  IPmsAdapter,
  PmsApi,
  CleanedPayload,
  VendorGuest,
  VendorStay,
} from './pms';
