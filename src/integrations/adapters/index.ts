// Re-export all PMS adapters from a single entry point.
export { BasePmsAdapter, type PmsAdapterDeps } from './base-pms';
export { MewsPmsAdapter } from './mews';
export { CloudbedsPmsAdapter } from './cloudbeds';
