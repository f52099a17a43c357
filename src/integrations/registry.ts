import { pmsConfig } from '../config/pms';
import type { IPmsAdapter } from './interfaces/pms';

/** "mews" / "MEWS" / "Mews" → "Mews". */
function capitalize(name: string): string {
  return name.charAt(0).toUpperCase() + name.slice(1).toLowerCase();
}

/** Registry key for a vendor name, e.g. "mews" → "PMS_Mews". */
export function registryKeyFor(pmsName: string): string {
  return `${pmsConfig.REGISTRY_KEY_PREFIX}${capitalize(pmsName)}`;
}

/**
 * Name-keyed lookup of PMS adapters, filled once at startup
 * (see container.ts). Adding a vendor means registering one more adapter.
 */
export class PmsRegistry {
  private readonly adapters = new Map<string, IPmsAdapter>();

  register(adapter: IPmsAdapter): this {
    if (this.adapters.has(adapter.registryKey)) {
      throw new Error(`PMS adapter already registered: ${adapter.registryKey}`);
    }
    this.adapters.set(adapter.registryKey, adapter);
    return this;
  }

  /**
   * Resolve an adapter by vendor name.
   * Returns null if no adapter is registered under that name.
   */
  resolve(pmsName: string): IPmsAdapter | null {
    if (!pmsName) return null;
    return this.adapters.get(registryKeyFor(pmsName)) ?? null;
  }

  list(): IPmsAdapter[] {
    return [...this.adapters.values()];
  }
}
