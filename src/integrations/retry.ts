import { logger } from '../config/logger';
import { UnknownPmsError, VendorApiError } from './errors';
import type { CleanedPayload } from './interfaces/pms';
import type { PmsRegistry } from './registry';

export type RemoteCall<P> = (params: P) => Promise<string>;

export interface PmsApiCallerOptions {
  /** Total attempts, first call included. */
  maxAttempts: number;
}

/**
 * Calls a vendor API and cleans the response with that vendor's adapter,
 * retrying immediately on VendorApiError up to maxAttempts.
 *
 * Only VendorApiError is retried. Cleaning errors and anything else
 * propagate on the first occurrence.
 */
export class PmsApiCaller {
  constructor(
    private readonly registry: PmsRegistry,
    private readonly options: PmsApiCallerOptions,
  ) {}

  async callWithRetry<P>(
    pmsName: string,
    remoteCall: RemoteCall<P>,
    params: P,
  ): Promise<CleanedPayload> {
    const adapter = this.registry.resolve(pmsName);
    if (!adapter) {
      throw new UnknownPmsError(pmsName);
    }

    let lastError: VendorApiError | undefined;

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      let raw: string;
      try {
        raw = await remoteCall(params);
      } catch (err) {
        if (!(err instanceof VendorApiError)) throw err;
        lastError = err;
        logger.warn(
          { pms: adapter.pmsName, attempt, maxAttempts: this.options.maxAttempts, err },
          'PMS API unavailable, retrying',
        );
        continue;
      }

      return adapter.cleanPayload(raw);
    }

    throw new VendorApiError(
      `${adapter.pmsName} API unavailable after ${this.options.maxAttempts} attempts`,
      { cause: lastError },
    );
  }
}
