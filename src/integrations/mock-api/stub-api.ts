import { VendorApiError } from '../errors';

export interface StubApiOptions {
  /** Probability (0..1) that any single call fails as "API unavailable". */
  failureRate?: number;
  /** Random source, injectable so tests can script failures. */
  random?: () => number;
}

/**
 * Base for in-process vendor API stand-ins. Every call may fail at random
 * with VendorApiError, the way the real vendor endpoints do under load.
 */
export abstract class StubPmsApi {
  private readonly failureRate: number;
  private readonly random: () => number;

  protected constructor(
    private readonly vendor: string,
    options: StubApiOptions = {},
  ) {
    this.failureRate = options.failureRate ?? 0;
    this.random = options.random ?? Math.random;
  }

  /** Serialize a response, or fail as the vendor would. */
  protected async respond(body: unknown): Promise<string> {
    if (this.random() < this.failureRate) {
      throw new VendorApiError(`${this.vendor} API is not available`);
    }
    return JSON.stringify(body);
  }
}
