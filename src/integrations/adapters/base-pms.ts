import { logger } from '../../config/logger';
import { pmsConfig } from '../../config/pms';
import type { EventsDal } from '../../dal/events.dal';
import type { StayRecord } from '../../dal/stay.dal';
import type { ReconciliationService } from '../../services/reconciliation.service';
import { logEvent } from '../../services/telemetry.service';
import { startTimer } from '../../telemetry/timing';
import { addDays, systemClock, toIsoDate, type Clock } from '../../types/common';
import {
  InvalidValueError,
  MalformedPayloadError,
  VendorApiError,
  isSkippableError,
} from '../errors';
import type {
  CleanedPayload,
  IPmsAdapter,
  PmsApi,
  VendorGuest,
  VendorStay,
} from '../interfaces/pms';
import type { PmsApiCaller } from '../retry';

export interface PmsAdapterDeps {
  api: PmsApi;
  caller: PmsApiCaller;
  reconciliation: ReconciliationService;
  events: EventsDal;
  clock?: Clock;
}

type BatchKind = 'webhook' | 'pull';

type BatchOutcome = {
  total: number;
  processed: number;
  skipped: number;
};

function isCleanedPayload(value: unknown): value is CleanedPayload {
  return typeof value === 'object' && value !== null;
}

/**
 * Shared behaviour of every PMS adapter: JSON cleaning, the webhook and
 * daily-pull loops, and the per-item error policy.
 *
 * Vendors only describe their payloads: how to read reservation ids out of
 * a webhook, how to unwrap a reservation list, and how to map a reservation
 * and a guest onto VendorStay / VendorGuest.
 *
 * Per-item policy: InvalidValueError and IncorrectHotelIdError skip the item;
 * any other error (VendorApiError after retries included) aborts the batch
 * and the batch reports false.
 */
export abstract class BasePmsAdapter implements IPmsAdapter {
  abstract readonly registryKey: string;

  protected readonly clock: Clock;

  constructor(protected readonly deps: PmsAdapterDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  get pmsName(): string {
    return this.registryKey.slice(pmsConfig.REGISTRY_KEY_PREFIX.length);
  }

  protected abstract parseWebhookReservationIds(payload: CleanedPayload): string[];
  protected abstract parseReservationList(payload: CleanedPayload): unknown[];
  protected abstract toVendorStay(payload: unknown): VendorStay;
  protected abstract toVendorGuest(payload: unknown): VendorGuest;
  protected abstract breakfastOf(payload: CleanedPayload): boolean | null;

  cleanPayload(raw: string): CleanedPayload {
    if (!raw || !raw.trim()) {
      throw new MalformedPayloadError('Incorrect json input: payload is empty');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new MalformedPayloadError('Incorrect json input: payload is not valid JSON', {
        cause: err,
      });
    }

    if (!isCleanedPayload(parsed)) {
      throw new MalformedPayloadError('Incorrect json input: expected an object or array');
    }
    return parsed;
  }

  async handleWebhook(payload: CleanedPayload): Promise<boolean> {
    let reservationIds: string[];
    try {
      reservationIds = this.parseWebhookReservationIds(payload);
    } catch (err) {
      logger.warn({ pms: this.pmsName, err }, 'Webhook payload rejected');
      await this.recordOutcome('webhook', false, { total: 0, processed: 0, skipped: 0 });
      return false;
    }

    return this.runBatch('webhook', reservationIds, async (reservationId) => {
      const stay = await this.fetchReservation(reservationId);
      const guest = await this.fetchGuest(stay.pmsGuestId);
      await this.deps.reconciliation.reconcile(guest, stay);
    });
  }

  async pullTomorrowsStays(): Promise<boolean> {
    const checkinDate = toIsoDate(addDays(this.clock(), 1));

    let reservations: unknown[];
    try {
      const payload = await this.deps.caller.callWithRetry(
        this.pmsName,
        (date: string) => this.deps.api.getReservationsForCheckinDate(date),
        checkinDate,
      );
      reservations = this.parseReservationList(payload);
    } catch (err) {
      logger.error({ pms: this.pmsName, checkinDate, err }, 'Could not fetch tomorrow\'s reservations');
      await this.recordOutcome('pull', false, { total: 0, processed: 0, skipped: 0 });
      return false;
    }

    return this.runBatch('pull', reservations, async (item) => {
      const stay = this.toVendorStay(item);
      const guest = await this.fetchGuest(stay.pmsGuestId);
      await this.deps.reconciliation.reconcile(guest, stay);
    });
  }

  async stayHasBreakfast(stay: StayRecord): Promise<boolean | null> {
    try {
      const payload = await this.deps.caller.callWithRetry(
        this.pmsName,
        (reservationId: string) => this.deps.api.getReservationDetails(reservationId),
        stay.pmsReservationId,
      );
      return this.breakfastOf(payload);
    } catch (err) {
      if (err instanceof VendorApiError || err instanceof InvalidValueError) {
        logger.warn({ pms: this.pmsName, stayId: stay.id, err }, 'Breakfast status unknown');
        return null;
      }
      throw err;
    }
  }

  protected async fetchReservation(reservationId: string): Promise<VendorStay> {
    const payload = await this.deps.caller.callWithRetry(
      this.pmsName,
      (id: string) => this.deps.api.getReservationDetails(id),
      reservationId,
    );
    return this.toVendorStay(payload);
  }

  protected async fetchGuest(pmsGuestId: string): Promise<VendorGuest> {
    const payload = await this.deps.caller.callWithRetry(
      this.pmsName,
      (id: string) => this.deps.api.getGuestDetails(id),
      pmsGuestId,
    );
    return this.toVendorGuest(payload);
  }

  private async runBatch<T>(
    kind: BatchKind,
    items: readonly T[],
    handle: (item: T) => Promise<void>,
  ): Promise<boolean> {
    const timer = startTimer(`pms.${kind}`, { pms: this.pmsName });
    const outcome: BatchOutcome = { total: items.length, processed: 0, skipped: 0 };
    let ok = true;

    for (const item of items) {
      try {
        await handle(item);
        outcome.processed++;
      } catch (err) {
        if (isSkippableError(err)) {
          outcome.skipped++;
          logger.warn({ pms: this.pmsName, kind, err }, 'Skipping PMS item');
          continue;
        }
        logger.error({ pms: this.pmsName, kind, err }, 'PMS batch aborted');
        ok = false;
        break;
      }
    }

    await this.recordOutcome(kind, ok, outcome, timer.stop(outcome));
    return ok;
  }

  private async recordOutcome(
    kind: BatchKind,
    ok: boolean,
    outcome: BatchOutcome,
    durationMs?: number,
  ): Promise<void> {
    logger.info({ pms: this.pmsName, kind, ok, ...outcome }, `pms.${kind}.completed`);
    await logEvent(this.deps.events, {
      type: `pms.${kind}.completed`,
      payload: { pms: this.pmsName, ok, ...outcome },
      durationMs,
    });
  }
}
