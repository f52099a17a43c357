import type { Knex } from 'knex';
import { env } from './config/env';
import { EventsDal } from './dal/events.dal';
import { GuestDal } from './dal/guest.dal';
import { HotelDal } from './dal/hotel.dal';
import { StayDal } from './dal/stay.dal';
import { CloudbedsPmsAdapter, MewsPmsAdapter } from './integrations/adapters';
import type { PmsApi } from './integrations/interfaces/pms';
import { StubCloudbedsApi } from './integrations/mock-api/stub-cloudbeds';
import { StubMewsApi } from './integrations/mock-api/stub-mews';
import { PmsRegistry } from './integrations/registry';
import { PmsApiCaller } from './integrations/retry';
import { ReconciliationService } from './services/reconciliation.service';
import { systemClock, type Clock } from './types/common';

export interface Container {
  db: Knex;
  clock: Clock;
  guests: GuestDal;
  stays: StayDal;
  hotels: HotelDal;
  events: EventsDal;
  reconciliation: ReconciliationService;
  registry: PmsRegistry;
  caller: PmsApiCaller;
}

export interface ContainerOptions {
  clock?: Clock;
  maxAttempts?: number;
  /** Vendor APIs to use instead of the in-process stubs. */
  apis?: { mews?: PmsApi; cloudbeds?: PmsApi };
}

/**
 * Wire DALs, reconciliation, the retrying caller and every PMS adapter
 * around one knex instance. The registry is filled here, once, at startup.
 */
export function buildContainer(db: Knex, options: ContainerOptions = {}): Container {
  const clock = options.clock ?? systemClock;
  const guests = new GuestDal(db);
  const stays = new StayDal(db);
  const hotels = new HotelDal(db);
  const events = new EventsDal(db);

  const reconciliation = new ReconciliationService({ guests, stays, hotels, clock });
  const registry = new PmsRegistry();
  const caller = new PmsApiCaller(registry, {
    maxAttempts: options.maxAttempts ?? env.PMS_API_MAX_ATTEMPTS,
  });

  const stubOptions = { failureRate: env.MOCK_API_FAILURE_RATE };
  const shared = { caller, reconciliation, events, clock };

  registry
    .register(
      new MewsPmsAdapter({
        ...shared,
        api: options.apis?.mews ?? new StubMewsApi(undefined, stubOptions),
      }),
    )
    .register(
      new CloudbedsPmsAdapter({
        ...shared,
        api: options.apis?.cloudbeds ?? new StubCloudbedsApi(undefined, stubOptions),
      }),
    );

  return { db, clock, guests, stays, hotels, events, reconciliation, registry, caller };
}
