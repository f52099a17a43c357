import type { PmsApi } from '../interfaces/pms';
import defaultFixtures from './fixtures/cloudbeds.json';
import { StubPmsApi, type StubApiOptions } from './stub-api';

export interface CloudbedsFixtures {
  reservations: Array<{ reservation_id: string; start_date: string }>;
  guests: Array<{ guest_id: number | string }>;
}

/**
 * Stub Cloudbeds API. snake_case records, numeric ids, and list
 * responses wrapped in a { data: [...] } envelope.
 */
export class StubCloudbedsApi extends StubPmsApi implements PmsApi {
  constructor(
    private readonly fixtures: CloudbedsFixtures = defaultFixtures,
    options: StubApiOptions = {},
  ) {
    super('Cloudbeds', options);
  }

  async getReservationsForCheckinDate(date: string): Promise<string> {
    return this.respond({
      data: this.fixtures.reservations.filter((r) => r.start_date === date),
    });
  }

  async getReservationDetails(reservationId: string): Promise<string> {
    return this.respond(
      this.fixtures.reservations.find((r) => r.reservation_id === reservationId) ?? {},
    );
  }

  async getGuestDetails(guestId: string): Promise<string> {
    return this.respond(this.fixtures.guests.find((g) => String(g.guest_id) === guestId) ?? {});
  }
}
