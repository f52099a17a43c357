import type { PmsApi } from '../interfaces/pms';
import defaultFixtures from './fixtures/mews.json';
import { StubPmsApi, type StubApiOptions } from './stub-api';

export interface MewsFixtures {
  reservations: Array<{ ReservationId: string; CheckInDate: string }>;
  guests: Array<{ GuestId: string }>;
}

/**
 * Stub Mews API. Serves canned reservations and guests in Mews'
 * PascalCase shape; unknown ids answer with an empty object.
 */
export class StubMewsApi extends StubPmsApi implements PmsApi {
  constructor(
    private readonly fixtures: MewsFixtures = defaultFixtures,
    options: StubApiOptions = {},
  ) {
    super('Mews', options);
  }

  async getReservationsForCheckinDate(date: string): Promise<string> {
    return this.respond(this.fixtures.reservations.filter((r) => r.CheckInDate === date));
  }

  async getReservationDetails(reservationId: string): Promise<string> {
    return this.respond(
      this.fixtures.reservations.find((r) => r.ReservationId === reservationId) ?? {},
    );
  }

  async getGuestDetails(guestId: string): Promise<string> {
    return this.respond(this.fixtures.guests.find((g) => g.GuestId === guestId) ?? {});
  }
}
