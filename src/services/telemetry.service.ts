import { logger } from '../config/logger';
import type { EventsDal } from '../dal/events.dal';

export interface LogEventInput {
  type: string;
  payload?: Record<string, unknown>;
  requestId?: string;
  durationMs?: number;
  entityType?: string;
  entityId?: string;
}

/**
 * Write a structured telemetry event to the events table.
 * Never throws: a failed write is logged and resolves to null.
 */
export async function logEvent(
  eventsDal: EventsDal,
  input: LogEventInput,
): Promise<string | null> {
  try {
    const eventId = await eventsDal.create({
      type: input.type,
      payload: JSON.stringify(input.payload ?? {}),
      requestId: input.requestId,
      durationMs: input.durationMs,
      entityType: input.entityType,
      entityId: input.entityId,
    });

    logger.debug({ eventId, type: input.type }, 'Telemetry event recorded');
    return eventId;
  } catch (err) {
    logger.error({ err, eventType: input.type }, 'Failed to write telemetry event');
    return null;
  }
}
