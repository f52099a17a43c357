import { z } from 'zod';

/**
 * Source of "now". Reconciliation and scheduling take one of these
 * so timestamps reflect call time and tests can pin the date.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Zod schema for entity IDs in route params (stayId, hotelId, ...).
 */
export const entityIdSchema = z
  .string()
  .min(1, 'ID must not be empty')
  .max(64, 'ID too long');

/**
 * Zod schema for a vendor name in route params.
 */
export const pmsNameSchema = z
  .string()
  .min(1, 'pms must not be empty')
  .max(32, 'pms too long')
  .regex(/^[A-Za-z0-9_-]+$/, 'pms must be alphanumeric');

/** Format a Date as its local calendar date, YYYY-MM-DD. */
export function toIsoDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/** Add calendar days in local time (DST-safe, unlike adding 24h of milliseconds). */
export function addDays(date: Date, days: number): Date {
  const d = new Date(date);
  d.setDate(d.getDate() + days);
  return d;
}
