/**
 * PMS reconciliation constants.
 * Values that operators may tune live in env.ts; these are fixed by the vendor contracts.
 */

export const pmsConfig = {
  /** Registry keys are this prefix followed by the capitalized vendor name. */
  REGISTRY_KEY_PREFIX: 'PMS_',

  /** Phone value vendors send when the guest did not leave a number. */
  PHONE_NOT_AVAILABLE: 'Not available',

  /** Language label used when the country code is missing or unknown. */
  NO_LANGUAGE: 'None',

  /** Local hour at which the daily pull of tomorrow's arrivals runs. */
  DAILY_PULL_HOUR: 0,
} as const;
