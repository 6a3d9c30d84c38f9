/**
 * @fileoverview K-line frequency definitions and the table that drives them.
 *
 * Every frequency-dependent decision (provider code, requested fields,
 * percent-change strategy, display wording) is read from FREQUENCY_TABLE so
 * that no caller branches on raw frequency strings.
 *
 * @module @ashare/contracts/frequency
 */

/**
 * Supported K-line bar frequencies.
 *
 * @example
 * ```typescript
 * const freq = Frequency.D1;
 * FREQUENCY_TABLE[freq].providerCode; // 'd'
 * ```
 */
export enum Frequency {
  /** 5-minute bars */
  M5 = '5m',
  /** 15-minute bars */
  M15 = '15m',
  /** 30-minute bars */
  M30 = '30m',
  /** 60-minute bars */
  M60 = '60m',
  /** Daily bars */
  D1 = 'd',
  /** Weekly bars */
  W1 = 'w',
  /** Monthly bars */
  MN1 = 'M',
}

/** Coarse grouping used for field selection and period counting. */
export type FrequencyKind = 'minute' | 'daily' | 'period';

/**
 * How the per-bar percent change is obtained.
 * - `provided`: read from the bar's own pctChange
 * - `derived`: computed from consecutive closes
 * - `none`: not meaningful, every bar counts as flat
 */
export type ChangeStrategy = 'provided' | 'derived' | 'none';

/** Unit used when counting periods for display. */
export type PeriodUnit = 'day' | 'week' | 'month';

export interface FrequencySpec {
  readonly frequency: Frequency;
  /** CLI token */
  readonly key: string;
  /** Code sent to the provider's history query */
  readonly providerCode: string;
  readonly kind: FrequencyKind;
  /** Provider field list, in request order */
  readonly fields: readonly string[];
  readonly changeStrategy: ChangeStrategy;
  /** Human-readable label, e.g. "daily" or "5-minute" */
  readonly label: string;
  readonly periodUnit: PeriodUnit;
}

const MINUTE_FIELDS = [
  'date',
  'time',
  'code',
  'open',
  'high',
  'low',
  'close',
  'volume',
  'amount',
  'adjustflag',
] as const;

const DAILY_FIELDS = [
  'date',
  'code',
  'open',
  'high',
  'low',
  'close',
  'preclose',
  'volume',
  'amount',
  'adjustflag',
  'turn',
  'tradestatus',
  'pctChg',
  'isST',
] as const;

const PERIOD_FIELDS = [
  'date',
  'code',
  'open',
  'high',
  'low',
  'close',
  'volume',
  'amount',
  'adjustflag',
] as const;

function minute(frequency: Frequency, minutes: number): FrequencySpec {
  return {
    frequency,
    key: frequency,
    providerCode: String(minutes),
    kind: 'minute',
    fields: MINUTE_FIELDS,
    changeStrategy: 'none',
    label: `${minutes}-minute`,
    periodUnit: 'day',
  };
}

/**
 * Single source of truth for frequency behaviour.
 */
export const FREQUENCY_TABLE: Readonly<Record<Frequency, FrequencySpec>> = {
  [Frequency.M5]: minute(Frequency.M5, 5),
  [Frequency.M15]: minute(Frequency.M15, 15),
  [Frequency.M30]: minute(Frequency.M30, 30),
  [Frequency.M60]: minute(Frequency.M60, 60),
  [Frequency.D1]: {
    frequency: Frequency.D1,
    key: Frequency.D1,
    providerCode: 'd',
    kind: 'daily',
    fields: DAILY_FIELDS,
    changeStrategy: 'provided',
    label: 'daily',
    periodUnit: 'day',
  },
  [Frequency.W1]: {
    frequency: Frequency.W1,
    key: Frequency.W1,
    providerCode: 'w',
    kind: 'period',
    fields: PERIOD_FIELDS,
    changeStrategy: 'derived',
    label: 'weekly',
    periodUnit: 'week',
  },
  [Frequency.MN1]: {
    frequency: Frequency.MN1,
    key: Frequency.MN1,
    providerCode: 'm',
    kind: 'period',
    fields: PERIOD_FIELDS,
    changeStrategy: 'derived',
    label: 'monthly',
    periodUnit: 'month',
  },
};

/**
 * Type guard for frequency tokens.
 */
export function isFrequency(value: string): value is Frequency {
  return Object.values(Frequency).some((frequency) => frequency === value);
}

/**
 * Parses a CLI token (`5m`, `d`, `M`, ...) into a Frequency.
 *
 * @returns The matching variant, or undefined for unknown tokens
 */
export function parseFrequency(value: string): Frequency | undefined {
  return isFrequency(value) ? value : undefined;
}

/**
 * All frequencies, smallest to largest.
 */
export function getAllFrequencies(): Frequency[] {
  return [
    Frequency.M5,
    Frequency.M15,
    Frequency.M30,
    Frequency.M60,
    Frequency.D1,
    Frequency.W1,
    Frequency.MN1,
  ];
}
