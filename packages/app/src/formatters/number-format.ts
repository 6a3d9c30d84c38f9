/**
 * Number formatting shared by the renderers
 */

const HUNDRED_MILLION = 100_000_000;
const TEN_THOUSAND = 10_000;

const integerFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });
const moneyFormats = new Map<number, Intl.NumberFormat>();

function moneyFormat(digits: number): Intl.NumberFormat {
  let format = moneyFormats.get(digits);
  if (!format) {
    format = new Intl.NumberFormat('en-US', {
      minimumFractionDigits: digits,
      maximumFractionDigits: digits,
    });
    moneyFormats.set(digits, format);
  }
  return format;
}

/** 2 decimals; `-` when missing */
export function formatPrice(value: number | undefined): string {
  return value !== undefined && Number.isFinite(value) ? value.toFixed(2) : '-';
}

/** `+1.23%`, `-1.23%`, `0.00%` */
export function formatPercent(value: number): string {
  if (value === 0) {
    return '0.00%';
  }
  return `${value > 0 ? '+' : ''}${value.toFixed(2)}%`;
}

/** Always signed: `+0.40`, `-0.40`, `+0.00` */
export function formatSigned(value: number, digits: number = 2): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(digits)}`;
}

/** Truncated integer with thousands separators */
export function formatInteger(value: number): string {
  return integerFormat.format(Math.trunc(value));
}

/** Thousands separators with fixed decimals */
export function formatMoney(value: number, digits: number = 2): string {
  return moneyFormat(digits).format(value);
}

/** Bar volume; `-` when zero */
export function formatVolume(value: number): string {
  return value > 0 ? formatInteger(value) : '-';
}

/**
 * Bar turnover in CNY: `x.xx亿` above 1e8, `x.xx万` above 1e4, otherwise an integer
 */
export function formatAmount(value: number): string {
  if (value > HUNDRED_MILLION) {
    return `${(value / HUNDRED_MILLION).toFixed(2)}亿`;
  }
  if (value > TEN_THOUSAND) {
    return `${(value / TEN_THOUSAND).toFixed(2)}万`;
  }
  return value.toFixed(0);
}

/**
 * Statement figures: same units as formatAmount, thresholds inclusive on the
 * absolute value so losses scale too; 2 decimals below 1万; `-` when missing
 */
export function formatStatementAmount(value: number | undefined): string {
  if (value === undefined || !Number.isFinite(value)) {
    return '-';
  }
  const magnitude = Math.abs(value);
  if (magnitude >= HUNDRED_MILLION) {
    return `${(value / HUNDRED_MILLION).toFixed(2)}亿`;
  }
  if (magnitude >= TEN_THOUSAND) {
    return `${(value / TEN_THOUSAND).toFixed(2)}万`;
  }
  return value.toFixed(2);
}
