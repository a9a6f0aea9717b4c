import { format } from 'd3-format';

/**
 * Format a number to at most 4 significant figures, using k/M/B/T suffixes instead of scientific notation
 */
export function formatSigFigs(value: number, maxSigFigs: number = 4): string {
  if (value === 0) return "0";
  if (Number.isNaN(value)) return "NaN";
  if (!isFinite(value)) return value > 0 ? "∞" : "-∞";

  const sigFigs = Math.max(1, maxSigFigs);

  const absValue = Math.abs(value);
  const sign = value < 0 ? '-' : '';

  if (absValue >= 1_000_000_000_000) {
    return sign + formatWithSigFigs(absValue / 1_000_000_000_000, sigFigs) + 'T';
  } else if (absValue >= 1_000_000_000) {
    return sign + formatWithSigFigs(absValue / 1_000_000_000, sigFigs) + 'B';
  } else if (absValue >= 1_000_000) {
    return sign + formatWithSigFigs(absValue / 1_000_000, sigFigs) + 'M';
  } else if (absValue >= 1_000) {
    return sign + formatWithSigFigs(absValue / 1_000, sigFigs) + 'k';
  } else if (absValue < 0.0001) {
    return value.toFixed(4);
  }

  return formatWithSigFigs(value, sigFigs);
}

function formatWithSigFigs(value: number, sigFigs: number): string {
  const formatted = value.toPrecision(sigFigs);
  // Only strip zeros after a decimal point ("1200" must stay "1200")
  return formatted.includes('.') ? formatted.replace(/\.?0+$/, "") : formatted;
}

/**
 * Format a number with a specific number of decimal places (for percentages, etc.)
 */
export function formatDecimal(value: number, decimals: number = 1): string {
  return value.toFixed(decimals);
}

/**
 * Thousands-grouped fixed-point, e.g. 49050 -> "49,050.0"
 */
export function formatGrouped(value: number, decimals: number = 1): string {
  return format(`,.${decimals}f`)(value);
}

/**
 * Dollar amount, grouped, e.g. 121840200 -> "$121,840,200", -5 -> "-$5"
 */
export function formatCurrency(value: number, decimals: number = 0): string {
  // ASCII sign; d3-format 1.4 would emit U+2212
  const sign = value < 0 ? '-' : '';
  return sign + format(`$,.${decimals}f`)(Math.abs(value));
}

/**
 * Years with a label for the no-payback sentinel
 */
export function formatYears(value: number, decimals: number = 1, infiniteLabel: string = "∞"): string {
  if (!isFinite(value)) return infiniteLabel;
  return `${value.toFixed(decimals)} years`;
}
