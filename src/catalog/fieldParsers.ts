/**
 * Numeric readers for free-form spec fields.
 *
 * Each reader returns null when the field carries no recognizable magnitude;
 * callers treat null as "no contribution", never as an error.
 */

const MISSING_VALUES = new Set(['', 'n/a', 'na', '-']);

const USD_PRICE_PATTERN = /\$\s*(\d[\d,]*(?:\.\d+)?)/;
const EUR_PRICE_PATTERN = /€\s*(\d[\d,]*(?:\.\d+)?)/;
const BATTERY_PATTERN = /(\d+)\s*mAh/i;
const CAMERA_PATTERN = /(\d+)\s*MP/i;
const RAM_PATTERN = /(\d+)\s*GB/i;
const HIGH_REFRESH_PATTERN = /\b120\s*hz/i;
const AMOLED_PATTERN = /amoled/i;

function presentValue(value: string | undefined): string | null {
  if (value === undefined || MISSING_VALUES.has(value.trim().toLowerCase())) {
    return null;
  }
  return value;
}

function readInteger(value: string | undefined, pattern: RegExp): number | null {
  const text = presentValue(value);
  const match = text?.match(pattern);
  return match ? parseInt(match[1], 10) : null;
}

/**
 * Reads a price, preferring the USD amount ("$1,049.99", "$ 499") and
 * falling back to the EUR amount.
 */
export function parsePrice(value: string | undefined): number | null {
  const text = presentValue(value);
  if (text === null) {
    return null;
  }

  const match = text.match(USD_PRICE_PATTERN) ?? text.match(EUR_PRICE_PATTERN);
  if (!match) {
    return null;
  }

  const amount = parseFloat(match[1].replace(/,/g, ''));
  return Number.isFinite(amount) ? amount : null;
}

export function parseBatteryMah(value: string | undefined): number | null {
  return readInteger(value, BATTERY_PATTERN);
}

/**
 * Resolution of the first camera listed, which the catalog uses for the main sensor.
 */
export function parseMainCameraMp(value: string | undefined): number | null {
  return readInteger(value, CAMERA_PATTERN);
}

/**
 * First "<n> GB" in the field. For "8/12 GB" that is the 12 GB option.
 */
export function parseRamGb(value: string | undefined): number | null {
  return readInteger(value, RAM_PATTERN);
}

export function hasHighRefreshRate(display: string | undefined): boolean {
  const text = presentValue(display);
  return text !== null && HIGH_REFRESH_PATTERN.test(text);
}

export function hasAmoledPanel(display: string | undefined): boolean {
  const text = presentValue(display);
  return text !== null && AMOLED_PATTERN.test(text);
}
