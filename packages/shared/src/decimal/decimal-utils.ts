/**
 * Decimal arithmetic for invoice amounts.
 *
 * Amounts are decimal strings (DecimalAmount). Arithmetic runs on bigint
 * so that summing many `quantity × unitPrice` lines never drifts the way
 * binary floating point does.
 */

import type { DecimalAmount } from '@einvoice-tw/contracts';

/**
 * Taiwan invoices are issued in whole New Taiwan dollars.
 */
export const DEFAULT_DECIMAL_PLACES = 0;

/**
 * Maximum decimal places kept when converting from a number.
 */
export const MAX_DECIMAL_PLACES = 8;

interface DecimalValue {
  /** Magnitude scaled by 10^scale */
  value: bigint;
  scale: number;
  negative: boolean;
}

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

function parseDecimal(str: string): DecimalValue {
  const trimmed = str.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new Error(`Invalid decimal format: ${str}`);
  }

  const negative = trimmed.startsWith('-');
  const unsigned = negative ? trimmed.slice(1) : trimmed;
  const [intPart = '0', fracPart = ''] = unsigned.split('.');

  return { value: BigInt(intPart + fracPart), scale: fracPart.length, negative };
}

function formatDecimal({ value, scale, negative }: DecimalValue): DecimalAmount {
  let str = value.toString();
  while (str.length <= scale) {
    str = '0' + str;
  }

  const insertPoint = str.length - scale;
  const result = scale > 0 ? `${str.slice(0, insertPoint)}.${str.slice(insertPoint)}` : str;

  return negative && value !== 0n ? `-${result}` : result;
}

function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

/**
 * Signed value at the given (larger or equal) scale.
 */
function scaled(decimal: DecimalValue, scale: number): bigint {
  const magnitude = decimal.value * pow10(scale - decimal.scale);
  return decimal.negative ? -magnitude : magnitude;
}

function fromSigned(value: bigint, scale: number): DecimalValue {
  return value < 0n
    ? { value: -value, scale, negative: true }
    : { value, scale, negative: false };
}

/**
 * Add two decimal amounts (exact).
 */
export function add(a: DecimalAmount, b: DecimalAmount): DecimalAmount {
  const decA = parseDecimal(a);
  const decB = parseDecimal(b);
  const scale = Math.max(decA.scale, decB.scale);

  return formatDecimal(fromSigned(scaled(decA, scale) + scaled(decB, scale), scale));
}

/**
 * Multiply two decimal amounts (exact).
 */
export function multiply(a: DecimalAmount, b: DecimalAmount): DecimalAmount {
  const decA = parseDecimal(a);
  const decB = parseDecimal(b);

  return formatDecimal({
    value: decA.value * decB.value,
    scale: decA.scale + decB.scale,
    negative: decA.negative !== decB.negative,
  });
}

/**
 * Sum a list of decimal amounts (exact). An empty list sums to "0".
 */
export function sum(amounts: readonly DecimalAmount[]): DecimalAmount {
  return amounts.reduce<DecimalAmount>((acc, amount) => add(acc, amount), '0');
}

/**
 * Round a decimal amount half-up (away from zero) to the given number of places.
 *
 * @example
 * ```typescript
 * round('99.5')     // '100'
 * round('0.125', 2) // '0.13'
 * ```
 */
export function round(a: DecimalAmount, places: number = DEFAULT_DECIMAL_PLACES): DecimalAmount {
  const dec = parseDecimal(a);

  if (dec.scale <= places) {
    return formatDecimal({ ...dec, value: dec.value * pow10(places - dec.scale), scale: places });
  }

  const factor = pow10(dec.scale - places);
  const quotient = dec.value / factor;
  const rounded = (dec.value % factor) * 2n >= factor ? quotient + 1n : quotient;

  return formatDecimal({ value: rounded, scale: places, negative: dec.negative });
}

/**
 * Check that a finite number can be written as a plain decimal.
 * Numbers JavaScript prints in exponent form must survive
 * MAX_DECIMAL_PLACES fraction digits; `1e-9` does not.
 */
export function isRepresentableNumber(value: number): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (!/e/i.test(String(value)) || Number.isInteger(value)) {
    return true;
  }
  return Number(value.toFixed(MAX_DECIMAL_PLACES)) === value;
}

/**
 * Create a decimal amount from a finite number.
 * Uses the shortest round-trip representation, falling back to
 * MAX_DECIMAL_PLACES for small numbers JavaScript prints in exponent form.
 *
 * @throws Error when the number is not finite or would lose digits
 */
export function fromNumber(value: number): DecimalAmount {
  if (!isRepresentableNumber(value)) {
    throw new Error(`Cannot convert ${String(value)} to a decimal amount`);
  }

  const str = String(value);
  if (!/e/i.test(str)) {
    return str;
  }
  return Number.isInteger(value) ? BigInt(value).toString() : value.toFixed(MAX_DECIMAL_PLACES);
}
