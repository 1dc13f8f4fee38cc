/**
 * Fixed-point unit helpers for the native asset and reference currency.
 * All arithmetic is on bigint; division truncates toward zero.
 */

export const NATIVE_DECIMALS = 18;
export const NATIVE_UNIT = 10n ** BigInt(NATIVE_DECIMALS);

/**
 * Value of `amount` native base units in the reference currency,
 * at the oracle's decimal scale.
 */
export function convertNativeToReference(amount: bigint, rate: bigint): bigint {
  return (amount * rate) / NATIVE_UNIT;
}

/**
 * Whole reference units → oracle-scaled integer (e.g. 10000 @ 8 decimals → 10000e8)
 */
export function scaleReferenceUnits(units: bigint, decimals: number): bigint {
  return units * 10n ** BigInt(decimals);
}

/**
 * Parse a decimal string ("2.5") into base units at `decimals` precision.
 * Extra fractional digits beyond `decimals` are rejected rather than rounded.
 */
export function parseUnits(value: string, decimals: number): bigint {
  const trimmed = value.trim();
  const match = /^(\d+)(?:\.(\d+))?$/.exec(trimmed);
  if (!match) {
    throw new Error(`Invalid decimal amount: "${value}"`);
  }

  const whole = match[1] ?? '0';
  const fraction = match[2] ?? '';
  if (fraction.length > decimals) {
    throw new Error(`Too many decimal places in "${value}" (max ${decimals})`);
  }

  return BigInt(whole + fraction.padEnd(decimals, '0'));
}

/**
 * Render base units as a decimal string, trimming trailing zeros.
 */
export function formatUnits(value: bigint, decimals: number): string {
  const negative = value < 0n;
  const digits = (negative ? -value : value).toString().padStart(decimals + 1, '0');
  const whole = digits.slice(0, digits.length - decimals);
  const fraction = digits.slice(digits.length - decimals).replace(/0+$/, '');
  const sign = negative ? '-' : '';
  return fraction ? `${sign}${whole}.${fraction}` : `${sign}${whole}`;
}
