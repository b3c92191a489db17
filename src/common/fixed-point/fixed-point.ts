import { formatEther, parseEther } from "ethers";

/**
 * Unsigned 18-decimal fixed point. Every product and quotient truncates
 * toward zero.
 */
export const FIXED_POINT_SCALE = 10n ** 18n;

export const SECONDS_PER_YEAR = 365n * 86_400n;

export function mul(a: bigint, b: bigint): bigint {
  return (a * b) / FIXED_POINT_SCALE;
}

export function div(a: bigint, b: bigint): bigint {
  if (b === 0n) {
    throw new RangeError("fixed-point division by zero");
  }
  return (a * FIXED_POINT_SCALE) / b;
}

/** Integer → fixed point. */
export function fromInteger(value: bigint | number): bigint {
  return BigInt(value) * FIXED_POINT_SCALE;
}

/** "0.05" → 5e16 */
export function parseFixed(decimal: string): bigint {
  return parseEther(decimal);
}

export function formatFixed(value: bigint): string {
  return formatEther(value);
}

/** Annual fixed-point rate → per-second fixed-point rate. */
export function normalizeRate(annualRate: bigint): bigint {
  return annualRate / SECONDS_PER_YEAR;
}

export function min(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function max(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}
