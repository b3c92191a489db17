import { TrancheState } from "./ledger.types";

export function timeBucket(timestamp: number, width: number): number {
  return Math.floor(timestamp / width);
}

export function scheduleReturn(tranche: TrancheState, bucket: number, amount: bigint): void {
  if (amount === 0n) return;
  tranche.pendingReturns.set(bucket, (tranche.pendingReturns.get(bucket) ?? 0n) + amount);
}

export function unscheduleReturn(tranche: TrancheState, bucket: number, amount: bigint): void {
  if (amount === 0n) return;
  const remaining = (tranche.pendingReturns.get(bucket) ?? 0n) - amount;
  if (remaining < 0n) {
    throw new Error(`Pending returns underflow in bucket ${bucket}`);
  }
  if (remaining === 0n) {
    tranche.pendingReturns.delete(bucket);
  } else {
    tranche.pendingReturns.set(bucket, remaining);
  }
}

/**
 * Accrued share of future-dated returns. A return scheduled in bucket
 * `current + i` accrues linearly over a window of `buckets` widths that ends
 * with its bucket, so it reaches full value exactly when its bucket closes.
 * Buckets already past contribute nothing until the loan is resolved.
 */
export function proratedReturns(
  tranche: TrancheState,
  now: number,
  width: number,
  buckets: number,
): bigint {
  const current = timeBucket(now, width);
  const elapsedIntoBucket = now - current * width;
  const window = BigInt(buckets * width);

  let total = 0n;
  for (let i = 0; i < buckets; i++) {
    const pending = tranche.pendingReturns.get(current + i);
    if (pending === undefined) continue;
    const elapsedIntoWindow = BigInt(elapsedIntoBucket + width * (buckets - 1 - i));
    total += (pending * elapsedIntoWindow) / window;
  }
  return total;
}
