import { createHash } from "crypto";
import {
  DepositorRedemption,
  LoanRecord,
  TrancheState,
  VaultLedgerState,
} from "./ledger.types";

// ── Canonical snapshot JSON ────────────────────────────────────────────────
//
//   1. bigint amounts are decimal strings.
//   2. Timestamps, bucket widths and counts are plain numbers.
//   3. Field order is fixed as declared below.
//   4. Maps become arrays of [key, value] pairs sorted by key ascending
//      (time buckets numerically, other keys lexically). Every key is a
//      string; time buckets are their decimal form.
//   5. Compact JSON.stringify output; stateHash is SHA-256 of that string.

interface RedemptionJson {
  pendingAmount: string;
  withdrawnAmount: string;
  queueTargetPosition: string;
}

interface TrancheJson {
  depositValue: string;
  pendingRedemptions: string;
  redemptionQueueTotal: string;
  redemptionQueueProcessed: string;
  pendingReturns: Array<[string, string]>;
  totalShares: string;
  shareBalances: Array<[string, string]>;
  redemptions: Array<[string, RedemptionJson]>;
}

interface LoanJson {
  noteToken: string;
  loanId: string;
  collateralToken: string;
  collateralTokenId: string;
  purchasePrice: string;
  repayment: string;
  maturity: number;
  trancheReturns: [string, string];
  active: boolean;
  liquidated: boolean;
  collateralLiquidator: string | null;
}

export interface LedgerSnapshotJson {
  version: 1;
  sequence: number;
  parameters: {
    seniorTrancheRate: string;
    reserveRatio: string;
    paused: boolean;
    timeBucketWidth: number;
    prorationBuckets: number;
  };
  totalLoanBalance: string;
  totalCashBalance: string;
  totalReservesBalance: string;
  totalWithdrawalBalance: string;
  tranches: [TrancheJson, TrancheJson];
  loans: Array<[string, LoanJson]>;
  pendingLoans: Array<[string, string[]]>;
}

export interface EncodedSnapshot {
  json: string;
  stateHash: string;
}

function sortedEntries<K extends string | number, V>(map: Map<K, V>): Array<[K, V]> {
  return [...map.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

function encodeTranche(t: TrancheState): TrancheJson {
  return {
    depositValue: t.depositValue.toString(),
    pendingRedemptions: t.pendingRedemptions.toString(),
    redemptionQueueTotal: t.redemptionQueueTotal.toString(),
    redemptionQueueProcessed: t.redemptionQueueProcessed.toString(),
    pendingReturns: sortedEntries(t.pendingReturns).map(([k, v]) => [String(k), v.toString()]),
    totalShares: t.totalShares.toString(),
    shareBalances: sortedEntries(t.shareBalances).map(([k, v]) => [k, v.toString()]),
    redemptions: sortedEntries(t.redemptions).map(([k, r]) => [
      k,
      {
        pendingAmount: r.pendingAmount.toString(),
        withdrawnAmount: r.withdrawnAmount.toString(),
        queueTargetPosition: r.queueTargetPosition.toString(),
      },
    ]),
  };
}

function encodeLoan(loan: LoanRecord): LoanJson {
  return {
    noteToken: loan.noteToken,
    loanId: loan.loanId,
    collateralToken: loan.collateralToken,
    collateralTokenId: loan.collateralTokenId,
    purchasePrice: loan.purchasePrice.toString(),
    repayment: loan.repayment.toString(),
    maturity: loan.maturity,
    trancheReturns: [loan.trancheReturns[0].toString(), loan.trancheReturns[1].toString()],
    active: loan.active,
    liquidated: loan.liquidated,
    collateralLiquidator: loan.collateralLiquidator,
  };
}

export function serializeLedger(state: VaultLedgerState, sequence: number): EncodedSnapshot {
  const snapshot: LedgerSnapshotJson = {
    version: 1,
    sequence,
    parameters: {
      seniorTrancheRate: state.parameters.seniorTrancheRate.toString(),
      reserveRatio: state.parameters.reserveRatio.toString(),
      paused: state.parameters.paused,
      timeBucketWidth: state.parameters.timeBucketWidth,
      prorationBuckets: state.parameters.prorationBuckets,
    },
    totalLoanBalance: state.totalLoanBalance.toString(),
    totalCashBalance: state.totalCashBalance.toString(),
    totalReservesBalance: state.totalReservesBalance.toString(),
    totalWithdrawalBalance: state.totalWithdrawalBalance.toString(),
    tranches: [encodeTranche(state.tranches[0]), encodeTranche(state.tranches[1])],
    loans: sortedEntries(state.loans).map(([k, loan]) => [k, encodeLoan(loan)]),
    pendingLoans: sortedEntries(state.pendingLoans).map(([k, keys]) => [String(k), [...keys]]),
  };
  const json = JSON.stringify(snapshot);
  return { json, stateHash: createHash("sha256").update(json).digest("hex") };
}

// ── Decoding ───────────────────────────────────────────────────────────────

class SnapshotFormatError extends Error {
  constructor(path: string, expected: string) {
    super(`Invalid ledger snapshot at ${path}: expected ${expected}`);
    this.name = "SnapshotFormatError";
  }
}

type Json = Record<string, unknown>;

function obj(value: unknown, path: string): Json {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new SnapshotFormatError(path, "object");
  }
  return Object.fromEntries(Object.entries(value));
}

function arr(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) throw new SnapshotFormatError(path, "array");
  return value;
}

function str(value: unknown, path: string): string {
  if (typeof value !== "string") throw new SnapshotFormatError(path, "string");
  return value;
}

function num(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isSafeInteger(value)) {
    throw new SnapshotFormatError(path, "integer");
  }
  return value;
}

function bucket(value: unknown, path: string): number {
  const raw = str(value, path);
  const parsed = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(parsed)) {
    throw new SnapshotFormatError(path, "time bucket string");
  }
  return parsed;
}

function bool(value: unknown, path: string): boolean {
  if (typeof value !== "boolean") throw new SnapshotFormatError(path, "boolean");
  return value;
}

function amount(value: unknown, path: string): bigint {
  const raw = str(value, path);
  if (!/^\d+$/.test(raw)) throw new SnapshotFormatError(path, "decimal string");
  return BigInt(raw);
}

function pairs<K, V>(
  value: unknown,
  path: string,
  key: (v: unknown, p: string) => K,
  val: (v: unknown, p: string) => V,
): Map<K, V> {
  const map = new Map<K, V>();
  arr(value, path).forEach((entry, i) => {
    const pair = arr(entry, `${path}[${i}]`);
    map.set(key(pair[0], `${path}[${i}][0]`), val(pair[1], `${path}[${i}][1]`));
  });
  return map;
}

function decodeRedemption(value: unknown, path: string): DepositorRedemption {
  const r = obj(value, path);
  return {
    pendingAmount: amount(r.pendingAmount, `${path}.pendingAmount`),
    withdrawnAmount: amount(r.withdrawnAmount, `${path}.withdrawnAmount`),
    queueTargetPosition: amount(r.queueTargetPosition, `${path}.queueTargetPosition`),
  };
}

function decodeTranche(value: unknown, path: string): TrancheState {
  const t = obj(value, path);
  return {
    depositValue: amount(t.depositValue, `${path}.depositValue`),
    pendingRedemptions: amount(t.pendingRedemptions, `${path}.pendingRedemptions`),
    redemptionQueueTotal: amount(t.redemptionQueueTotal, `${path}.redemptionQueueTotal`),
    redemptionQueueProcessed: amount(t.redemptionQueueProcessed, `${path}.redemptionQueueProcessed`),
    pendingReturns: pairs(t.pendingReturns, `${path}.pendingReturns`, bucket, amount),
    totalShares: amount(t.totalShares, `${path}.totalShares`),
    shareBalances: pairs(t.shareBalances, `${path}.shareBalances`, str, amount),
    redemptions: pairs(t.redemptions, `${path}.redemptions`, str, decodeRedemption),
  };
}

function decodeLoan(value: unknown, path: string): LoanRecord {
  const l = obj(value, path);
  const returns = arr(l.trancheReturns, `${path}.trancheReturns`);
  return {
    noteToken: str(l.noteToken, `${path}.noteToken`),
    loanId: str(l.loanId, `${path}.loanId`),
    collateralToken: str(l.collateralToken, `${path}.collateralToken`),
    collateralTokenId: str(l.collateralTokenId, `${path}.collateralTokenId`),
    purchasePrice: amount(l.purchasePrice, `${path}.purchasePrice`),
    repayment: amount(l.repayment, `${path}.repayment`),
    maturity: num(l.maturity, `${path}.maturity`),
    trancheReturns: [
      amount(returns[0], `${path}.trancheReturns[0]`),
      amount(returns[1], `${path}.trancheReturns[1]`),
    ],
    active: bool(l.active, `${path}.active`),
    liquidated: bool(l.liquidated, `${path}.liquidated`),
    collateralLiquidator:
      l.collateralLiquidator === null ? null : str(l.collateralLiquidator, `${path}.collateralLiquidator`),
  };
}

export function deserializeLedger(json: string): { state: VaultLedgerState; sequence: number } {
  const root = obj(JSON.parse(json), "$");
  if (root.version !== 1) throw new SnapshotFormatError("$.version", "1");

  const params = obj(root.parameters, "$.parameters");
  const tranches = arr(root.tranches, "$.tranches");
  if (tranches.length !== 2) throw new SnapshotFormatError("$.tranches", "two tranches");

  const state: VaultLedgerState = {
    tranches: [decodeTranche(tranches[0], "$.tranches[0]"), decodeTranche(tranches[1], "$.tranches[1]")],
    totalLoanBalance: amount(root.totalLoanBalance, "$.totalLoanBalance"),
    totalCashBalance: amount(root.totalCashBalance, "$.totalCashBalance"),
    totalReservesBalance: amount(root.totalReservesBalance, "$.totalReservesBalance"),
    totalWithdrawalBalance: amount(root.totalWithdrawalBalance, "$.totalWithdrawalBalance"),
    loans: pairs(root.loans, "$.loans", str, decodeLoan),
    pendingLoans: pairs(root.pendingLoans, "$.pendingLoans", bucket, (v, p) =>
      arr(v, p).map((k, i) => str(k, `${p}[${i}]`)),
    ),
    parameters: {
      seniorTrancheRate: amount(params.seniorTrancheRate, "$.parameters.seniorTrancheRate"),
      reserveRatio: amount(params.reserveRatio, "$.parameters.reserveRatio"),
      paused: bool(params.paused, "$.parameters.paused"),
      timeBucketWidth: num(params.timeBucketWidth, "$.parameters.timeBucketWidth"),
      prorationBuckets: num(params.prorationBuckets, "$.parameters.prorationBuckets"),
    },
  };
  return { state, sequence: num(root.sequence, "$.sequence") };
}
