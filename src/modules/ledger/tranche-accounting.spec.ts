import { normalizeRate, parseFixed } from "../../common/fixed-point";
import { Tranche, VaultLedgerState } from "./ledger.types";
import { recordPurchase } from "./loan-book";
import {
  depositInto,
  estimatedValue,
  redemptionSharePrice,
  shareBalance,
  sharePrice,
  utilization,
} from "./tranche-accounting";
import { scheduleReturn, timeBucket } from "./time-buckets";
import { createLedgerState } from "./vault-ledger";

const NOW = 1_700_000_000; // 512000s into bucket 2810
const eth = parseFixed;

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("tranche accounting", () => {
  let state: VaultLedgerState;

  beforeEach(() => {
    state = createLedgerState({
      seniorTrancheRate: normalizeRate(eth("0.05")),
      reserveRatio: 0n,
      paused: false,
      timeBucketWidth: 7 * 86_400,
      prorationBuckets: 6,
    });
  });

  it("prices an empty tranche at 1.0", () => {
    expect(sharePrice(state, Tranche.Senior, NOW)).toBe(eth("1"));
    expect(redemptionSharePrice(state, Tranche.Junior)).toBe(eth("1"));
    expect(utilization(state)).toBe(0n);
  });

  it("mints shares one-for-one into an empty tranche", () => {
    expect(depositInto(state, Tranche.Senior, "0xA", eth("10"), NOW)).toBe(eth("10"));
    expect(shareBalance(state.tranches[Tranche.Senior], "0xA")).toBe(eth("10"));
    expect(state.totalCashBalance).toBe(eth("10"));
  });

  it("rejects a zero deposit", () => {
    expect(catchError(() => depositInto(state, Tranche.Senior, "0xA", 0n, NOW))).toMatchObject({
      code: "InvalidAmount",
    });
  });

  describe("with a loan outstanding", () => {
    beforeEach(() => {
      depositInto(state, Tranche.Senior, "0xA", eth("10"), NOW);
      depositInto(state, Tranche.Junior, "0xB", eth("5"), NOW);
      // matures in bucket 2815, the last bucket of the proration horizon
      recordPurchase(
        state,
        {
          noteToken: "0xNote",
          loanId: "1",
          collateralToken: "0xCollateral",
          collateralTokenId: "1",
          purchasePrice: eth("2"),
          repayment: eth("2.2"),
          maturity: NOW + 30 * 86_400,
        },
        NOW,
      );
    });

    it("prorates pending returns into the share price", () => {
      expect(estimatedValue(state, Tranche.Senior, NOW)).toBe(eth("10") + 773114928274285n);
      expect(sharePrice(state, Tranche.Senior, NOW)).toBe(1000077311492827428n);
      expect(sharePrice(state, Tranche.Junior, NOW)).toBe(1005489115991417453n);
    });

    it("keeps the redemption price on realized value", () => {
      expect(redemptionSharePrice(state, Tranche.Senior)).toBe(eth("1"));
      expect(redemptionSharePrice(state, Tranche.Junior)).toBe(eth("1"));
    });

    it("mints fewer shares once returns have accrued", () => {
      expect(depositInto(state, Tranche.Junior, "0xC", eth("1"), NOW)).toBe(994540849916604859n);
    });

    it("reports utilization as loans over free cash plus loans", () => {
      expect(utilization(state)).toBe(133333333333333333n);
    });
  });

  it("refuses deposits into a tranche wiped out by losses", () => {
    depositInto(state, Tranche.Junior, "0xB", eth("5"), NOW);
    state.tranches[Tranche.Junior].depositValue = 0n;
    expect(catchError(() => depositInto(state, Tranche.Junior, "0xC", eth("1"), NOW))).toMatchObject({
      code: "TrancheInsolvent",
    });
  });

  it("refuses deposits into a wiped-out tranche that still has returns accruing", () => {
    depositInto(state, Tranche.Junior, "0xB", eth("5"), NOW);
    const junior = state.tranches[Tranche.Junior];
    junior.depositValue = 0n;
    scheduleReturn(junior, timeBucket(NOW, 7 * 86_400) + 2, eth("1"));
    expect(sharePrice(state, Tranche.Junior, NOW) > 0n).toBe(true);

    expect(catchError(() => depositInto(state, Tranche.Junior, "0xC", eth("1"), NOW))).toMatchObject({
      code: "TrancheInsolvent",
    });
    expect(junior.totalShares).toBe(eth("5"));
  });
});
