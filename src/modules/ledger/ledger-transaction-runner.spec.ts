import { FixedClock } from "../../common/clock";
import { parseFixed } from "../../common/fixed-point";
import { Tranche, VaultLedgerState } from "./ledger.types";
import { LedgerTransactionRunner } from "./ledger-transaction-runner";
import { depositInto } from "./tranche-accounting";
import { createLedgerState } from "./vault-ledger";

const eth = parseFixed;

function newRunner(): LedgerTransactionRunner {
  const state = createLedgerState({
    seniorTrancheRate: 0n,
    reserveRatio: 0n,
    paused: false,
    timeBucketWidth: 604_800,
    prorationBuckets: 6,
  });
  return new LedgerTransactionRunner(state, new FixedClock(1_700_000_000));
}

const cash = (s: VaultLedgerState) => s.totalCashBalance;

describe("LedgerTransactionRunner", () => {
  it("commits the draft when the body and interactions succeed", async () => {
    const runner = newRunner();
    const transfer = jest.fn(async () => undefined);

    const shares = await runner.execute("deposit", (tx) => {
      const minted = depositInto(tx.draft, Tranche.Senior, "0xA", eth("3"), tx.now);
      tx.interact("pull", transfer);
      return minted;
    });

    expect(shares).toBe(eth("3"));
    expect(transfer).toHaveBeenCalledTimes(1);
    expect(runner.read(cash)).toBe(eth("3"));
    expect(runner.currentSequence).toBe(1);
  });

  it("discards the draft when the body throws", async () => {
    const runner = newRunner();
    await expect(
      runner.execute("boom", (tx) => {
        tx.draft.totalCashBalance = eth("99");
        throw new Error("rejected");
      }),
    ).rejects.toThrow("rejected");

    expect(runner.read(cash)).toBe(0n);
    expect(runner.currentSequence).toBe(0);
  });

  it("discards the draft when an interaction fails, and skips later ones", async () => {
    const runner = newRunner();
    const later = jest.fn(async () => undefined);

    await expect(
      runner.execute("deposit", (tx) => {
        depositInto(tx.draft, Tranche.Senior, "0xA", eth("3"), tx.now);
        tx.interact("pull", async () => {
          throw new Error("transfer declined");
        });
        tx.interact("notify", later);
      }),
    ).rejects.toThrow("transfer declined");

    expect(later).not.toHaveBeenCalled();
    expect(runner.read((s) => s.tranches[Tranche.Senior].depositValue)).toBe(0n);
  });

  it("undoes completed interactions newest first when a later one fails", async () => {
    const runner = newRunner();
    const order: string[] = [];
    const step = (name: string) => async () => {
      order.push(name);
    };

    await expect(
      runner.execute("sell", (tx) => {
        tx.interact("take-note", step("take-note"), step("return-note"));
        tx.interact("take-fee", step("take-fee"));
        tx.interact("lock", step("lock"), step("unlock"));
        tx.interact("pay", async () => {
          throw new Error("payout failed");
        }, step("refund"));
      }),
    ).rejects.toThrow("payout failed");

    expect(order).toEqual(["take-note", "take-fee", "lock", "unlock", "return-note"]);
    expect(runner.currentSequence).toBe(0);
  });

  it("surfaces the original error when a compensation also fails", async () => {
    const runner = newRunner();
    const undo = jest.fn(async () => undefined);

    await expect(
      runner.execute("sell", (tx) => {
        tx.interact("first", async () => undefined, undo);
        tx.interact("second", async () => undefined, async () => {
          throw new Error("cannot undo");
        });
        tx.interact("third", async () => {
          throw new Error("payout failed");
        });
      }),
    ).rejects.toThrow("payout failed");

    expect(undo).toHaveBeenCalledTimes(1);
  });

  it("runs interactions only after the body has finished mutating", async () => {
    const runner = newRunner();
    const order: string[] = [];

    await runner.execute("ordered", (tx) => {
      tx.interact("transfer", async () => {
        order.push("interaction");
      });
      order.push("mutation");
    });

    expect(order).toEqual(["mutation", "interaction"]);
  });

  it("serializes concurrent transactions", async () => {
    const runner = newRunner();
    const order: string[] = [];
    let release!: () => void;
    const gate = new Promise<void>((r) => {
      release = r;
    });

    const first = runner.execute("first", async (tx) => {
      order.push("first:start");
      await gate;
      tx.draft.totalCashBalance += 1n;
      order.push("first:end");
    });
    const second = runner.execute("second", (tx) => {
      order.push(`second:start cash=${tx.draft.totalCashBalance}`);
      tx.draft.totalCashBalance += 1n;
    });

    await Promise.resolve();
    release();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second:start cash=1"]);
    expect(runner.read(cash)).toBe(2n);
  });

  it("notifies commit listeners with the new sequence", async () => {
    const runner = newRunner();
    const listener = jest.fn();
    runner.onCommit(listener);

    await runner.execute("noop", () => undefined);
    expect(listener).toHaveBeenCalledWith(expect.anything(), 1);
  });

  it("keeps readers isolated from an in-flight draft", async () => {
    const runner = newRunner();
    let observed = -1n;

    await runner.execute("deposit", (tx) => {
      depositInto(tx.draft, Tranche.Junior, "0xA", eth("1"), tx.now);
      observed = runner.read(cash);
    });

    expect(observed).toBe(0n);
    expect(runner.read(cash)).toBe(eth("1"));
  });
});
