import { Tranche } from "../src/modules/ledger";
import { VAULT_HOLDER } from "../src/modules/vault";
import {
  ADMIN,
  COLLATERAL,
  DAY,
  JUNIOR_LP,
  LENDER,
  LIQUIDATOR,
  NOTE,
  SENIOR_LP,
  BORROWER,
  VaultHarness,
  catchError,
  createVaultHarness,
  eth,
} from "./support/vault-test-module";

describe("LoanLifecycleService", () => {
  let h: VaultHarness;

  beforeEach(async () => {
    h = await createVaultHarness();
    await h.fund(Tranche.Senior, SENIOR_LP, eth("10"));
    await h.fund(Tranche.Junior, JUNIOR_LP, eth("5"));
  });

  // ── Purchase ───────────────────────────────────────────────────────────────

  describe("sellNote", () => {
    it("buys a note at the engine price and splits the spread", async () => {
      const loanId = h.originate(eth("2.2"), 30 * DAY);

      const loan = await h.loans.sellNote(NOTE, loanId, eth("2"), LENDER);

      expect(h.pricer.priceLoan).toHaveBeenCalledWith({
        collateralToken: COLLATERAL,
        principal: eth("1.9"),
        repayment: eth("2.2"),
        durationRemaining: 30 * DAY,
        utilization: 0n,
      });
      expect(loan.purchasePrice).toBe(eth("2"));
      expect(loan.trancheReturns).toEqual([5479452054143999n, 194520547945856001n]);
      expect(h.assets.balanceOf(LENDER)).toBe(eth("2"));
      expect(h.custody.ownerOf(NOTE, loanId)).toBe(VAULT_HOLDER);
      expect(h.vault.balances()).toMatchObject({
        totalCashBalance: eth("13"),
        totalLoanBalance: eth("2"),
      });
    });

    it("rejects an offer away from the engine price", async () => {
      const loanId = h.originate(eth("2.2"), 30 * DAY);

      const err = await catchError(() => h.loans.sellNote(NOTE, loanId, eth("2") + 1n, LENDER));

      expect(err).toMatchObject({ code: "PriceMismatch" });
      expect(h.loans.loanState(NOTE, loanId)).toBeNull();
    });

    it("accepts an offer within the quote tolerance and settles at the engine price", async () => {
      h = await createVaultHarness({ PRICING_QUOTE_TOLERANCE: "5" });
      await h.fund(Tranche.Senior, SENIOR_LP, eth("10"));
      await h.fund(Tranche.Junior, JUNIOR_LP, eth("5"));
      const loanId = h.originate(eth("2.2"), 30 * DAY);

      const loan = await h.loans.sellNote(NOTE, loanId, eth("2") + 5n, LENDER);

      expect(loan.purchasePrice).toBe(eth("2"));
      expect(h.assets.balanceOf(LENDER)).toBe(eth("2"));
    });

    it("checks the price before the repayment", async () => {
      const loanId = h.originate(eth("2"), 30 * DAY);

      expect(await catchError(() => h.loans.sellNote(NOTE, loanId, eth("3"), LENDER))).toMatchObject({
        code: "PriceMismatch",
      });
      expect(await catchError(() => h.loans.sellNote(NOTE, loanId, eth("2"), LENDER))).toMatchObject({
        code: "RepaymentTooLow",
      });
    });

    it("rejects unknown note tokens, closed notes and repeat sales", async () => {
      const loanId = h.originate(eth("2.2"), 30 * DAY);
      const repaidId = h.originate(eth("2.2"), 30 * DAY);
      h.platform.repay(repaidId);

      expect(
        await catchError(() =>
          h.loans.sellNote("0x6000000000000000000000000000000000000001", loanId, eth("2"), LENDER),
        ),
      ).toMatchObject({ code: "UnsupportedNoteToken" });
      expect(await catchError(() => h.loans.sellNote(NOTE, repaidId, eth("2"), LENDER))).toMatchObject({
        code: "UnsupportedNoteParameters",
      });

      await h.loans.sellNote(NOTE, loanId, eth("2"), LENDER);
      expect(await catchError(() => h.loans.sellNote(NOTE, loanId, eth("2"), LENDER))).toMatchObject({
        code: "LoanAlreadyPurchased",
      });
    });

    it("rolls back the purchase when the note cannot be taken into custody", async () => {
      const loanId = h.originate(eth("2.2"), 30 * DAY);
      h.custody.assign(NOTE, loanId, BORROWER);
      const sequence = h.ledger.sequence;

      const err = await catchError(() => h.loans.sellNote(NOTE, loanId, eth("2"), LENDER));

      expect(err).toBeInstanceOf(Error);
      expect(h.ledger.sequence).toBe(sequence);
      expect(h.loans.loanState(NOTE, loanId)).toBeNull();
      expect(h.vault.balances().totalCashBalance).toBe(eth("15"));
      expect(h.assets.balanceOf(LENDER)).toBe(0n);
    });

    it("gives the note back to the seller when the price cannot be paid out", async () => {
      const loanId = h.originate(eth("2.2"), 30 * DAY);
      jest.spyOn(h.assets, "push").mockRejectedValueOnce(new Error("transfer reverted"));

      const err = await catchError(() => h.loans.sellNote(NOTE, loanId, eth("2"), LENDER));

      expect(err).toMatchObject({ message: "transfer reverted" });
      expect(h.custody.ownerOf(NOTE, loanId)).toBe(LENDER.toLowerCase());
      expect(h.loans.loanState(NOTE, loanId)).toBeNull();
      expect(h.vault.balances().totalCashBalance).toBe(eth("15"));
    });

    it("pays a later purchase out of repaid cash", async () => {
      h.pricer.nextPrice = eth("7");
      const first = h.originate(eth("8"), 30 * DAY);
      await h.loans.sellNote(NOTE, first, eth("7"), LENDER);
      h.platform.repay(first);
      await h.loans.onLoanRepaid(NOTE, first);
      expect(h.assets.vaultHoldings).toBe(eth("16"));

      h.pricer.nextPrice = eth("9");
      const second = h.originate(eth("10"), 30 * DAY);
      await h.loans.sellNote(NOTE, second, eth("9"), LENDER);

      expect(h.custody.ownerOf(NOTE, second)).toBe(VAULT_HOLDER);
      expect(h.assets.balanceOf(LENDER)).toBe(eth("16"));
      expect(h.assets.vaultHoldings).toBe(eth("7"));
      expect(h.vault.balances().totalCashBalance).toBe(eth("7"));
    });

    it("is closed while the vault is paused", async () => {
      const loanId = h.originate(eth("2.2"), 30 * DAY);
      await h.admin.setPaused(ADMIN, true);

      expect(await catchError(() => h.loans.sellNote(NOTE, loanId, eth("2"), LENDER))).toMatchObject({
        code: "Paused",
      });
    });
  });

  describe("sellNoteAndDeposit", () => {
    it("deposits the purchase price for the seller by allocation", async () => {
      const loanId = h.originate(eth("2.2"), 60 * DAY);

      const { loan, shares } = await h.loans.sellNoteAndDeposit(
        NOTE,
        loanId,
        eth("2"),
        [eth("0.25"), eth("0.75")],
        LENDER,
      );

      expect(loan.purchasePrice).toBe(eth("2"));
      expect(shares).toEqual([eth("0.5"), eth("1.5")]);
      expect(h.vault.shareBalance(Tranche.Senior, LENDER)).toBe(eth("0.5"));
      expect(h.vault.shareBalance(Tranche.Junior, LENDER)).toBe(eth("1.5"));
      expect(h.assets.balanceOf(LENDER)).toBe(0n);
      expect(h.vault.balances()).toMatchObject({
        totalCashBalance: eth("15"),
        totalLoanBalance: eth("2"),
      });
    });

    it("skips a zero leg", async () => {
      const loanId = h.originate(eth("2.2"), 60 * DAY);

      const { shares } = await h.loans.sellNoteAndDeposit(NOTE, loanId, eth("2"), [eth("1"), 0n], LENDER);

      expect(shares).toEqual([eth("2"), 0n]);
      expect(h.vault.shareBalance(Tranche.Junior, LENDER)).toBe(0n);
    });

    it("requires the allocation to sum to one", async () => {
      const loanId = h.originate(eth("2.2"), 60 * DAY);

      const err = await catchError(() =>
        h.loans.sellNoteAndDeposit(NOTE, loanId, eth("2"), [eth("0.5"), eth("0.4")], LENDER),
      );

      expect(err).toMatchObject({ code: "InvalidAllocation" });
    });
  });

  // ── Resolution ─────────────────────────────────────────────────────────────

  describe("repayment", () => {
    it("realizes the scheduled returns once the platform reports repayment", async () => {
      const loanId = h.originate(eth("2.2"), 30 * DAY);
      await h.loans.sellNote(NOTE, loanId, eth("2"), LENDER);

      expect(await catchError(() => h.loans.onLoanRepaid(NOTE, loanId))).toMatchObject({
        code: "LoanNotRepaid",
      });

      h.platform.repay(loanId);
      expect(h.assets.vaultHoldings).toBe(eth("15.2"));
      await h.loans.onLoanRepaid(NOTE, loanId);

      expect(h.vault.trancheState(Tranche.Senior).depositValue).toBe(10005479452054143999n);
      expect(h.vault.trancheState(Tranche.Junior).depositValue).toBe(5194520547945856001n);
      expect(h.vault.balances()).toMatchObject({
        totalCashBalance: eth("15.2"),
        totalLoanBalance: 0n,
      });
      expect(h.loans.loanState(NOTE, loanId)).toBeNull();
    });

    it("fails a second resolution without touching the ledger", async () => {
      const loanId = h.originate(eth("2.2"), 30 * DAY);
      await h.loans.sellNote(NOTE, loanId, eth("2"), LENDER);
      h.platform.repay(loanId);
      await h.loans.onLoanRepaid(NOTE, loanId);
      const { stateHash } = h.ledger.snapshot();
      const sequence = h.ledger.sequence;

      expect(await catchError(() => h.loans.onLoanRepaid(NOTE, loanId))).toMatchObject({ code: "UnknownLoan" });
      expect(await catchError(() => h.loans.onLoanLiquidated(NOTE, loanId))).toMatchObject({
        code: "UnknownLoan",
      });
      expect(h.ledger.sequence).toBe(sequence);
      expect(h.ledger.snapshot().stateHash).toBe(stateHash);
    });
  });

  describe("default and recovery", () => {
    let loanId: string;

    beforeEach(async () => {
      loanId = h.originate(eth("8"), 30 * DAY);
      h.pricer.nextPrice = eth("7");
      await h.loans.sellNote(NOTE, loanId, eth("7"), LENDER);
    });

    it("only forecloses once the loan has expired", async () => {
      expect(await catchError(() => h.loans.liquidateLoan(NOTE, loanId))).toMatchObject({
        code: "LoanNotExpired",
      });
    });

    it("writes the loss off junior first and recovers senior first", async () => {
      h.clock.advance(31 * DAY);

      expect(await h.loans.liquidateLoan(NOTE, loanId)).toEqual([eth("2"), eth("5")]);
      expect(await h.platform.isLiquidated(loanId)).toBe(true);
      expect(h.vault.trancheState(Tranche.Senior).depositValue).toBe(eth("8"));
      expect(h.vault.trancheState(Tranche.Junior).depositValue).toBe(0n);

      await h.loans.withdrawCollateral(NOTE, loanId, LIQUIDATOR);
      expect(h.custody.ownerOf(COLLATERAL, "77")).toBe(LIQUIDATOR.toLowerCase());

      h.assets.credit(LIQUIDATOR, eth("3"));
      expect(await h.loans.onCollateralLiquidated(NOTE, loanId, eth("3"), LIQUIDATOR)).toEqual([
        eth("2"),
        eth("1"),
      ]);

      expect(h.vault.trancheState(Tranche.Senior).depositValue).toBe(eth("10"));
      expect(h.vault.trancheState(Tranche.Junior).depositValue).toBe(eth("1"));
      expect(h.vault.balances()).toMatchObject({
        totalCashBalance: eth("11"),
        totalLoanBalance: 0n,
      });
      expect(h.assets.balanceOf(LIQUIDATOR)).toBe(0n);
      expect(h.loans.loanState(NOTE, loanId)).toBeNull();
    });

    it("hands proceeds above the purchase price to junior and stops senior at its loss", async () => {
      h.clock.advance(31 * DAY);
      await h.loans.liquidateLoan(NOTE, loanId);
      await h.loans.withdrawCollateral(NOTE, loanId, LIQUIDATOR);

      h.assets.credit(LIQUIDATOR, eth("9"));
      expect(await h.loans.onCollateralLiquidated(NOTE, loanId, eth("9"), LIQUIDATOR)).toEqual([
        eth("2"),
        eth("7"),
      ]);

      expect(h.vault.trancheState(Tranche.Senior).depositValue).toBe(eth("10"));
      expect(h.vault.trancheState(Tranche.Junior).depositValue).toBe(eth("7"));
      expect(h.vault.balances().totalCashBalance).toBe(eth("17"));
    });

    it("rejects a second delivery of proceeds without touching the ledger", async () => {
      h.clock.advance(31 * DAY);
      await h.loans.liquidateLoan(NOTE, loanId);
      await h.loans.withdrawCollateral(NOTE, loanId, LIQUIDATOR);
      h.assets.credit(LIQUIDATOR, eth("6"));
      await h.loans.onCollateralLiquidated(NOTE, loanId, eth("3"), LIQUIDATOR);
      const { stateHash } = h.ledger.snapshot();
      const sequence = h.ledger.sequence;

      expect(
        await catchError(() => h.loans.onCollateralLiquidated(NOTE, loanId, eth("3"), LIQUIDATOR)),
      ).toMatchObject({ code: "UnknownLoan" });
      expect(h.ledger.sequence).toBe(sequence);
      expect(h.ledger.snapshot().stateHash).toBe(stateHash);
      expect(h.assets.balanceOf(LIQUIDATOR)).toBe(eth("3"));
    });

    it("refuses to resolve a defaulted loan a second time", async () => {
      h.clock.advance(31 * DAY);
      await h.loans.liquidateLoan(NOTE, loanId);
      const { stateHash } = h.ledger.snapshot();
      const sequence = h.ledger.sequence;

      expect(await catchError(() => h.loans.onLoanRepaid(NOTE, loanId))).toMatchObject({ code: "UnknownLoan" });
      expect(await catchError(() => h.loans.onLoanLiquidated(NOTE, loanId))).toMatchObject({
        code: "UnknownLoan",
      });
      expect(await catchError(() => h.loans.liquidateLoan(NOTE, loanId))).toMatchObject({ code: "UnknownLoan" });
      expect(h.ledger.sequence).toBe(sequence);
      expect(h.ledger.snapshot().stateHash).toBe(stateHash);
    });

    it("books a default the platform already processed", async () => {
      h.clock.advance(31 * DAY);
      await h.platform.liquidate(loanId);

      expect(await h.loans.onLoanLiquidated(NOTE, loanId)).toEqual([eth("2"), eth("5")]);
      expect(h.loans.loanState(NOTE, loanId)).toMatchObject({ liquidated: true, active: true });
    });

    it("restricts collateral handling to liquidators and to a single withdrawal", async () => {
      expect(await catchError(() => h.loans.withdrawCollateral(NOTE, loanId, LIQUIDATOR))).toMatchObject({
        code: "LoanNotLiquidated",
      });

      h.clock.advance(31 * DAY);
      await h.loans.liquidateLoan(NOTE, loanId);

      expect(await catchError(() => h.loans.withdrawCollateral(NOTE, loanId, SENIOR_LP))).toMatchObject({
        code: "InvalidCaller",
      });
      expect(
        await catchError(() => h.loans.onCollateralLiquidated(NOTE, loanId, eth("1"), SENIOR_LP)),
      ).toMatchObject({ code: "InvalidCaller" });

      const loan = await h.loans.withdrawCollateral(NOTE, loanId, LIQUIDATOR);
      expect(loan.collateralLiquidator).toBe(LIQUIDATOR);
      expect(await catchError(() => h.loans.withdrawCollateral(NOTE, loanId, LIQUIDATOR))).toMatchObject({
        code: "LiquidationProcessed",
      });
    });

    it("rolls back the recovery when the proceeds cannot be pulled", async () => {
      h.clock.advance(31 * DAY);
      await h.loans.liquidateLoan(NOTE, loanId);

      const err = await catchError(() => h.loans.onCollateralLiquidated(NOTE, loanId, eth("3"), LIQUIDATOR));

      expect(err).toMatchObject({ name: "InsufficientBalanceError" });
      expect(h.loans.loanState(NOTE, loanId)).toMatchObject({ liquidated: true });
      expect(h.vault.balances().totalCashBalance).toBe(eth("8"));
    });
  });

  describe("quoteNote", () => {
    it("prices a note from its adapter terms", async () => {
      const loanId = h.originate(eth("2.2"), 30 * DAY);
      h.clock.advance(DAY);

      const quote = await h.loans.quoteNote(NOTE, loanId);

      expect(quote).toMatchObject({
        noteToken: NOTE,
        loanId,
        repayment: eth("2.2"),
        durationRemaining: 29 * DAY,
        purchasePrice: eth("2"),
      });
    });
  });
});
