import { Inject, Injectable, Logger } from "@nestjs/common";
import { FIXED_POINT_SCALE, mul } from "../../common/fixed-point";
import { VaultException } from "../../common/errors";
import { normalizeAddress } from "../../common/validation";
import { ACCESS_POLICY, AccessPolicy, VaultRole } from "../access";
import {
  LedgerService,
  LedgerTransaction,
  LoanRecord,
  TRANCHES,
  applyDefault,
  applyRecovery,
  assertNotPaused,
  depositInto,
  findLoan,
  getActiveLoan,
  getLiquidatedLoan,
  recordPurchase,
  settleRepayment,
  utilization,
} from "../ledger";
import { CollateralParametersRegistry, LoanPricerService } from "../pricing";
import {
  ASSET_TRANSFER,
  AssetTransfer,
  COLLATERAL_CUSTODY,
  CollateralCustody,
  NoteLoanInfo,
} from "./interfaces";
import { NoteAdapterRegistry } from "./note-adapter.registry";
import { DepositAllocation, NoteQuote } from "./vault.types";

function copyLoan(loan: LoanRecord): LoanRecord {
  return { ...loan, trancheReturns: [...loan.trancheReturns] };
}

/**
 * Note purchases and everything that resolves a held loan: repayment,
 * default, foreclosure and collateral liquidation.
 */
@Injectable()
export class LoanLifecycleService {
  private readonly logger = new Logger(LoanLifecycleService.name);

  constructor(
    private readonly ledger: LedgerService,
    private readonly adapters: NoteAdapterRegistry,
    private readonly pricer: LoanPricerService,
    private readonly pricingParameters: CollateralParametersRegistry,
    @Inject(ASSET_TRANSFER) private readonly assets: AssetTransfer,
    @Inject(COLLATERAL_CUSTODY) private readonly custody: CollateralCustody,
    @Inject(ACCESS_POLICY) private readonly access: AccessPolicy,
  ) {}

  // ── Quotes ───────────────────────────────────────────────────────────────

  async quoteNote(noteToken: string, loanId: string): Promise<NoteQuote> {
    const token = normalizeAddress(noteToken);
    const info = await this.adapters.get(token).getLoanInfo(loanId);
    const now = this.ledger.now();
    const durationRemaining = info.maturity - now;
    const quote = this.pricer.priceLoan({
      collateralToken: info.collateralToken,
      principal: info.principal,
      repayment: info.repayment,
      durationRemaining,
      utilization: this.ledger.read(utilization),
    });
    return {
      ...quote,
      noteToken: token,
      loanId,
      principal: info.principal,
      repayment: info.repayment,
      maturity: info.maturity,
      durationRemaining,
    };
  }

  // ── Purchases ────────────────────────────────────────────────────────────

  /** Buys the note at the engine's price and pays the seller. */
  async sellNote(
    noteToken: string,
    loanId: string,
    offeredPrice: bigint,
    seller: string,
  ): Promise<LoanRecord> {
    const token = normalizeAddress(noteToken);
    const from = normalizeAddress(seller);

    const loan = await this.ledger.execute("sell-note", async (tx) => {
      assertNotPaused(tx.draft);
      const purchased = await this.purchase(tx, token, loanId, offeredPrice, from);
      tx.interact("push-purchase-price", () => this.assets.push(from, purchased.purchasePrice));
      return copyLoan(purchased);
    });

    this.logPurchase(loan, from);
    return loan;
  }

  /**
   * Buys the note and deposits the price for the seller across tranches
   * instead of paying out. Returns the loan and the shares minted per tranche.
   */
  async sellNoteAndDeposit(
    noteToken: string,
    loanId: string,
    offeredPrice: bigint,
    allocation: DepositAllocation,
    seller: string,
  ): Promise<{ loan: LoanRecord; shares: [bigint, bigint] }> {
    const [seniorFraction, juniorFraction] = allocation;
    if (seniorFraction < 0n || juniorFraction < 0n || seniorFraction + juniorFraction !== FIXED_POINT_SCALE) {
      throw new VaultException(
        "InvalidAllocation",
        `Allocation ${seniorFraction}/${juniorFraction} must sum to ${FIXED_POINT_SCALE}`,
      );
    }
    const token = normalizeAddress(noteToken);
    const from = normalizeAddress(seller);

    const result = await this.ledger.execute("sell-note-and-deposit", async (tx) => {
      assertNotPaused(tx.draft);
      const purchased = await this.purchase(tx, token, loanId, offeredPrice, from);

      const seniorAmount = mul(purchased.purchasePrice, seniorFraction);
      const amounts: [bigint, bigint] = [seniorAmount, purchased.purchasePrice - seniorAmount];
      const shares: [bigint, bigint] = [0n, 0n];
      for (const tranche of TRANCHES) {
        if (amounts[tranche] > 0n) {
          shares[tranche] = depositInto(tx.draft, tranche, from, amounts[tranche], tx.now);
        }
      }
      return { loan: copyLoan(purchased), shares };
    });

    this.logPurchase(result.loan, from);
    this.logger.log(
      `[vault_sell_deposit] seller=${from} seniorShares=${result.shares[0]} juniorShares=${result.shares[1]}`,
    );
    return result;
  }

  private async purchase(
    tx: LedgerTransaction,
    noteToken: string,
    loanId: string,
    offeredPrice: bigint,
    seller: string,
  ): Promise<LoanRecord> {
    const adapter = this.adapters.get(noteToken);
    if (findLoan(tx.draft, noteToken, loanId)) {
      throw new VaultException("LoanAlreadyPurchased", `Loan ${loanId} of ${noteToken} is already held`);
    }

    const info = await adapter.getLoanInfo(loanId);
    const [repaid, liquidated, expired] = await Promise.all([
      adapter.isRepaid(loanId),
      adapter.isLiquidated(loanId),
      adapter.isExpired(loanId),
    ]);
    if (repaid || liquidated || expired || info.maturity <= tx.now) {
      throw new VaultException(
        "UnsupportedNoteParameters",
        `Loan ${loanId} is not open (repaid=${repaid} liquidated=${liquidated} expired=${expired})`,
      );
    }

    const price = this.verifyPrice(tx, info, offeredPrice);
    const loan = recordPurchase(
      tx.draft,
      {
        noteToken,
        loanId,
        collateralToken: info.collateralToken,
        collateralTokenId: info.collateralTokenId,
        purchasePrice: price,
        repayment: info.repayment,
        maturity: info.maturity,
      },
      tx.now,
    );
    tx.interact(
      "receive-note",
      () => this.custody.receiveNote(noteToken, loanId, seller),
      () => this.custody.returnNote(noteToken, loanId, seller),
    );
    return loan;
  }

  /** Re-prices the note and rejects offers outside the quote tolerance. */
  private verifyPrice(tx: LedgerTransaction, info: NoteLoanInfo, offeredPrice: bigint): bigint {
    const quote = this.pricer.priceLoan({
      collateralToken: info.collateralToken,
      principal: info.principal,
      repayment: info.repayment,
      durationRemaining: info.maturity - tx.now,
      utilization: utilization(tx.draft),
    });
    const difference =
      quote.purchasePrice > offeredPrice
        ? quote.purchasePrice - offeredPrice
        : offeredPrice - quote.purchasePrice;
    if (difference > this.pricingParameters.quoteTolerance) {
      throw new VaultException(
        "PriceMismatch",
        `Offered ${offeredPrice}, engine price ${quote.purchasePrice}`,
      );
    }
    return quote.purchasePrice;
  }

  // ── Resolution ───────────────────────────────────────────────────────────

  async onLoanRepaid(noteToken: string, loanId: string): Promise<void> {
    const token = normalizeAddress(noteToken);
    const loan = await this.ledger.execute("loan-repaid", async (tx) => {
      const held = getActiveLoan(tx.draft, token, loanId);
      if (!(await this.adapters.get(token).isRepaid(loanId))) {
        throw new VaultException("LoanNotRepaid", `Loan ${loanId} of ${token} is not repaid`);
      }
      settleRepayment(tx.draft, held);
      return copyLoan(held);
    });

    this.logger.log(
      `[vault_repaid] note=${token} loan=${loanId} repayment=${loan.repayment} senior=${loan.trancheReturns[0]} junior=${loan.trancheReturns[1]}`,
    );
  }

  async onLoanLiquidated(noteToken: string, loanId: string): Promise<[bigint, bigint]> {
    const token = normalizeAddress(noteToken);
    const losses = await this.ledger.execute("loan-liquidated", async (tx) => {
      const held = getActiveLoan(tx.draft, token, loanId);
      if (!(await this.adapters.get(token).isLiquidated(loanId))) {
        throw new VaultException("LoanNotLiquidated", `Loan ${loanId} of ${token} is not liquidated`);
      }
      return applyDefault(tx.draft, held);
    });

    this.logDefault(token, loanId, losses);
    return losses;
  }

  /** Forecloses an expired held loan on its platform and books the default. */
  async liquidateLoan(noteToken: string, loanId: string): Promise<[bigint, bigint]> {
    const token = normalizeAddress(noteToken);
    const losses = await this.ledger.execute("liquidate-loan", async (tx) => {
      const held = getActiveLoan(tx.draft, token, loanId);
      const adapter = this.adapters.get(token);
      if (!(await adapter.isExpired(loanId))) {
        throw new VaultException("LoanNotExpired", `Loan ${loanId} of ${token} has not expired`);
      }
      const result = applyDefault(tx.draft, held);
      tx.interact("platform-liquidate", () => adapter.liquidate(loanId));
      return result;
    });

    this.logDefault(token, loanId, losses);
    return losses;
  }

  /** Hands the collateral of a defaulted loan to a liquidator. Once per loan. */
  async withdrawCollateral(noteToken: string, loanId: string, caller: string): Promise<LoanRecord> {
    const token = normalizeAddress(noteToken);
    const liquidator = normalizeAddress(caller);
    this.access.assertRole(liquidator, VaultRole.Liquidator);

    const loan = await this.ledger.execute("withdraw-collateral", (tx) => {
      const held = findLoan(tx.draft, token, loanId);
      if (!held) {
        throw new VaultException("UnknownLoan", `No loan ${loanId} for ${token}`);
      }
      if (!held.liquidated) {
        throw new VaultException("LoanNotLiquidated", `Loan ${loanId} of ${token} is not liquidated`);
      }
      if (held.collateralLiquidator !== null) {
        throw new VaultException(
          "LiquidationProcessed",
          `Collateral already withdrawn by ${held.collateralLiquidator}`,
        );
      }
      held.collateralLiquidator = liquidator;
      tx.interact("release-collateral", () =>
        this.custody.releaseCollateral(held.collateralToken, held.collateralTokenId, liquidator),
      );
      return copyLoan(held);
    });

    this.logger.log(
      `[vault_collateral_out] note=${token} loan=${loanId} collateral=${loan.collateralToken}#${loan.collateralTokenId} liquidator=${liquidator}`,
    );
    return loan;
  }

  /** Takes liquidation proceeds from the liquidator and distributes them senior-first. */
  async onCollateralLiquidated(
    noteToken: string,
    loanId: string,
    proceeds: bigint,
    caller: string,
  ): Promise<[bigint, bigint]> {
    const token = normalizeAddress(noteToken);
    const liquidator = normalizeAddress(caller);
    this.access.assertRole(liquidator, VaultRole.Liquidator);
    if (proceeds < 0n) {
      throw new VaultException("InvalidAmount", "Proceeds must be non-negative");
    }

    const recoveries = await this.ledger.execute("collateral-liquidated", (tx) => {
      const held = getLiquidatedLoan(tx.draft, token, loanId);
      const result = applyRecovery(tx.draft, held, proceeds);
      tx.interact("pull-proceeds", () => this.assets.pull(liquidator, proceeds));
      return result;
    });

    this.logger.log(
      `[vault_recovery] note=${token} loan=${loanId} proceeds=${proceeds} senior=${recoveries[0]} junior=${recoveries[1]}`,
    );
    return recoveries;
  }

  // ── Views ────────────────────────────────────────────────────────────────

  loanState(noteToken: string, loanId: string): LoanRecord | null {
    const token = normalizeAddress(noteToken);
    return this.ledger.read((state) => {
      const loan = findLoan(state, token, loanId);
      return loan ? copyLoan(loan) : null;
    });
  }

  private logPurchase(loan: LoanRecord, seller: string): void {
    this.logger.log(
      `[vault_purchase] note=${loan.noteToken} loan=${loan.loanId} seller=${seller} price=${loan.purchasePrice} repayment=${loan.repayment} senior=${loan.trancheReturns[0]} junior=${loan.trancheReturns[1]}`,
    );
  }

  private logDefault(noteToken: string, loanId: string, losses: [bigint, bigint]): void {
    this.logger.warn(
      `[vault_default] note=${noteToken} loan=${loanId} seniorLoss=${losses[0]} juniorLoss=${losses[1]}`,
    );
  }
}
