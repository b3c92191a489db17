import { Body, Controller, Get, Headers, HttpCode, HttpStatus, Param, Post } from "@nestjs/common";
import { CollateralProceedsDto, DepositDto, RedeemDto, SellNoteAndDepositDto, SellNoteDto, WithdrawDto } from "./dto";
import { LoanLifecycleService } from "./loan-lifecycle.service";
import { VaultService } from "./vault.service";
import {
  parseTrancheParam,
  requireHeader,
  serializeBalances,
  serializeLoan,
  serializeQuote,
  serializeRedemption,
  serializeSplit,
  serializeTranche,
} from "./vault.http";

/**
 * Depositor and platform-facing vault routes. The acting account is taken
 * from the x-account header.
 *
 * Routes:
 *   GET  /vault/balances
 *   GET  /vault/tranches/:tranche
 *   GET  /vault/tranches/:tranche/position            - caller's shares + redemption
 *   POST /vault/tranches/:tranche/deposit
 *   POST /vault/tranches/:tranche/redeem
 *   POST /vault/tranches/:tranche/withdraw
 *   POST /vault/tranches/:tranche/withdraw-max
 *   POST /vault/notes/sell
 *   POST /vault/notes/sell-and-deposit
 *   GET  /vault/loans/:noteToken/:loanId
 *   GET  /vault/loans/:noteToken/:loanId/quote
 *   POST /vault/loans/:noteToken/:loanId/repaid
 *   POST /vault/loans/:noteToken/:loanId/liquidated
 *   POST /vault/loans/:noteToken/:loanId/liquidate
 *   POST /vault/loans/:noteToken/:loanId/collateral/withdraw   - liquidators
 *   POST /vault/loans/:noteToken/:loanId/collateral/proceeds   - liquidators
 */
@Controller("vault")
export class VaultController {
  constructor(
    private readonly vault: VaultService,
    private readonly loans: LoanLifecycleService,
  ) {}

  // ── Tranches ───────────────────────────────────────────────────────────────

  @Get("balances")
  balances() {
    return serializeBalances(this.vault.balances());
  }

  @Get("tranches/:tranche")
  tranche(@Param("tranche") tranche: string) {
    return serializeTranche(this.vault.trancheState(parseTrancheParam(tranche)));
  }

  @Get("tranches/:tranche/position")
  position(@Param("tranche") tranche: string, @Headers("x-account") account: string | undefined) {
    const t = parseTrancheParam(tranche);
    const caller = requireHeader(account, "x-account");
    return {
      shares: this.vault.shareBalance(t, caller).toString(),
      redemption: serializeRedemption(this.vault.redemptionState(t, caller)),
    };
  }

  @Post("tranches/:tranche/deposit")
  async deposit(
    @Param("tranche") tranche: string,
    @Headers("x-account") account: string | undefined,
    @Body() dto: DepositDto,
  ) {
    const shares = await this.vault.deposit(
      parseTrancheParam(tranche),
      requireHeader(account, "x-account"),
      dto.amount,
    );
    return { shares: shares.toString() };
  }

  @Post("tranches/:tranche/redeem")
  async redeem(
    @Param("tranche") tranche: string,
    @Headers("x-account") account: string | undefined,
    @Body() dto: RedeemDto,
  ) {
    const amount = await this.vault.redeem(
      parseTrancheParam(tranche),
      requireHeader(account, "x-account"),
      dto.shares,
    );
    return { amount: amount.toString() };
  }

  @Post("tranches/:tranche/withdraw")
  @HttpCode(HttpStatus.OK)
  async withdraw(
    @Param("tranche") tranche: string,
    @Headers("x-account") account: string | undefined,
    @Body() dto: WithdrawDto,
  ) {
    const amount = await this.vault.withdraw(
      parseTrancheParam(tranche),
      requireHeader(account, "x-account"),
      dto.amount,
    );
    return { amount: amount.toString() };
  }

  @Post("tranches/:tranche/withdraw-max")
  @HttpCode(HttpStatus.OK)
  async withdrawMax(@Param("tranche") tranche: string, @Headers("x-account") account: string | undefined) {
    const amount = await this.vault.withdrawMax(
      parseTrancheParam(tranche),
      requireHeader(account, "x-account"),
    );
    return { amount: amount.toString() };
  }

  // ── Notes ──────────────────────────────────────────────────────────────────

  @Post("notes/sell")
  async sellNote(@Headers("x-account") account: string | undefined, @Body() dto: SellNoteDto) {
    const loan = await this.loans.sellNote(
      dto.noteToken,
      dto.loanId,
      dto.price,
      requireHeader(account, "x-account"),
    );
    return serializeLoan(loan);
  }

  @Post("notes/sell-and-deposit")
  async sellNoteAndDeposit(
    @Headers("x-account") account: string | undefined,
    @Body() dto: SellNoteAndDepositDto,
  ) {
    const { loan, shares } = await this.loans.sellNoteAndDeposit(
      dto.noteToken,
      dto.loanId,
      dto.price,
      [dto.seniorAllocation, dto.juniorAllocation],
      requireHeader(account, "x-account"),
    );
    return { loan: serializeLoan(loan), shares: serializeSplit(shares) };
  }

  // ── Loans ──────────────────────────────────────────────────────────────────

  @Get("loans/:noteToken/:loanId")
  loan(@Param("noteToken") noteToken: string, @Param("loanId") loanId: string) {
    const loan = this.loans.loanState(noteToken, loanId);
    return loan ? serializeLoan(loan) : null;
  }

  @Get("loans/:noteToken/:loanId/quote")
  async quote(@Param("noteToken") noteToken: string, @Param("loanId") loanId: string) {
    return serializeQuote(await this.loans.quoteNote(noteToken, loanId));
  }

  @Post("loans/:noteToken/:loanId/repaid")
  @HttpCode(HttpStatus.OK)
  async repaid(@Param("noteToken") noteToken: string, @Param("loanId") loanId: string) {
    await this.loans.onLoanRepaid(noteToken, loanId);
    return { ok: true };
  }

  @Post("loans/:noteToken/:loanId/liquidated")
  @HttpCode(HttpStatus.OK)
  async liquidated(@Param("noteToken") noteToken: string, @Param("loanId") loanId: string) {
    return { losses: serializeSplit(await this.loans.onLoanLiquidated(noteToken, loanId)) };
  }

  @Post("loans/:noteToken/:loanId/liquidate")
  @HttpCode(HttpStatus.OK)
  async liquidate(@Param("noteToken") noteToken: string, @Param("loanId") loanId: string) {
    return { losses: serializeSplit(await this.loans.liquidateLoan(noteToken, loanId)) };
  }

  @Post("loans/:noteToken/:loanId/collateral/withdraw")
  @HttpCode(HttpStatus.OK)
  async withdrawCollateral(
    @Param("noteToken") noteToken: string,
    @Param("loanId") loanId: string,
    @Headers("x-account") account: string | undefined,
  ) {
    const loan = await this.loans.withdrawCollateral(noteToken, loanId, requireHeader(account, "x-account"));
    return serializeLoan(loan);
  }

  @Post("loans/:noteToken/:loanId/collateral/proceeds")
  @HttpCode(HttpStatus.OK)
  async collateralProceeds(
    @Param("noteToken") noteToken: string,
    @Param("loanId") loanId: string,
    @Headers("x-account") account: string | undefined,
    @Body() dto: CollateralProceedsDto,
  ) {
    const recoveries = await this.loans.onCollateralLiquidated(
      noteToken,
      loanId,
      dto.proceeds,
      requireHeader(account, "x-account"),
    );
    return { recoveries: serializeSplit(recoveries) };
  }
}
