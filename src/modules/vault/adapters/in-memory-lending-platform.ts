import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { CLOCK, Clock } from "../../../common/clock";
import { VaultException } from "../../../common/errors";
import { NoteAdapter, NoteLoanInfo } from "../interfaces";
import { InMemoryAssetLedger } from "./in-memory-asset-ledger";
import { InMemoryCustody, VAULT_HOLDER } from "./in-memory-custody";

export interface OriginateLoanParams {
  borrower: string;
  principal: bigint;
  repayment: bigint;
  duration: number;
  collateralToken: string;
  collateralTokenId: string;
}

interface PlatformLoan extends NoteLoanInfo {
  repaid: boolean;
  liquidated: boolean;
}

/**
 * Simulated peer-to-peer lending platform whose promissory notes the vault
 * can buy. Its notes live under SIMULATION_NOTE_TOKEN; a repayment is paid
 * to whoever holds the note in `InMemoryCustody`.
 */
@Injectable()
export class InMemoryLendingPlatform implements NoteAdapter {
  readonly name = "in-memory";

  private readonly logger = new Logger(InMemoryLendingPlatform.name);
  private readonly loans = new Map<string, PlatformLoan>();
  private nextId = 1;

  private readonly noteToken?: string;

  constructor(
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly assets: InMemoryAssetLedger,
    private readonly custody: InMemoryCustody,
    config: ConfigService,
  ) {
    this.noteToken = config.get<string>("SIMULATION_NOTE_TOKEN");
  }

  /** Starts a loan maturing `duration` seconds from now. Returns its id. */
  originate(params: OriginateLoanParams): string {
    const loanId = String(this.nextId++);
    this.loans.set(loanId, {
      ...params,
      loanId,
      maturity: this.clock.now() + params.duration,
      repaid: false,
      liquidated: false,
    });
    this.logger.log(
      `[platform_originate] loan=${loanId} principal=${params.principal} repayment=${params.repayment} duration=${params.duration}s`,
    );
    return loanId;
  }

  repay(loanId: string): void {
    const loan = this.require(loanId);
    if (loan.liquidated) {
      throw new Error(`Loan ${loanId} was already liquidated`);
    }
    if (loan.repaid) {
      throw new Error(`Loan ${loanId} was already repaid`);
    }
    loan.repaid = true;

    const holder = this.noteToken ? this.custody.ownerOf(this.noteToken, loanId) : undefined;
    if (holder === VAULT_HOLDER) {
      this.assets.creditVault(loan.repayment);
    } else if (holder) {
      this.assets.credit(holder, loan.repayment);
    } else {
      this.logger.warn(`[platform_repay] loan=${loanId} has no recorded note holder; repayment not paid out`);
      return;
    }
    this.logger.log(`[platform_repay] loan=${loanId} amount=${loan.repayment} holder=${holder}`);
  }

  async getLoanInfo(loanId: string): Promise<NoteLoanInfo> {
    const loan = this.require(loanId);
    return {
      loanId: loan.loanId,
      borrower: loan.borrower,
      principal: loan.principal,
      repayment: loan.repayment,
      maturity: loan.maturity,
      duration: loan.duration,
      collateralToken: loan.collateralToken,
      collateralTokenId: loan.collateralTokenId,
    };
  }

  async isRepaid(loanId: string): Promise<boolean> {
    return this.require(loanId).repaid;
  }

  async isLiquidated(loanId: string): Promise<boolean> {
    return this.require(loanId).liquidated;
  }

  async isExpired(loanId: string): Promise<boolean> {
    const loan = this.require(loanId);
    return !loan.repaid && this.clock.now() > loan.maturity;
  }

  async liquidate(loanId: string): Promise<void> {
    if (!(await this.isExpired(loanId))) {
      throw new Error(`Loan ${loanId} is not expired`);
    }
    this.require(loanId).liquidated = true;
    this.logger.log(`[platform_liquidate] loan=${loanId}`);
  }

  private require(loanId: string): PlatformLoan {
    const loan = this.loans.get(loanId);
    if (!loan) {
      throw new VaultException("UnknownLoan", `Platform has no loan ${loanId}`);
    }
    return loan;
  }
}
