import { Injectable, Logger } from "@nestjs/common";
import { VaultException } from "../../common/errors";
import { LedgerService, LoanRecord, timeBucket } from "../ledger";
import { LoanLifecycleService, NoteAdapterRegistry } from "../vault";
import { UpkeepCode, UpkeepItem, UpkeepOutcome } from "./keeper.types";

const UPKEEP_CODES = new Set<number>([UpkeepCode.Repaid, UpkeepCode.Liquidated, UpkeepCode.Expired]);

/**
 * Finds held loans that have resolved on their platform and pushes the
 * matching resolution through the vault.
 */
@Injectable()
export class KeeperService {
  private readonly logger = new Logger(KeeperService.name);

  constructor(
    private readonly ledger: LedgerService,
    private readonly adapters: NoteAdapterRegistry,
    private readonly loans: LoanLifecycleService,
  ) {}

  /** Scans loans maturing in the previous and current time buckets. */
  async checkUpkeep(): Promise<UpkeepItem[]> {
    const now = this.ledger.now();
    const candidates = this.ledger.read((state) => {
      const current = timeBucket(now, state.parameters.timeBucketWidth);
      const found: LoanRecord[] = [];
      for (const bucket of [current - 1, current]) {
        for (const key of state.pendingLoans.get(bucket) ?? []) {
          const loan = state.loans.get(key);
          if (loan?.active && !loan.liquidated) found.push(loan);
        }
      }
      return found.map((l) => ({ noteToken: l.noteToken, loanId: l.loanId }));
    });

    const items: UpkeepItem[] = [];
    for (const { noteToken, loanId } of candidates) {
      try {
        const code = await this.classify(noteToken, loanId);
        if (code !== null) items.push({ noteToken, loanId, code });
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        this.logger.error(`[keeper_check_error] note=${noteToken} loan=${loanId} reason=${reason}`);
      }
    }
    if (items.length > 0) {
      this.logger.log(`[keeper_check] candidates=${candidates.length} due=${items.length}`);
    }
    return items;
  }

  /**
   * Dispatches each item to its resolution. Codes are validated up front;
   * a failing item is logged and the rest still run.
   */
  async performUpkeep(items: UpkeepItem[]): Promise<UpkeepOutcome[]> {
    const invalid = items.find((item) => !UPKEEP_CODES.has(item.code));
    if (invalid) {
      throw new VaultException("InvalidUpkeepCode", `Unknown upkeep code ${invalid.code}`);
    }

    const outcomes: UpkeepOutcome[] = [];
    for (const item of items) {
      try {
        await this.dispatch(item);
        outcomes.push({ ...item, ok: true });
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        this.logger.error(
          `[keeper_item_error] note=${item.noteToken} loan=${item.loanId} code=${item.code} reason=${reason}`,
        );
        outcomes.push({ ...item, ok: false, error: reason });
      }
    }
    return outcomes;
  }

  private async dispatch(item: UpkeepItem): Promise<void> {
    switch (item.code) {
      case UpkeepCode.Repaid:
        await this.loans.onLoanRepaid(item.noteToken, item.loanId);
        return;
      case UpkeepCode.Liquidated:
        await this.loans.onLoanLiquidated(item.noteToken, item.loanId);
        return;
      case UpkeepCode.Expired:
        await this.loans.liquidateLoan(item.noteToken, item.loanId);
        return;
      default:
        throw new VaultException("InvalidUpkeepCode", `Unknown upkeep code ${item.code}`);
    }
  }

  private async classify(noteToken: string, loanId: string): Promise<UpkeepCode | null> {
    const adapter = this.adapters.get(noteToken);
    if (await adapter.isRepaid(loanId)) return UpkeepCode.Repaid;
    if (await adapter.isLiquidated(loanId)) return UpkeepCode.Liquidated;
    if (await adapter.isExpired(loanId)) return UpkeepCode.Expired;
    return null;
  }
}
