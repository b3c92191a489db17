/** Loan terms as normalized by a lending-platform adapter. */
export interface NoteLoanInfo {
  loanId: string;
  borrower: string;
  principal: bigint;
  repayment: bigint;
  /** Unix seconds. */
  maturity: number;
  /** Original term in seconds. */
  duration: number;
  collateralToken: string;
  collateralTokenId: string;
}

/**
 * Receivable adapter for one lending platform's promissory notes. Answers
 * are treated as ground truth at call time.
 */
export interface NoteAdapter {
  readonly name: string;

  getLoanInfo(loanId: string): Promise<NoteLoanInfo>;

  isRepaid(loanId: string): Promise<boolean>;
  isLiquidated(loanId: string): Promise<boolean>;
  isExpired(loanId: string): Promise<boolean>;

  /** Forecloses an expired loan on the platform, moving collateral to the noteholder. */
  liquidate(loanId: string): Promise<void>;
}
