export enum UpkeepCode {
  Repaid = 0,
  Liquidated = 1,
  Expired = 2,
}

export interface UpkeepItem {
  noteToken: string;
  loanId: string;
  code: number;
}

export interface UpkeepOutcome extends UpkeepItem {
  ok: boolean;
  error?: string;
}
