export const COLLATERAL_CUSTODY = Symbol("COLLATERAL_CUSTODY");

/** Custody of non-fungible notes and collateral. */
export interface CollateralCustody {
  /** Takes the note for `loanId` from `from` into vault custody. */
  receiveNote(noteToken: string, loanId: string, from: string): Promise<void>;

  /** Gives a note taken by `receiveNote` back to `to`. */
  returnNote(noteToken: string, loanId: string, to: string): Promise<void>;

  /** Hands foreclosed collateral to a liquidator. */
  releaseCollateral(collateralToken: string, tokenId: string, to: string): Promise<void>;
}
