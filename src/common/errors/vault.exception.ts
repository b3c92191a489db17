import { HttpException, HttpStatus } from "@nestjs/common";

export type VaultErrorCode =
  // input validation
  | "ParameterOutOfRange"
  | "InvalidAmount"
  | "InvalidAddress"
  | "InvalidAllocation"
  | "InvalidCollateralParameters"
  | "InvalidUpkeepCode"
  // access
  | "InvalidCaller"
  // state precondition
  | "UnknownLoan"
  | "UnsupportedNoteToken"
  | "RedemptionInProgress"
  | "InsufficientShares"
  | "TrancheInsolvent"
  | "LoanNotRepaid"
  | "LoanNotLiquidated"
  | "LoanNotExpired"
  | "LoanAlreadyPurchased"
  | "LiquidationProcessed"
  | "InvalidTrancheState"
  | "Paused"
  // economic precondition
  | "PriceMismatch"
  | "RepaymentTooLow"
  | "InsufficientLiquidity"
  | "SeniorReturnExceedsSpread"
  | "InsufficientTimeRemaining"
  | "UnsupportedCollateral"
  | "UnsupportedNoteParameters";

const STATUS_BY_CODE: Record<VaultErrorCode, HttpStatus> = {
  ParameterOutOfRange: HttpStatus.BAD_REQUEST,
  InvalidAmount: HttpStatus.BAD_REQUEST,
  InvalidAddress: HttpStatus.BAD_REQUEST,
  InvalidAllocation: HttpStatus.BAD_REQUEST,
  InvalidCollateralParameters: HttpStatus.BAD_REQUEST,
  InvalidUpkeepCode: HttpStatus.BAD_REQUEST,
  InvalidCaller: HttpStatus.FORBIDDEN,
  UnknownLoan: HttpStatus.NOT_FOUND,
  UnsupportedNoteToken: HttpStatus.NOT_FOUND,
  RedemptionInProgress: HttpStatus.CONFLICT,
  InsufficientShares: HttpStatus.CONFLICT,
  TrancheInsolvent: HttpStatus.CONFLICT,
  LoanNotRepaid: HttpStatus.CONFLICT,
  LoanNotLiquidated: HttpStatus.CONFLICT,
  LoanNotExpired: HttpStatus.CONFLICT,
  LoanAlreadyPurchased: HttpStatus.CONFLICT,
  LiquidationProcessed: HttpStatus.CONFLICT,
  InvalidTrancheState: HttpStatus.CONFLICT,
  Paused: HttpStatus.CONFLICT,
  PriceMismatch: HttpStatus.UNPROCESSABLE_ENTITY,
  RepaymentTooLow: HttpStatus.UNPROCESSABLE_ENTITY,
  InsufficientLiquidity: HttpStatus.UNPROCESSABLE_ENTITY,
  SeniorReturnExceedsSpread: HttpStatus.UNPROCESSABLE_ENTITY,
  InsufficientTimeRemaining: HttpStatus.UNPROCESSABLE_ENTITY,
  UnsupportedCollateral: HttpStatus.UNPROCESSABLE_ENTITY,
  UnsupportedNoteParameters: HttpStatus.UNPROCESSABLE_ENTITY,
};

/**
 * Domain rejection. Always raised before the ledger draft is committed,
 * so a caught VaultException means the committed state is untouched.
 */
export class VaultException extends HttpException {
  constructor(
    readonly code: VaultErrorCode,
    message: string = code,
  ) {
    const status = STATUS_BY_CODE[code];
    super({ statusCode: status, error: code, message }, status);
  }
}

export function isVaultException(
  err: unknown,
  code?: VaultErrorCode,
): err is VaultException {
  return err instanceof VaultException && (code === undefined || err.code === code);
}
