import { IsEthereumAddress, IsInt, IsString, Matches, Min } from "class-validator";
import { IsBigIntAmount, ToBigInt } from "../../../common/validation";

export class FaucetDto {
  @IsEthereumAddress()
  account!: string;

  @ToBigInt()
  @IsBigIntAmount(1n)
  amount!: bigint;
}

export class OriginateSimulatedLoanDto {
  @IsEthereumAddress()
  borrower!: string;

  /** Receives the note, and so the repayment until the note is sold. */
  @IsEthereumAddress()
  lender!: string;

  @ToBigInt()
  @IsBigIntAmount(1n)
  principal!: bigint;

  @ToBigInt()
  @IsBigIntAmount(1n)
  repayment!: bigint;

  @IsInt()
  @Min(1)
  durationSeconds!: number;

  @IsEthereumAddress()
  collateralToken!: string;

  @IsString()
  @Matches(/^\d+$/, { message: "collateralTokenId must be a decimal token id" })
  collateralTokenId!: string;
}
