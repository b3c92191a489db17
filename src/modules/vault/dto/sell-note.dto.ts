import { IsEthereumAddress, IsNotEmpty, IsString, Matches } from "class-validator";
import { IsBigIntAmount, ToBigInt } from "../../../common/validation";

export class SellNoteDto {
  @IsEthereumAddress()
  noteToken!: string;

  @IsString()
  @IsNotEmpty()
  @Matches(/^\d+$/, { message: "loanId must be a decimal token id" })
  loanId!: string;

  /** Price the seller expects, in deposit-asset base units. */
  @ToBigInt()
  @IsBigIntAmount(1n)
  price!: bigint;
}

export class SellNoteAndDepositDto extends SellNoteDto {
  /** Fixed-point fraction of the price deposited into senior. */
  @ToBigInt()
  @IsBigIntAmount(0n)
  seniorAllocation!: bigint;

  @ToBigInt()
  @IsBigIntAmount(0n)
  juniorAllocation!: bigint;
}
