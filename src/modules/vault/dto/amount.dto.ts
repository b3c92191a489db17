import { IsBigIntAmount, ToBigInt } from "../../../common/validation";

export class DepositDto {
  @ToBigInt()
  @IsBigIntAmount(1n)
  amount!: bigint;
}

export class RedeemDto {
  @ToBigInt()
  @IsBigIntAmount(1n)
  shares!: bigint;
}

export class WithdrawDto {
  @ToBigInt()
  @IsBigIntAmount(1n)
  amount!: bigint;
}

export class CollateralProceedsDto {
  @ToBigInt()
  @IsBigIntAmount(0n)
  proceeds!: bigint;
}
