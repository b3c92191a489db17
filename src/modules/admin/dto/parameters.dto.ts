import { Type } from "class-transformer";
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsInt,
  Min,
  ValidateNested,
} from "class-validator";
import { IsBigIntAmount, ToBigInt } from "../../../common/validation";

export class SeniorTrancheRateDto {
  /** Per-second fixed-point rate. */
  @ToBigInt()
  @IsBigIntAmount(0n)
  rate!: bigint;
}

export class ReserveRatioDto {
  @ToBigInt()
  @IsBigIntAmount(0n)
  ratio!: bigint;
}

export class PauseDto {
  @IsBoolean()
  paused!: boolean;
}

export class RateModelAnchorsDto {
  @ToBigInt()
  @IsBigIntAmount(0n)
  minRate!: bigint;

  @ToBigInt()
  @IsBigIntAmount(0n)
  targetRate!: bigint;

  @ToBigInt()
  @IsBigIntAmount(0n)
  maxRate!: bigint;

  @ToBigInt()
  @IsBigIntAmount(0n)
  kink!: bigint;

  @ToBigInt()
  @IsBigIntAmount(0n)
  max!: bigint;
}

export class CollateralParametersDto {
  @IsBoolean()
  enabled!: boolean;

  @ToBigInt()
  @IsBigIntAmount(0n)
  collateralValue!: bigint;

  @ValidateNested()
  @Type(() => RateModelAnchorsDto)
  loanToValueModel!: RateModelAnchorsDto;

  @ValidateNested()
  @Type(() => RateModelAnchorsDto)
  durationModel!: RateModelAnchorsDto;

  /** Percent weights for [utilization, loan-to-value, duration]. */
  @IsArray()
  @ArrayMinSize(3)
  @ArrayMaxSize(3)
  @IsInt({ each: true })
  @Min(0, { each: true })
  weights!: number[];
}
