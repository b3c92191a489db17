import { Type } from "class-transformer";
import { IsArray, IsEthereumAddress, IsInt, IsNotEmpty, IsString, ValidateNested } from "class-validator";

export class UpkeepItemDto {
  @IsEthereumAddress()
  noteToken!: string;

  @IsString()
  @IsNotEmpty()
  loanId!: string;

  /** 0 repaid, 1 liquidated on platform, 2 expired. Other values are rejected by the keeper. */
  @IsInt()
  code!: number;
}

export class PerformUpkeepDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => UpkeepItemDto)
  items!: UpkeepItemDto[];
}
