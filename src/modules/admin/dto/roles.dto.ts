import { IsEnum, IsEthereumAddress } from "class-validator";
import { VaultRole } from "../../access";

export class RoleChangeDto {
  @IsEnum(VaultRole)
  role!: VaultRole;

  @IsEthereumAddress()
  account!: string;
}
