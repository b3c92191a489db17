import { Module } from "@nestjs/common";
import { AccessModule } from "../access";
import { KeeperModule } from "../keeper";
import { LedgerModule } from "../ledger";
import { PricingModule } from "../pricing";
import { VaultAdminController } from "./vault-admin.controller";
import { VaultAdminService } from "./vault-admin.service";

@Module({
  imports: [LedgerModule, PricingModule, AccessModule, KeeperModule],
  providers: [VaultAdminService],
  controllers: [VaultAdminController],
})
export class AdminModule {}
