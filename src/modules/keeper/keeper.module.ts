import { Module } from "@nestjs/common";
import { ScheduleModule } from "@nestjs/schedule";
import { LedgerModule } from "../ledger";
import { VaultModule } from "../vault";
import { KeeperScheduler } from "./keeper.scheduler";
import { KeeperService } from "./keeper.service";

@Module({
  imports: [ScheduleModule.forRoot(), LedgerModule, VaultModule],
  providers: [KeeperService, KeeperScheduler],
  exports: [KeeperService],
})
export class KeeperModule {}
