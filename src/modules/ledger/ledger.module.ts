import { Module } from "@nestjs/common";
import { CLOCK, SystemClock } from "../../common/clock";
import { LedgerService } from "./ledger.service";
import { LedgerSnapshotStore } from "./ledger-snapshot.store";

@Module({
  providers: [{ provide: CLOCK, useClass: SystemClock }, LedgerService, LedgerSnapshotStore],
  exports: [CLOCK, LedgerService],
})
export class LedgerModule {}
