import { Module } from "@nestjs/common";
import { LedgerModule } from "../ledger";
import { HealthController } from "./health.controller";

@Module({
  imports: [LedgerModule],
  controllers: [HealthController],
})
export class HealthModule {}
