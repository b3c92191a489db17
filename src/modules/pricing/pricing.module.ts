import { Module } from "@nestjs/common";
import { CollateralParametersRegistry } from "./collateral-parameters.registry";
import { LoanPricerService } from "./loan-pricer.service";

@Module({
  providers: [CollateralParametersRegistry, LoanPricerService],
  exports: [CollateralParametersRegistry, LoanPricerService],
})
export class PricingModule {}
