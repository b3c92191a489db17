export { PricingModule } from "./pricing.module";
export { LoanPricerService } from "./loan-pricer.service";
export { CollateralParametersRegistry } from "./collateral-parameters.registry";
export { buildRateModel, evaluateRateModel, isValidRateModel } from "./rate-model";
export * from "./pricing.types";
