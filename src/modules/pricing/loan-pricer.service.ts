import { Injectable } from "@nestjs/common";
import { FIXED_POINT_SCALE, div, fromInteger } from "../../common/fixed-point";
import { VaultException } from "../../common/errors";
import { CollateralParametersRegistry } from "./collateral-parameters.registry";
import { evaluateRateModel } from "./rate-model";
import { LoanQuote, PriceLoanInput } from "./pricing.types";

/**
 * Risk-based present-value pricing. Pure with respect to the registry's
 * current parameters: the same input always yields the same quote.
 */
@Injectable()
export class LoanPricerService {
  constructor(private readonly registry: CollateralParametersRegistry) {}

  priceLoan(input: PriceLoanInput): LoanQuote {
    if (input.durationRemaining < this.registry.minimumTimeRemaining) {
      throw new VaultException(
        "InsufficientTimeRemaining",
        `${input.durationRemaining}s remaining, minimum is ${this.registry.minimumTimeRemaining}s`,
      );
    }

    const params = this.registry.get(input.collateralToken);
    if (!params || !params.enabled || params.collateralValue === 0n) {
      throw new VaultException(
        "UnsupportedCollateral",
        `No pricing parameters for ${input.collateralToken}`,
      );
    }

    const loanToValue = div(input.principal, params.collateralValue);
    const duration = BigInt(input.durationRemaining);

    const components = {
      utilization: evaluateRateModel(this.registry.getUtilizationModel(), input.utilization),
      loanToValue: evaluateRateModel(params.loanToValueModel, loanToValue),
      duration: evaluateRateModel(params.durationModel, fromInteger(duration)),
    };

    const [wUtil, wLtv, wDuration] = params.weights.map(BigInt);
    const discountRate =
      (wUtil * components.utilization +
        wLtv * components.loanToValue +
        wDuration * components.duration) /
      100n;

    const purchasePrice = div(input.repayment, FIXED_POINT_SCALE + discountRate * duration);

    return { purchasePrice, discountRate, loanToValue, components };
  }
}
