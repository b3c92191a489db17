import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { VaultException } from "../../common/errors";
import { normalizeAddress } from "../../common/validation";
import { isValidRateModel, ZERO_UTILIZATION_MODEL } from "./rate-model";
import { CollateralRiskParameters, RateModel } from "./pricing.types";

const DEFAULT_MIN_TIME_REMAINING = 7 * 86_400;

/**
 * Administrator-owned pricing parameters. Replaced wholesale, read-only
 * during pricing.
 */
@Injectable()
export class CollateralParametersRegistry {
  private readonly logger = new Logger(CollateralParametersRegistry.name);
  private readonly parameters = new Map<string, CollateralRiskParameters>();
  private utilizationModel: RateModel = ZERO_UTILIZATION_MODEL;

  readonly minimumTimeRemaining: number;
  readonly quoteTolerance: bigint;

  constructor(config: ConfigService) {
    this.minimumTimeRemaining = config.get<number>(
      "PRICING_MIN_TIME_REMAINING_SECONDS",
      DEFAULT_MIN_TIME_REMAINING,
    );
    this.quoteTolerance = BigInt(config.get<string>("PRICING_QUOTE_TOLERANCE", "0"));
  }

  get(collateralToken: string): CollateralRiskParameters | undefined {
    return this.parameters.get(normalizeAddress(collateralToken));
  }

  set(collateralToken: string, params: CollateralRiskParameters): void {
    const token = normalizeAddress(collateralToken);
    const weightSum = params.weights.reduce((acc, w) => acc + w, 0);
    if (params.weights.some((w) => !Number.isInteger(w) || w < 0) || weightSum !== 100) {
      throw new VaultException(
        "InvalidCollateralParameters",
        `Rate component weights must be non-negative integers summing to 100 (got ${weightSum})`,
      );
    }
    if (!isValidRateModel(params.loanToValueModel) || !isValidRateModel(params.durationModel)) {
      throw new VaultException(
        "InvalidCollateralParameters",
        "Rate models must be non-negative with kink <= max",
      );
    }
    if (params.collateralValue < 0n) {
      throw new VaultException("InvalidCollateralParameters", "Negative collateral value");
    }
    this.parameters.set(token, {
      ...params,
      weights: [...params.weights],
    });
    this.logger.log(
      `[pricing_params] collateral=${token} enabled=${params.enabled} value=${params.collateralValue} weights=${params.weights.join("/")}`,
    );
  }

  getUtilizationModel(): RateModel {
    return this.utilizationModel;
  }

  setUtilizationModel(model: RateModel): void {
    if (!isValidRateModel(model)) {
      throw new VaultException(
        "ParameterOutOfRange",
        "Utilization model must be non-negative with kink <= max",
      );
    }
    this.utilizationModel = { ...model };
    this.logger.log(`[pricing_params] utilization model kink=${model.kink} max=${model.max}`);
  }
}
