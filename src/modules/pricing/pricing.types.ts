/**
 * Piecewise-linear curve. All fields are 18-decimal fixed point:
 * rate = offset + slope1·min(x, kink) + slope2·max(0, x − kink), x ≤ max.
 */
export interface RateModel {
  offset: bigint;
  slope1: bigint;
  slope2: bigint;
  kink: bigint;
  max: bigint;
}

/** Rate-anchored description of a RateModel, as an operator would state it. */
export interface RateModelAnchors {
  minRate: bigint;
  targetRate: bigint;
  maxRate: bigint;
  kink: bigint;
  max: bigint;
}

/** Integer percent weights for [utilization, loan-to-value, duration]. */
export type RateComponentWeights = [number, number, number];

export interface CollateralRiskParameters {
  enabled: boolean;
  /** Appraised collateral value in deposit-asset base units. */
  collateralValue: bigint;
  loanToValueModel: RateModel;
  durationModel: RateModel;
  weights: RateComponentWeights;
}

export interface PriceLoanInput {
  collateralToken: string;
  principal: bigint;
  repayment: bigint;
  /** Seconds until maturity. */
  durationRemaining: number;
  /** Pool utilization, fixed point. */
  utilization: bigint;
}

export interface LoanQuote {
  purchasePrice: bigint;
  /** Per-second discount rate, fixed point. */
  discountRate: bigint;
  loanToValue: bigint;
  components: {
    utilization: bigint;
    loanToValue: bigint;
    duration: bigint;
  };
}
