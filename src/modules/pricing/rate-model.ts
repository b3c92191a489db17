import { FIXED_POINT_SCALE, div, min, mul } from "../../common/fixed-point";
import { VaultException } from "../../common/errors";
import { RateModel, RateModelAnchors } from "./pricing.types";

export function evaluateRateModel(model: RateModel, x: bigint): bigint {
  if (x > model.max) {
    throw new VaultException(
      "ParameterOutOfRange",
      `Rate model input ${x} exceeds max ${model.max}`,
    );
  }
  const belowKink = min(x, model.kink);
  const aboveKink = x > model.kink ? x - model.kink : 0n;
  return model.offset + mul(model.slope1, belowKink) + mul(model.slope2, aboveKink);
}

export function isValidRateModel(model: RateModel): boolean {
  return (
    model.offset >= 0n &&
    model.slope1 >= 0n &&
    model.slope2 >= 0n &&
    model.kink >= 0n &&
    model.kink <= model.max
  );
}

/**
 * Derives slopes from the rates at 0, at the kink and at max.
 * Rates must be non-decreasing and 0 < kink < max.
 */
export function buildRateModel(anchors: RateModelAnchors): RateModel {
  const { minRate, targetRate, maxRate, kink, max } = anchors;
  if (minRate < 0n || targetRate < minRate || maxRate < targetRate) {
    throw new VaultException(
      "ParameterOutOfRange",
      "Rate anchors must be non-negative and non-decreasing",
    );
  }
  if (kink <= 0n || max <= kink) {
    throw new VaultException("ParameterOutOfRange", "Require 0 < kink < max");
  }
  return {
    offset: minRate,
    slope1: div(targetRate - minRate, kink),
    slope2: div(maxRate - targetRate, max - kink),
    kink,
    max,
  };
}

/** Flat zero curve over [0, 1]. */
export const ZERO_UTILIZATION_MODEL: RateModel = {
  offset: 0n,
  slope1: 0n,
  slope2: 0n,
  kink: FIXED_POINT_SCALE,
  max: FIXED_POINT_SCALE,
};
