/**
 * Metabolic Scoring
 *
 * Risk transforms for metabolic markers (0–100, higher = worse) and the
 * conversion of the weighted metabolic risk index into a functional age.
 */

import type { BodyFatBand, Gender, RiskBands } from "@healthspan/contracts";
import type { ResolvedScoringConfig } from "./config.js";
import { clamp, linearInterpolate } from "./interpolation.js";

export type RiskScale = ResolvedScoringConfig["riskScale"];
export type HscrpCurvePoint = ResolvedScoringConfig["hscrpCurve"][number];

/**
 * Low-risk values score `optimal`; the normal band ramps linearly up to
 * `elevatedFloor`; elevated values keep climbing at the elevated slope
 * until `maximum`.
 */
export function riskScoreFromBands(value: number, bands: RiskBands, scale: RiskScale): number {
  const { lowRiskMax, normalMax, elevatedMin } = bands;
  if (value <= lowRiskMax) return scale.optimal;
  if (value < elevatedMin) {
    return scale.optimal + ((scale.elevatedFloor - scale.optimal) * (value - lowRiskMax)) / (elevatedMin - lowRiskMax);
  }
  const span = 2 * (normalMax - lowRiskMax);
  const score = scale.elevatedFloor + ((scale.maximum - scale.elevatedFloor) * (value - elevatedMin)) / span;
  return Math.min(score, scale.maximum);
}

export function hscrpRiskScore(value: number, curve: readonly HscrpCurvePoint[]): number {
  return linearInterpolate(
    value,
    curve.map((p) => ({ x: p.value, y: p.score }))
  );
}

/** Body-fat band for an age: the last band starting at or below it, else the youngest band. */
export function bodyFatBandFor(age: number, bands: readonly BodyFatBand[]): BodyFatBand {
  const [youngest] = bands;
  if (!youngest) throw new RangeError("At least one body fat band is required");
  let selected = youngest;
  for (const band of bands) {
    if (band.ageRange[0] <= age) selected = band;
  }
  return selected;
}

export function bodyFatRiskBands(
  gender: Gender,
  age: number,
  bands: ResolvedScoringConfig["bodyFatBands"],
): RiskBands {
  const band = bodyFatBandFor(age, bands[gender]);
  return { lowRiskMax: band.healthyMax, normalMax: band.overweightMax, elevatedMin: band.obeseMin };
}

/**
 * Risk index → functional age. The baseline index maps to the chronological
 * age; each baseline-sized step away from it moves the age by `spanYears`,
 * capped at ±spanYears.
 */
export function metabolicFunctionalAge(
  age: number,
  index: number,
  settings: ResolvedScoringConfig["metabolicAge"],
): number {
  const { baselineIndex, spanYears } = settings;
  const offset = clamp(((index - baselineIndex) * spanYears) / baselineIndex, -spanYears, spanYears);
  return Math.max(0, age + offset);
}
