/**
 * Healthspan Index
 *
 * Linear map from the gap between chronological age and BFA onto a
 * credit-score-like range, plus its named category.
 */

import type { HealthspanCategoryBand } from "@healthspan/contracts";
import type { ResolvedScoringConfig } from "./config.js";
import { clamp } from "./interpolation.js";

export type HealthspanSettings = ResolvedScoringConfig["healthspan"];

export function calculateHealthspanIndex(age: number, bfa: number, settings: HealthspanSettings): number {
  const { bfaClamp } = settings;
  const effectiveBfa = bfaClamp ? clamp(bfa, bfaClamp.min, bfaClamp.max) : bfa;
  const raw = settings.baseScore + settings.pointsPerYear * (age - effectiveBfa);
  return clamp(raw, settings.minScore, settings.maxScore);
}

/**
 * Category for an index. Each band covers [min, next band's min); the top
 * band also includes its own max. Categories must be sorted ascending.
 */
export function categorizeHealthspanIndex(index: number, categories: readonly HealthspanCategoryBand[]): string {
  const [lowest] = categories;
  if (!lowest) throw new RangeError("At least one healthspan category is required");

  let match = lowest;
  for (const band of categories) {
    if (index >= band.min) match = band;
  }
  return match.name;
}
