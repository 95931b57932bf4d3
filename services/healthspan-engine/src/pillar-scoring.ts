/**
 * Pillar Scoring
 *
 * Folds per-test scores into the five pillar functional ages. A pillar is
 * INCOMPLETE (null) as soon as one contributing score is missing; the
 * remaining weights are never renormalised.
 */

import type { PillarId, TestId } from "@healthspan/contracts";
import type { ResolvedScoringConfig, SubtestWeight } from "./config.js";
import { metabolicFunctionalAge } from "./metabolic-scoring.js";
import type { TestScore, TestScores } from "./test-scoring.js";

export type PillarAges = Record<PillarId, number | null>;

export type PillarResult = {
  pillars: PillarAges;
  metabolicIndex: number | null;
};

/** Σ weight × value, or null when any value is missing. */
export function weightedSum<K>(
  entries: ReadonlyArray<{ key: K; weight: number }>,
  valueOf: (key: K) => number | null,
): number | null {
  let total = 0;
  for (const { key, weight } of entries) {
    const value = valueOf(key);
    if (value === null) return null;
    total += weight * value;
  }
  return total;
}

function scoreValue(scores: TestScores, testId: TestId, kind: TestScore["kind"]): number | null {
  const score = scores.get(testId);
  return score && score.kind === kind ? score.value : null;
}

function byTest(weights: readonly SubtestWeight[]) {
  return weights.map((w) => ({ key: w.testId, weight: w.weight }));
}

/** Weighted metabolic risk index (0–100). */
export function metabolicIndex(scores: TestScores, config: ResolvedScoringConfig): number | null {
  return weightedSum(byTest(config.subtestWeights.metabolic), (id) => scoreValue(scores, id, "risk_score"));
}

export function scorePillars(age: number, scores: TestScores, config: ResolvedScoringConfig): PillarResult {
  const index = metabolicIndex(scores, config);
  const ageFor = (pillar: PillarId): number | null => {
    if (pillar === "metabolic") {
      return index === null ? null : metabolicFunctionalAge(age, index, config.metabolicAge);
    }
    return weightedSum(byTest(config.subtestWeights[pillar]), (id) => scoreValue(scores, id, "functional_age"));
  };

  const pillars: PillarAges = {
    vitality: ageFor("vitality"),
    strength: ageFor("strength"),
    metabolic: ageFor("metabolic"),
    mobility: ageFor("mobility"),
    cognitive: ageFor("cognitive")
  };
  return { pillars, metabolicIndex: index };
}
