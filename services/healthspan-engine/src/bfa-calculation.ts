import type { PillarWeight } from "./config.js";
import { weightedSum, type PillarAges } from "./pillar-scoring.js";

/** Biological Functional Age: weighted pillar ages, null unless all five are present. */
export function calculateBfa(pillars: PillarAges, weights: readonly PillarWeight[]): number | null {
  return weightedSum(
    weights.map((w) => ({ key: w.pillar, weight: w.weight })),
    (pillar) => pillars[pillar],
  );
}
