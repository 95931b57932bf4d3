import {
  pillarIds,
  pillarTests,
  scoringConfigSchema,
  type HealthspanCategoryBand,
  type PillarId,
  type ScoringConfig,
  type TestId
} from "@healthspan/contracts";
import { ConfigurationError } from "./errors.js";

export const WEIGHT_SUM_TOLERANCE = 1e-6;

export type PillarWeight = { pillar: PillarId; weight: number };
export type SubtestWeight = { testId: TestId; weight: number };

/** Validated, frozen configuration with weight groups resolved to ordered lists. */
export type ResolvedScoringConfig = Readonly<
  Omit<ScoringConfig, "pillarWeights" | "subtestWeights"> & {
    pillarWeights: readonly PillarWeight[];
    subtestWeights: Readonly<Record<PillarId, readonly SubtestWeight[]>>;
  }
>;

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function checkSum(label: string, weights: readonly number[], issues: string[]) {
  const total = weights.reduce((s, w) => s + w, 0);
  if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    issues.push(`${label} weights sum to ${total}, expected 1.0`);
  }
}

function checkCategories(
  categories: readonly HealthspanCategoryBand[],
  minScore: number,
  maxScore: number,
  issues: string[],
): HealthspanCategoryBand[] {
  const sorted = [...categories].sort((a, b) => a.min - b.min);
  const names = new Set<string>();
  let previous: HealthspanCategoryBand | undefined;
  for (const band of sorted) {
    if (names.has(band.name)) issues.push(`Duplicate category name: ${band.name}`);
    names.add(band.name);
    if (band.min > band.max) issues.push(`Category ${band.name} has min ${band.min} above max ${band.max}`);
    if (previous && band.min <= previous.max) {
      issues.push(`Categories ${previous.name} and ${band.name} overlap`);
    }
    previous = band;
  }
  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  if (first && first.min > minScore) issues.push(`Categories start at ${first.min}, above minScore ${minScore}`);
  if (last && last.max < maxScore) issues.push(`Categories end at ${last.max}, below maxScore ${maxScore}`);
  return sorted;
}

/**
 * Validate a raw configuration object once at startup.
 * Every problem is collected into a single ConfigurationError.
 */
export function resolveScoringConfig(input: unknown): ResolvedScoringConfig {
  const parsed = scoringConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Scoring configuration is malformed",
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }
  const config = parsed.data;
  const issues: string[] = [];

  const pillarWeights = pillarIds.map((pillar) => ({ pillar, weight: config.pillarWeights[pillar] }));
  checkSum("Pillar", pillarWeights.map((w) => w.weight), issues);

  const resolveGroup = (pillar: PillarId): SubtestWeight[] => {
    const group = config.subtestWeights[pillar];
    const members: readonly TestId[] = pillarTests[pillar];
    const entries: SubtestWeight[] = [];
    for (const testId of members) {
      const weight = group[testId];
      if (weight === undefined) {
        issues.push(`Missing ${pillar} weight for ${testId}`);
        continue;
      }
      entries.push({ testId, weight });
    }
    for (const key of Object.keys(group)) {
      if (!members.some((m) => m === key)) issues.push(`Unknown ${pillar} sub-test weight: ${key}`);
    }
    checkSum(`${pillar} sub-test`, entries.map((e) => e.weight), issues);
    return entries;
  };
  const subtestWeights: Record<PillarId, SubtestWeight[]> = {
    vitality: resolveGroup("vitality"),
    strength: resolveGroup("strength"),
    metabolic: resolveGroup("metabolic"),
    mobility: resolveGroup("mobility"),
    cognitive: resolveGroup("cognitive")
  };

  const { riskScale, hscrpCurve, healthspan } = config;
  if (!(riskScale.optimal < riskScale.elevatedFloor && riskScale.elevatedFloor <= riskScale.maximum)) {
    issues.push("riskScale must satisfy optimal < elevatedFloor <= maximum");
  }
  hscrpCurve.forEach((point, i) => {
    const prior = hscrpCurve[i - 1];
    if (prior && point.value <= prior.value) issues.push("hscrpCurve values must be strictly increasing");
  });
  if (healthspan.minScore >= healthspan.maxScore) issues.push("healthspan.minScore must be below maxScore");
  if (healthspan.bfaClamp && healthspan.bfaClamp.min > healthspan.bfaClamp.max) {
    issues.push("healthspan.bfaClamp.min must not exceed max");
  }
  const categories = checkCategories(config.categories, healthspan.minScore, healthspan.maxScore, issues);

  if (issues.length > 0) {
    throw new ConfigurationError("Scoring configuration is invalid", issues);
  }

  return deepFreeze({
    ...config,
    pillarWeights,
    subtestWeights,
    categories,
    bodyFatBands: {
      Male: [...config.bodyFatBands.Male].sort((a, b) => a.ageRange[0] - b.ageRange[0]),
      Female: [...config.bodyFatBands.Female].sort((a, b) => a.ageRange[0] - b.ageRange[0])
    }
  });
}
