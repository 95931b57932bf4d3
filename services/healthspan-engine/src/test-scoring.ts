/**
 * Test Scoring
 *
 * Maps one raw test result to a functional age or a metabolic risk score,
 * dispatching on the strategy recorded in the test catalogue.
 * Missing raw values always score as null, never zero.
 */

import {
  TEST_DEFINITIONS,
  type ClientRecord,
  type RiskBands,
  type ScoringStrategy,
  type TestDefinition,
  type TestId
} from "@healthspan/contracts";
import type { ResolvedScoringConfig } from "./config.js";
import type { ScoringContext } from "./context.js";
import { ConfigurationError, ReferenceDataError } from "./errors.js";
import { bodyFatRiskBands, hscrpRiskScore, riskScoreFromBands } from "./metabolic-scoring.js";

export type FunctionalAgeScore = { kind: "functional_age"; testId: TestId; value: number | null };
export type RiskScore = { kind: "risk_score"; testId: TestId; value: number | null };
export type TestScore = FunctionalAgeScore | RiskScore;

export type TestScores = ReadonlyMap<TestId, TestScore>;

function assertNever(strategy: never): never {
  throw new Error(`Unhandled scoring strategy: ${JSON.stringify(strategy)}`);
}

function thresholdBands(testId: TestId, config: ResolvedScoringConfig): RiskBands {
  switch (testId) {
    case "apob":
    case "homa_ir":
    case "hba1c":
    case "whtr":
      return config.metabolicThresholds[testId];
    default:
      throw new ConfigurationError(`No metabolic threshold bands for ${testId}`);
  }
}

function vitalityAge(
  definition: TestDefinition,
  reference: "normative" | "percent_predicted",
  raw: number,
  client: ClientRecord,
  ctx: ScoringContext,
): number {
  const { vitality } = ctx.config;
  const expected =
    reference === "normative"
      ? ctx.table.expectedValue(definition.id, client.gender, client.age)
      : vitality.fev1PercentPredicted;
  if (expected <= 0) {
    throw new ReferenceDataError(`Expected ${definition.id} for ${client.gender} age ${client.age} is not positive`);
  }
  const ratio = raw / expected;
  return Math.max(0, client.age + (1 - ratio) * vitality.deficitYears);
}

function metabolicRisk(
  definition: TestDefinition,
  bands: "thresholds" | "hscrp_curve" | "body_fat",
  raw: number,
  client: ClientRecord,
  config: ResolvedScoringConfig,
): number {
  switch (bands) {
    case "thresholds":
      return riskScoreFromBands(raw, thresholdBands(definition.id, config), config.riskScale);
    case "hscrp_curve":
      return hscrpRiskScore(raw, config.hscrpCurve);
    case "body_fat":
      return riskScoreFromBands(raw, bodyFatRiskBands(client.gender, client.age, config.bodyFatBands), config.riskScale);
  }
}

function cognitiveAge(definition: TestDefinition, sd: number, age: number, config: ResolvedScoringConfig): number {
  const sign = definition.direction === "higher_is_better" ? 1 : -1;
  return Math.max(config.cognitive.minimumAge, age - sign * sd * config.cognitive.yearsPerSd);
}

function scoreValue(
  definition: TestDefinition,
  strategy: Exclude<ScoringStrategy, { kind: "recorded" }>,
  raw: number,
  client: ClientRecord,
  ctx: ScoringContext,
): number {
  switch (strategy.kind) {
    case "standard":
      return ctx.table.functionalAgeFor(definition.id, client.gender, client.age, raw, definition.direction);
    case "vitality":
      return vitalityAge(definition, strategy.reference, raw, client, ctx);
    case "metabolic_risk":
      return metabolicRisk(definition, strategy.bands, raw, client, ctx.config);
    case "cognitive_sd":
      return cognitiveAge(definition, raw, client.age, ctx.config);
    default:
      return assertNever(strategy);
  }
}

/** Score one test. Recorded-only tests return null. */
export function scoreTest(definition: TestDefinition, client: ClientRecord, ctx: ScoringContext): TestScore | null {
  const { strategy } = definition;
  if (strategy.kind === "recorded") return null;

  const raw = client.values[definition.id];
  const value = raw === null ? null : scoreValue(definition, strategy, raw, client, ctx);
  const kind = strategy.kind === "metabolic_risk" ? "risk_score" : "functional_age";
  return { kind, testId: definition.id, value };
}

/** Every scored test of the catalogue, in catalogue order. */
export function scoreAllTests(client: ClientRecord, ctx: ScoringContext): TestScores {
  const scores = new Map<TestId, TestScore>();
  for (const definition of TEST_DEFINITIONS) {
    const score = scoreTest(definition, client, ctx);
    if (score) scores.set(definition.id, score);
  }
  return scores;
}
