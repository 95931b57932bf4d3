import { describe, expect, it } from "vitest";
import { getDefaultScoringConfig } from "@healthspan/data";
import { resolveScoringConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigurationError) return error.details;
    throw error;
  }
  return [];
}

describe("resolveScoringConfig", () => {
  it("accepts the shipped defaults and resolves weight lists in catalogue order", () => {
    const config = resolveScoringConfig(getDefaultScoringConfig());
    expect(config.pillarWeights.map((w) => w.pillar)).toEqual([
      "vitality",
      "strength",
      "metabolic",
      "mobility",
      "cognitive"
    ]);
    expect(config.subtestWeights.vitality).toEqual([
      { testId: "vo2_max", weight: 0.7 },
      { testId: "fev1", weight: 0.3 }
    ]);
    expect(config.healthspan.bfaClamp).toBeNull();
  });

  it("freezes the resolved configuration", () => {
    const config = resolveScoringConfig(getDefaultScoringConfig());
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.healthspan)).toBe(true);
    expect(Object.isFrozen(config.categories[0])).toBe(true);
  });

  it("rejects pillar weights that do not sum to 1", () => {
    const raw = getDefaultScoringConfig();
    raw.pillarWeights.cognitive = 0.2;
    const issues = issuesOf(() => resolveScoringConfig(raw));
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^Pillar weights sum to 1\.0\d*, expected 1\.0$/);
  });

  it("rejects missing and unknown sub-test weights", () => {
    const raw = getDefaultScoringConfig();
    raw.subtestWeights.cognitive = { processing_speed: 0.5, reaction_time: 0.5 };
    expect(issuesOf(() => resolveScoringConfig(raw))).toEqual([
      "Missing cognitive weight for working_memory",
      "Unknown cognitive sub-test weight: reaction_time",
      "cognitive sub-test weights sum to 0.5, expected 1.0"
    ]);
  });

  it("rejects overlapping categories", () => {
    const raw = getDefaultScoringConfig();
    raw.categories = [
      { name: "Low", min: 300, max: 600 },
      { name: "High", min: 600, max: 850 }
    ];
    expect(issuesOf(() => resolveScoringConfig(raw))).toEqual(["Categories Low and High overlap"]);
  });

  it("rejects categories that do not cover the score range", () => {
    const raw = getDefaultScoringConfig();
    raw.categories = [{ name: "Only", min: 400, max: 800 }];
    expect(issuesOf(() => resolveScoringConfig(raw))).toEqual([
      "Categories start at 400, above minScore 300",
      "Categories end at 800, below maxScore 850"
    ]);
  });

  it("reports schema violations with their path", () => {
    const raw = getDefaultScoringConfig();
    raw.metabolicThresholds.apob = { lowRiskMax: 130, normalMax: 129, elevatedMin: 90 };
    const issues = issuesOf(() => resolveScoringConfig(raw));
    expect(issues).toEqual(["metabolicThresholds.apob: Risk bands must satisfy lowRiskMax < normalMax <= elevatedMin"]);
  });

  it("rejects non-increasing hsCRP breakpoints", () => {
    const raw = getDefaultScoringConfig();
    raw.hscrpCurve = [
      { value: 0, score: 0 },
      { value: 0, score: 50 }
    ];
    expect(issuesOf(() => resolveScoringConfig(raw))).toEqual(["hscrpCurve values must be strictly increasing"]);
  });
});
