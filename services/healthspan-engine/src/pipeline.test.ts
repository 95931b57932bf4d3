import { describe, expect, it } from "vitest";
import { getDefaultScoringConfig } from "@healthspan/data";
import { createScoringContext } from "./context.js";
import { ConfigurationError, DataCompletenessError, InvalidClientDataError } from "./errors.js";
import { loadNormativeRows, normalMaleAt50, referenceContext } from "./fixtures/reference.js";
import { scoreBatch, scoreClient } from "./pipeline.js";

const ctx = referenceContext();

describe("scoreClient", () => {
  it("scores a client at every age-50 norm as 50 across the board", () => {
    const result = scoreClient(normalMaleAt50(), ctx);

    for (const age of Object.values(result.pillars)) {
      expect(age).toBeCloseTo(50, 9);
    }
    expect(result.metabolicIndex).toBeCloseTo(5, 9);
    expect(result.biologicalFunctionalAge).toBeCloseTo(50, 9);
    expect(result.healthspanIndex).toBeCloseTo(670, 6);
    expect(result.healthspanCategory).toBe("Good");
    expect(result.status).toBe("COMPLETE");
    expect(result.missingTests).toEqual([]);
  });

  it("propagates a missing VO2max to INCOMPLETE without touching other pillars", () => {
    const result = scoreClient(normalMaleAt50({ vo2_max: null }), ctx);

    expect(result.pillars.vitality).toBeNull();
    expect(result.pillars.strength).toBeCloseTo(50, 9);
    expect(result.pillars.metabolic).toBeCloseTo(50, 9);
    expect(result.pillars.mobility).toBeCloseTo(50, 9);
    expect(result.pillars.cognitive).toBeCloseTo(50, 9);
    expect(result.biologicalFunctionalAge).toBeNull();
    expect(result.healthspanIndex).toBeNull();
    expect(result.healthspanCategory).toBeNull();
    expect(result.status).toBe("INCOMPLETE");
    expect(result.missingTests).toEqual(["vo2_max"]);
  });

  it("does not count a missing recorded-only value as missing", () => {
    const result = scoreClient(normalMaleAt50({ fasting_glucose: null }), ctx);
    expect(result.status).toBe("COMPLETE");
    expect(result.missingTests).toEqual([]);
  });

  it("is idempotent", () => {
    const client = normalMaleAt50({ grip_strength: 47, apob: 140 });
    expect(scoreClient(client, ctx)).toEqual(scoreClient(client, ctx));
  });
});

describe("scoreBatch", () => {
  it("skips invalid clients and keeps input order", () => {
    const first = { ...normalMaleAt50(), name: "First" };
    const broken = { ...normalMaleAt50(), name: "Broken", age: Number.NaN };
    const last = { ...normalMaleAt50(), name: "Last", gender: "Female" as const };

    const { scored, skipped } = scoreBatch([first, broken, last], ctx);

    expect(scored.map((s) => s.client.name)).toEqual(["First", "Last"]);
    expect(skipped).toHaveLength(1);
    expect(skipped[0]).toBeInstanceOf(InvalidClientDataError);
    expect(skipped[0]?.clientName).toBe("Broken");
    expect(skipped[0]?.fatal).toBe(false);
  });

  it("aborts when a gender in the batch has no reference curve", () => {
    const maleOnly = loadNormativeRows().filter((row) => row.gender !== "Female");
    const partial = createScoringContext(maleOnly, getDefaultScoringConfig());

    expect(scoreBatch([normalMaleAt50()], partial).scored).toHaveLength(1);
    expect(() => scoreBatch([{ ...normalMaleAt50(), gender: "Female" }], partial)).toThrow(DataCompletenessError);
  });
});

describe("createScoringContext", () => {
  it("validates configuration before building the table", () => {
    const raw = getDefaultScoringConfig();
    raw.pillarWeights.vitality = 0.9;
    expect(() => createScoringContext(loadNormativeRows(), raw)).toThrow(ConfigurationError);
  });
});
