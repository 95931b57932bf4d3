import { describe, expect, it } from "vitest";
import { emptyTestValues, type ClientRecord, type ProjectionConfigInput } from "@healthspan/contracts";
import { getDefaultProjectionConfig } from "@healthspan/data";
import { ConfigurationError } from "./errors.js";
import {
  applyDecline,
  buildProjectionModel,
  projectBatch,
  projectClient,
  resolveProjectionConfig,
  type TestProjection
} from "./projection.js";
import { createRng } from "./random.js";

// Zero rate uncertainty and zero measurement noise make every simulation identical.
const exact: ProjectionConfigInput = {
  tests: ["grip_strength", "tug", "processing_speed"],
  simulations: 20,
  decline: { baseRatePerDecade: { grip_strength: 0.1, tug: 0.1, processing_speed: 0.2 } },
  absoluteDeclineTests: ["processing_speed"],
  allowNegativeTests: ["processing_speed"],
  rateUncertaintyCv: { grip_strength: 0, tug: 0, processing_speed: 0 },
  measurementCv: { grip_strength: 0, tug: 0, processing_speed: 0 },
  improvement: {
    vo2AgeCutoff: 60,
    vo2Under: [0.1, 0.1],
    vo2Over: [0.05, 0.05],
    homaIrReduction: { median: 0.25, q10: 0.1, q90: 0.4 },
    ranges: { grip_strength: [0.1, 0.1], tug: [0.1, 0.1], processing_speed: [0.5, 0.5] }
  },
  sanityCheck: { enabled: false }
};

function client(values: Partial<ClientRecord["values"]>, age = 50): ClientRecord {
  return { name: "Casey Moss", age, gender: "Male", values: { ...emptyTestValues(), ...values } };
}

function byTest(tests: readonly TestProjection[]): Map<string, TestProjection> {
  return new Map(tests.map((t) => [t.testId, t]));
}

describe("applyDecline", () => {
  it("compounds a relative rate per decade", () => {
    expect(applyDecline(40, 50, 10, 0.1, null, null, "higher_is_better", false)).toBeCloseTo(36, 10);
    expect(applyDecline(40, 50, 5, 0.1, null, null, "higher_is_better", false)).toBeCloseTo(40 * Math.sqrt(0.9), 10);
  });

  it("raises lower-is-better values", () => {
    expect(applyDecline(6, 50, 10, 0.1, null, null, "lower_is_better", false)).toBeCloseTo(6.6, 10);
  });

  it("switches to the post rate at the acceleration age", () => {
    expect(applyDecline(40, 55, 10, 0.1, 0.2, 60, "higher_is_better", false)).toBeCloseTo(
      40 * Math.sqrt(0.9) * Math.sqrt(0.8),
      10
    );
    expect(applyDecline(40, 65, 10, 0.1, 0.2, 60, "higher_is_better", false)).toBeCloseTo(32, 10);
    expect(applyDecline(40, 65, 10, 0.1, null, 60, "higher_is_better", false)).toBeCloseTo(36, 10);
  });

  it("subtracts absolute rates", () => {
    expect(applyDecline(0.5, 50, 5, 0.2, null, null, "higher_is_better", true)).toBeCloseTo(0.4, 10);
  });

  it("pushes negative values further from zero", () => {
    expect(applyDecline(-10, 50, 10, 0.1, null, null, "higher_is_better", false)).toBeCloseTo(-11, 10);
  });

  it("leaves the value alone for zero years", () => {
    expect(applyDecline(40, 50, 0, 0.1, null, null, "higher_is_better", false)).toBe(40);
  });
});

describe("projectClient", () => {
  const model = buildProjectionModel(resolveProjectionConfig(exact));
  const subject = client({ grip_strength: 40, tug: 6, processing_speed: 0 });

  it("ages each baseline under the decline scenario", () => {
    const result = projectClient(subject, model, "decline", createRng(1));
    const tests = byTest(result.tests);
    expect(result.tests.map((t) => t.testId)).toEqual(["grip_strength", "tug", "processing_speed"]);
    expect(tests.get("grip_strength")?.fiveYear).toBeCloseTo(40 * Math.sqrt(0.9), 8);
    expect(tests.get("grip_strength")?.tenYear).toBeCloseTo(36, 8);
    expect(tests.get("tug")?.tenYear).toBeCloseTo(6.6, 8);
    expect(tests.get("processing_speed")?.fiveYear).toBeCloseTo(-0.1, 8);
    expect(tests.get("processing_speed")?.tenYear).toBeCloseTo(-0.2, 8);
  });

  it("applies the intervention gain before a year-shortened decline", () => {
    const tests = byTest(projectClient(subject, model, "improvement", createRng(1)).tests);
    expect(tests.get("grip_strength")?.fiveYear).toBeCloseTo(44 * 0.9 ** 0.4, 8);
    expect(tests.get("grip_strength")?.tenYear).toBeCloseTo(44 * 0.9 ** 0.9, 8);
    expect(tests.get("tug")?.fiveYear).toBeCloseTo(5.4 * 1.1 ** 0.4, 8);
    expect(tests.get("processing_speed")?.fiveYear).toBeCloseTo(0.42, 8);
    expect(tests.get("processing_speed")?.tenYear).toBeCloseTo(0.32, 8);
  });

  it("carries missing baselines through as null", () => {
    const tests = byTest(projectClient(client({ grip_strength: 40 }), model, "decline", createRng(1)).tests);
    expect(tests.get("tug")).toEqual({ testId: "tug", baseline: null, fiveYear: null, tenYear: null });
  });

  it("adds the practice effect at its year", () => {
    const practised = buildProjectionModel(
      resolveProjectionConfig({
        ...exact,
        practiceEffect: { enabled: true, year: 5, tests: ["processing_speed"], amount: 0.1 }
      })
    );
    const tests = byTest(projectClient(subject, practised, "decline", createRng(1)).tests);
    expect(tests.get("processing_speed")?.fiveYear).toBeCloseTo(0, 8);
    expect(tests.get("processing_speed")?.tenYear).toBeCloseTo(-0.2, 8);
  });

  it("warns when a decline mean improves on the baseline", () => {
    const boosted = buildProjectionModel(
      resolveProjectionConfig({
        ...exact,
        practiceEffect: { enabled: true, year: 5, tests: ["grip_strength"], amount: 0.5 },
        sanityCheck: { enabled: true }
      })
    );
    const { warnings } = projectClient(subject, boosted, "decline", createRng(1));
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(/^grip_strength: year 5 mean .* moved the wrong way from baseline 40$/);
  });
});

describe("projectBatch", () => {
  const model = buildProjectionModel({ ...getDefaultProjectionConfig(), simulations: 200 });
  const clients = [
    client({ grip_strength: 40, vo2_max: 38, hscrp: 1.2, processing_speed: 0.5 }),
    client({ grip_strength: 30, tug: 7.5 }, 68)
  ];

  it("reproduces the same projections from the same seed", () => {
    expect(projectBatch(clients, model, "decline", 42)).toEqual(projectBatch(clients, model, "decline", 42));
  });

  it("differs between seeds", () => {
    const [a] = projectBatch(clients, model, "decline", 42);
    const [b] = projectBatch(clients, model, "decline", 43);
    expect(byTest(a?.tests ?? []).get("grip_strength")?.fiveYear).not.toBe(
      byTest(b?.tests ?? []).get("grip_strength")?.fiveYear
    );
  });

  it("projects grip strength downward over time", () => {
    const [first] = projectBatch(clients, model, "decline", 42);
    const grip = byTest(first?.tests ?? []).get("grip_strength");
    expect(grip?.baseline).toBe(40);
    expect(grip?.fiveYear).toBeLessThan(40);
    expect(grip?.tenYear).toBeLessThan(grip?.fiveYear ?? 0);
  });
});

describe("configuration", () => {
  it("requires rates and noise for every projected test", () => {
    try {
      resolveProjectionConfig({ ...exact, tests: ["grip_strength", "tug", "processing_speed", "apob"] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.details).toEqual([
          "decline.baseRatePerDecade.apob: required for every projected test",
          "rateUncertaintyCv.apob: required for every projected test",
          "measurementCv.apob: required for every projected test"
        ]);
      }
    }
  });

  it("rejects correlations that are not positive definite", () => {
    const config = resolveProjectionConfig({
      ...exact,
      correlations: [
        ["grip_strength", "tug", 0.99],
        ["grip_strength", "processing_speed", 0.99],
        ["tug", "processing_speed", -0.99]
      ]
    });
    expect(() => buildProjectionModel(config)).toThrow(ConfigurationError);
  });

  it("ships assumptions that validate", () => {
    expect(() => buildProjectionModel(getDefaultProjectionConfig())).not.toThrow();
  });
});
