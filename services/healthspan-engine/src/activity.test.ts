import { describe, expect, it } from "vitest";
import type { ActivityRule, PersonaClient } from "@healthspan/contracts";
import { getDefaultActivityConfig } from "@healthspan/data";
import { assessPersonaClient, countStatuses, resolveActivityStatus } from "./activity-assessment.js";
import { computePerformanceIndex, parseLimit, zoneFor } from "./activity-limits.js";

const config = getDefaultActivityConfig();

describe("parseLimit", () => {
  it("parses operators and strips percent signs", () => {
    expect(parseLimit(">15", null)).toEqual({ op: ">", value: 15 });
    expect(parseLimit("<=9.0%", null)).toEqual({ op: "<=", value: 9 });
  });

  it("treats a bare number as a minimum", () => {
    expect(parseLimit(25, "Male")).toEqual({ op: ">=", value: 25 });
  });

  it("picks the part tagged with the client's gender", () => {
    expect(parseLimit(">15 (F), >20 (M)", "Male")).toEqual({ op: ">", value: 20 });
    expect(parseLimit(">15 (F), >20 (M)", "Female")).toEqual({ op: ">", value: 15 });
  });

  it("falls back to the easier limit without a gender match", () => {
    expect(parseLimit(">15 (F), >20 (M)", null)).toEqual({ op: ">", value: 15 });
    expect(parseLimit("<10 (F), <12 (M)", null)).toEqual({ op: "<", value: 12 });
  });

  it("returns null for cells without a limit", () => {
    expect(parseLimit("n/a", "Female")).toBeNull();
    expect(parseLimit("  ", "Female")).toBeNull();
    expect(parseLimit(null, "Female")).toBeNull();
  });
});

describe("computePerformanceIndex", () => {
  it("uses the ratio for positive values", () => {
    expect(computePerformanceIndex(30, { op: ">=", value: 25 })).toBe(120);
    expect(computePerformanceIndex(20, { op: "<=", value: 25 })).toBe(125);
  });

  it("uses the offset form around zero and negatives", () => {
    expect(computePerformanceIndex(-5, { op: ">=", value: -10 })).toBe(150);
    expect(computePerformanceIndex(5, { op: ">=", value: 0 })).toBe(200);
  });

  it("is null without a client value", () => {
    expect(computePerformanceIndex(null, { op: ">", value: 1 })).toBeNull();
  });
});

describe("zoneFor", () => {
  it("bands the performance index", () => {
    expect(zoneFor(null, config.zones)).toBe("MISSING");
    expect(zoneFor(89.9, config.zones)).toBe("RED");
    expect(zoneFor(90, config.zones)).toBe("YELLOW");
    expect(zoneFor(110, config.zones)).toBe("YELLOW");
    expect(zoneFor(110.1, config.zones)).toBe("GREEN");
  });
});

describe("resolveActivityStatus", () => {
  const { rules } = config;

  it("fails on any critical RED", () => {
    expect(resolveActivityStatus(["GREEN", "RED"], [], rules)).toBe("RED");
  });

  it("fails on more than three supporting REDs", () => {
    expect(resolveActivityStatus(["GREEN"], ["RED", "RED", "RED", "RED"], rules)).toBe("RED");
  });

  it("asks for review on critical YELLOW or MISSING", () => {
    expect(resolveActivityStatus(["YELLOW"], [], rules)).toBe("YELLOW");
    expect(resolveActivityStatus(["MISSING"], [], rules)).toBe("YELLOW");
  });

  it("asks for review on exactly two supporting REDs", () => {
    expect(resolveActivityStatus(["GREEN"], ["RED", "RED"], rules)).toBe("YELLOW");
  });

  it("passes when every critical test is GREEN", () => {
    expect(resolveActivityStatus(["GREEN"], ["RED", "YELLOW"], rules)).toBe("GREEN");
  });

  it("falls back to YELLOW otherwise", () => {
    expect(resolveActivityStatus(["GREEN"], ["RED", "RED", "RED"], rules)).toBe("YELLOW");
    expect(resolveActivityStatus([], [], rules)).toBe("YELLOW");
  });
});

describe("assessPersonaClient", () => {
  const client: PersonaClient = {
    name: "Avery",
    age: 60,
    gender: "Female",
    sheetName: "Avery",
    projections: {
      grip_strength: { label: "Grip Strength", fiveYear: 30, tenYear: 20 },
      vo2_max: { label: "VO2 Max", fiveYear: 30, tenYear: null }
    }
  };
  const rules: ActivityRule[] = [
    {
      activity: "Hiking",
      requirements: [
        { column: "Grip\nStrength", testKey: "grip_strength", rawLimit: ">25 (F), >35 (M)", importance: "Critical" },
        { column: "VO2 Max", testKey: "vo2_max", rawLimit: 28, importance: "Supporting" },
        { column: "Balance", testKey: "single_leg_stance", rawLimit: "n/a", importance: "Supporting" }
      ]
    }
  ];

  const assessment = assessPersonaClient(client, rules, config);
  const [hiking] = assessment.activities;

  it("skips requirements without a parseable limit", () => {
    expect(hiking?.fiveYear.tests.map((t) => t.testKey)).toEqual(["grip_strength", "vo2_max"]);
  });

  it("passes the 5-year horizon", () => {
    expect(hiking?.fiveYear.status).toBe("GREEN");
    expect(hiking?.fiveYear.criticalFailures).toEqual([]);
    expect(hiking?.fiveYear.tests[1]?.zone).toBe("YELLOW");
  });

  it("fails the 10-year horizon on the critical test", () => {
    expect(hiking?.tenYear.status).toBe("RED");
    expect(hiking?.tenYear.criticalFailures).toEqual(["Grip Strength (RED)"]);
    expect(hiking?.tenYear.supportingFailures).toEqual([]);
    expect(hiking?.tenYear.tests[1]?.zone).toBe("MISSING");
  });

  it("counts statuses per horizon", () => {
    expect(countStatuses(assessment, "fiveYear")).toEqual({ GREEN: 1, YELLOW: 0, RED: 0 });
    expect(countStatuses(assessment, "tenYear")).toEqual({ GREEN: 0, YELLOW: 0, RED: 1 });
  });
});
