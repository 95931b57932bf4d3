import fs from "node:fs";
import { z } from "zod";
import { emptyTestValues, normativeRowSchema, type ClientRecord, type NormativeRow, type TestValues } from "@healthspan/contracts";
import { getDefaultScoringConfig } from "@healthspan/data";
import { createScoringContext, type ScoringContext } from "../context.js";

export function loadNormativeRows(): NormativeRow[] {
  const url = new URL("./normative-reference.json", import.meta.url);
  return z.array(normativeRowSchema).parse(JSON.parse(fs.readFileSync(url, "utf8")));
}

export function referenceContext(): ScoringContext {
  return createScoringContext(loadNormativeRows(), getDefaultScoringConfig());
}

/** Male, 50, every test exactly at the age-50 reference value. */
export function normalMaleAt50(overrides: Partial<TestValues> = {}): ClientRecord {
  return {
    name: "Test Client",
    age: 50,
    gender: "Male",
    values: {
      ...emptyTestValues(),
      vo2_max: 38,
      fev1: 100,
      grip_strength: 44,
      sts_power: 3.8,
      vertical_jump: 38,
      body_fat_pct: 10,
      whtr: 0.45,
      fasting_glucose: 90,
      hba1c: 5.2,
      homa_ir: 1.0,
      apob: 80,
      hscrp: 0.5,
      gait_speed: 1.3,
      tug: 6.5,
      single_leg_stance: 40,
      sit_and_reach: 26,
      processing_speed: 0,
      working_memory: 0,
      ...overrides
    }
  };
}
