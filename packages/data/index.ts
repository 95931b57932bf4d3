import fs from "node:fs";
import {
  activityConfigSchema,
  projectionConfigSchema,
  scoringConfigSchema,
  type ActivityConfig,
  type ProjectionConfig,
  type ScoringConfig
} from "@healthspan/contracts";

function readDefaults(fileName: string): unknown {
  const url = new URL(`./defaults/${fileName}`, import.meta.url);
  return JSON.parse(fs.readFileSync(url, "utf8"));
}

const scoringDefaults: ScoringConfig = scoringConfigSchema.parse(readDefaults("scoring-config.json"));
const activityDefaults: ActivityConfig = activityConfigSchema.parse(readDefaults("activity-config.json"));
const projectionDefaults: ProjectionConfig = projectionConfigSchema.parse(readDefaults("projection-config.json"));

/** Shipped scoring defaults. Returns a fresh copy so callers can merge overrides freely. */
export function getDefaultScoringConfig(): ScoringConfig {
  return structuredClone(scoringDefaults);
}

export function getDefaultActivityConfig(): ActivityConfig {
  return structuredClone(activityDefaults);
}

export function getDefaultProjectionConfig(): ProjectionConfig {
  return structuredClone(projectionDefaults);
}
