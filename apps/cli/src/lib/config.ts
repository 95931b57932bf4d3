import fs from "node:fs";
import path from "node:path";
import {
  activityConfigSchema,
  scoringConfigSchema,
  type ActivityConfig,
  type ProjectionConfig
} from "@healthspan/contracts";
import { getDefaultActivityConfig, getDefaultProjectionConfig, getDefaultScoringConfig } from "@healthspan/data";
import { ConfigurationError, resolveProjectionConfig } from "@healthspan/healthspan-engine";
import type { ThresholdOverrides } from "@healthspan/importers";

const SCORING_SECTIONS = new Set(Object.keys(scoringConfigSchema.shape));
const ACTIVITY_SECTIONS = new Set(Object.keys(activityConfigSchema.shape));
const PROJECTION_SECTION = "projection";

/**
 * Top-level sections of an override file, split by the configuration they
 * replace. Projection settings sit under one `projection` object.
 */
export type ConfigOverrides = {
  scoring: Record<string, unknown>;
  activity: Record<string, unknown>;
  projection: Record<string, unknown>;
};

function asRecord(value: unknown): Record<string, unknown> | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return null;
  return Object.fromEntries(Object.entries(value));
}

export function readConfigOverrides(filePath: string | undefined): ConfigOverrides {
  const overrides: ConfigOverrides = { scoring: {}, activity: {}, projection: {} };
  if (!filePath) return overrides;

  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new ConfigurationError(`Configuration file not found: ${resolved}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(resolved, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Configuration file is not valid JSON: ${resolved}`, [
      err instanceof Error ? err.message : String(err)
    ]);
  }

  const sections = asRecord(parsed);
  if (!sections) throw new ConfigurationError(`Configuration file must hold a JSON object: ${resolved}`);

  const unknown: string[] = [];
  for (const [key, value] of Object.entries(sections)) {
    if (key === PROJECTION_SECTION) {
      const projection = asRecord(value);
      if (!projection) throw new ConfigurationError("The projection section must be a JSON object");
      overrides.projection = projection;
    } else if (SCORING_SECTIONS.has(key)) overrides.scoring[key] = value;
    else if (ACTIVITY_SECTIONS.has(key)) overrides.activity[key] = value;
    else unknown.push(key);
  }
  if (unknown.length > 0) {
    throw new ConfigurationError("Unknown configuration sections", unknown);
  }
  return overrides;
}

/**
 * Raw scoring configuration: shipped defaults, then file sections, then the
 * normative workbook's band sheets. Validation happens when the scoring
 * context is created.
 */
export function buildScoringConfigInput(
  overrides: ConfigOverrides,
  bands: ThresholdOverrides = { metabolicThresholds: {}, bodyFatBands: {} }
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...getDefaultScoringConfig(), ...overrides.scoring };
  merged.metabolicThresholds = { ...asRecord(merged.metabolicThresholds), ...bands.metabolicThresholds };
  merged.bodyFatBands = { ...asRecord(merged.bodyFatBands), ...bands.bodyFatBands };
  return merged;
}

export function resolveActivityConfig(overrides: ConfigOverrides): ActivityConfig {
  const parsed = activityConfigSchema.safeParse({ ...getDefaultActivityConfig(), ...overrides.activity });
  if (!parsed.success) {
    throw new ConfigurationError(
      "Activity configuration is invalid",
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  return parsed.data;
}

/** Shipped projection assumptions with the file's keys replacing whole entries. */
export function resolveProjectionSettings(overrides: ConfigOverrides): ProjectionConfig {
  return resolveProjectionConfig({ ...getDefaultProjectionConfig(), ...overrides.projection });
}
