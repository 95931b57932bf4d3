import { isTestId, type Gender, type NormativeGender, type TestId } from "@healthspan/contracts";

const PUNCTUATION = /[^a-z0-9\s]/g;
const WHITESPACE = /\s+/g;
const NUMBER = /-?\d+(?:\.\d+)?/;
const MISSING_TOKENS = new Set(["na", "n/a", "nan", "none", "null", "-"]);
const META_COLUMNS = new Set(["unnamed 0", "activity", "evidence quality", "key references"]);

/** Lower-case, punctuation to spaces, collapsed whitespace. */
export function normalizeLabel(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value)
    .toLowerCase()
    .replace(PUNCTUATION, " ")
    .replace(WHITESPACE, " ")
    .trim();
}

type KeywordRule = { testId: TestId; matches: (label: string) => boolean };

const has = (label: string, ...words: string[]) => words.every((w) => label.includes(w));

// First match wins; order matters where keywords overlap.
const KEYWORD_RULES: KeywordRule[] = [
  { testId: "vo2_max", matches: (s) => has(s, "vo2") },
  { testId: "fev1", matches: (s) => has(s, "fev1") },
  { testId: "grip_strength", matches: (s) => has(s, "grip") },
  { testId: "sts_power", matches: (s) => has(s, "sts", "power") || has(s, "sit", "stand") },
  { testId: "vertical_jump", matches: (s) => has(s, "vertical", "jump") },
  { testId: "body_fat_pct", matches: (s) => has(s, "body", "fat") },
  {
    testId: "whtr",
    matches: (s) => has(s, "waist", "height") || has(s, "w h", "ratio") || s.split(" ").includes("whtr")
  },
  { testId: "fasting_glucose", matches: (s) => has(s, "glucose") },
  { testId: "hba1c", matches: (s) => has(s, "hba1c") },
  { testId: "homa_ir", matches: (s) => has(s, "homa") },
  { testId: "apob", matches: (s) => has(s, "apob") },
  { testId: "hscrp", matches: (s) => has(s, "hscrp") || has(s, "hs", "crp") },
  { testId: "gait_speed", matches: (s) => has(s, "gait", "speed") },
  { testId: "tug", matches: (s) => has(s, "tug") || has(s, "timed", "go") },
  { testId: "single_leg_stance", matches: (s) => has(s, "single", "leg") },
  { testId: "sit_and_reach", matches: (s) => has(s, "sit", "reach") },
  { testId: "processing_speed", matches: (s) => has(s, "processing", "speed") },
  { testId: "working_memory", matches: (s) => has(s, "working", "memory") }
];

/**
 * Test key for a free-text label. Recognised labels map to a TestId;
 * anything else keeps its normalised form so matrix columns stay stable.
 */
export function inferTestKey(label: unknown): string {
  const normalized = normalizeLabel(label);
  if (!normalized) return "";
  const underscored = normalized.replace(/ /g, "_");
  if (isTestId(underscored)) return underscored;
  return KEYWORD_RULES.find((rule) => rule.matches(normalized))?.testId ?? normalized;
}

export function matchTestId(label: unknown): TestId | null {
  const key = inferTestKey(label);
  return isTestId(key) ? key : null;
}

export function isMetaColumn(label: unknown): boolean {
  const normalized = normalizeLabel(label);
  return !normalized || META_COLUMNS.has(normalized);
}

/**
 * Numeric value of a cell: numbers pass through, strings lose `%` and take
 * their first number (`45.1 (±0.1)` → 45.1). NA-like and blank → null.
 */
export function cleanNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;
  const text = value.trim();
  if (!text || MISSING_TOKENS.has(text.toLowerCase())) return null;
  const match = NUMBER.exec(text.replace(/%/g, ""));
  return match ? Number(match[0]) : null;
}

export function parseGender(value: unknown): Gender | null {
  const text = normalizeLabel(value);
  if (text === "m" || text === "male" || text === "man") return "Male";
  if (text === "f" || text === "female" || text === "woman") return "Female";
  if (text.startsWith("female")) return "Female";
  if (text.startsWith("male")) return "Male";
  return null;
}

export function parseNormativeGender(value: unknown): NormativeGender | null {
  const text = normalizeLabel(value);
  if (text === "all" || text === "both" || text === "any") return "All";
  return parseGender(value);
}
