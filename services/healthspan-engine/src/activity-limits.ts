/**
 * Activity Limits
 *
 * Parsing of activity-matrix limit cells and the performance index / zone
 * arithmetic applied to a client's projected value.
 * No I/O.
 */

import type { ActivityConfig, Gender } from "@healthspan/contracts";

export type LimitOperator = ">" | ">=" | "<" | "<=";
export type LimitSpec = { op: LimitOperator; value: number };
export type Zone = "RED" | "YELLOW" | "GREEN" | "MISSING";

const OPERATOR_PATTERN = /(<=|>=|<|>)/;
const NUMBER_PATTERN = /(-?\d+(?:\.\d+)?)/;

export function isDirect(limit: LimitSpec): boolean {
  return limit.op === ">" || limit.op === ">=";
}

function toOperator(token: string): LimitOperator | null {
  switch (token) {
    case ">":
    case ">=":
    case "<":
    case "<=":
      return token;
    default:
      return null;
  }
}

function partGender(part: string): Gender | null {
  const lower = part.toLowerCase();
  if (lower.includes("(m)") || lower.includes(" male")) return "Male";
  if (lower.includes("(f)") || lower.includes(" female")) return "Female";
  return null;
}

function parsePart(part: string): LimitSpec | null {
  const opMatch = OPERATOR_PATTERN.exec(part);
  const op = opMatch?.[1] ? toOperator(opMatch[1]) : null;
  if (!op) return null;
  const numMatch = NUMBER_PATTERN.exec(part.replace(/%/g, ""));
  if (!numMatch?.[1]) return null;
  return { op, value: Number(numMatch[1]) };
}

/**
 * Parse a limit cell such as `>15`, `<=9.0%` or `>15 (F), >20 (M)`.
 *
 * A bare number means `>=`. Gender-tagged parts select the client's gender;
 * otherwise the easier limit wins (the smallest for direct limits, the
 * largest for inverse ones).
 */
export function parseLimit(raw: string | number | null, gender: Gender | null): LimitSpec | null {
  if (raw === null) return null;
  if (typeof raw === "number") return Number.isFinite(raw) ? { op: ">=", value: raw } : null;

  const text = raw.trim();
  if (!text) return null;

  const parsed = text
    .split(",")
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
    .flatMap((p) => {
      const spec = parsePart(p);
      return spec ? [{ gender: partGender(p), spec }] : [];
    });
  if (parsed.length === 0) return parsePart(text);

  const genderMatch = gender ? parsed.find((p) => p.gender === gender) : undefined;
  if (genderMatch) return genderMatch.spec;

  const specs = parsed.map((p) => p.spec);
  const direct = specs.some(isDirect);
  return specs.reduce((best, spec) =>
    direct ? (spec.value < best.value ? spec : best) : spec.value > best.value ? spec : best,
  );
}

/**
 * Client value as a percentage of the limit, oriented so that 100 is
 * "exactly at the limit" and larger is always better.
 */
export function computePerformanceIndex(value: number | null, limit: LimitSpec): number | null {
  if (value === null) return null;
  const direct = isDirect(limit);
  if (limit.value > 0 && value > 0) {
    return direct ? (value / limit.value) * 100 : (limit.value / value) * 100;
  }
  const denom = limit.value !== 0 ? Math.abs(limit.value) : Math.max(Math.abs(value), 1e-9);
  const gap = direct ? value - limit.value : limit.value - value;
  return (gap / denom) * 100 + 100;
}

export function zoneFor(performanceIndex: number | null, zones: ActivityConfig["zones"]): Zone {
  if (performanceIndex === null) return "MISSING";
  if (performanceIndex < zones.redBelow) return "RED";
  if (performanceIndex <= zones.yellowMax) return "YELLOW";
  return "GREEN";
}
