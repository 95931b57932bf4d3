/**
 * Activity Assessment
 *
 * Classifies each activity of the matrix as GREEN / YELLOW / RED for a
 * client's 5-year and 10-year projections.
 */

import type { ActivityConfig, ActivityRule, Importance, PersonaClient } from "@healthspan/contracts";
import { computePerformanceIndex, parseLimit, zoneFor, type LimitSpec, type Zone } from "./activity-limits.js";

export type ActivityStatus = "RED" | "YELLOW" | "GREEN";
export type Horizon = "fiveYear" | "tenYear";

export const horizons: readonly Horizon[] = ["fiveYear", "tenYear"];

export interface TestAssessment {
  column: string;
  testKey: string;
  importance: Importance;
  clientValue: number | null;
  limit: LimitSpec;
  performanceIndex: number | null;
  zone: Zone;
}

export interface HorizonAssessment {
  tests: TestAssessment[];
  criticalFailures: string[];
  supportingFailures: string[];
  status: ActivityStatus;
}

export interface ActivityAssessment {
  activity: string;
  fiveYear: HorizonAssessment;
  tenYear: HorizonAssessment;
}

export interface PersonaAssessment {
  client: PersonaClient;
  activities: ActivityAssessment[];
}

export type StatusCounts = Record<ActivityStatus, number>;

/**
 * Final status from the zones of an activity's Critical and Supporting
 * tests. A missing Critical value forces review (YELLOW).
 */
export function resolveActivityStatus(
  criticalZones: readonly Zone[],
  supportingZones: readonly Zone[],
  rules: ActivityConfig["rules"],
): ActivityStatus {
  if (criticalZones.includes("RED")) return "RED";

  const supportingRed = supportingZones.filter((z) => z === "RED").length;
  if (supportingRed > rules.supportingRedForRed) return "RED";

  if (criticalZones.some((z) => z === "YELLOW" || z === "MISSING")) return "YELLOW";
  if (supportingRed === rules.supportingRedForYellow) return "YELLOW";

  const allCriticalGreen = criticalZones.length > 0 && criticalZones.every((z) => z === "GREEN");
  if (allCriticalGreen && supportingRed < rules.supportingRedForYellow) return "GREEN";

  return "YELLOW";
}

function displayName(column: string): string {
  return column.replace(/\n/g, " ").trim();
}

function assessHorizon(
  client: PersonaClient,
  rule: ActivityRule,
  horizon: Horizon,
  config: ActivityConfig,
): HorizonAssessment {
  const tests: TestAssessment[] = [];
  for (const requirement of rule.requirements) {
    const limit = parseLimit(requirement.rawLimit, client.gender);
    if (!limit) continue;
    const clientValue = client.projections[requirement.testKey]?.[horizon] ?? null;
    const performanceIndex = computePerformanceIndex(clientValue, limit);
    tests.push({
      column: requirement.column,
      testKey: requirement.testKey,
      importance: requirement.importance,
      clientValue,
      limit,
      performanceIndex,
      zone: zoneFor(performanceIndex, config.zones)
    });
  }

  const critical = tests.filter((t) => t.importance === "Critical");
  const supporting = tests.filter((t) => t.importance === "Supporting");
  return {
    tests,
    criticalFailures: critical
      .filter((t) => t.zone !== "GREEN")
      .map((t) => `${displayName(t.column)} (${t.zone})`),
    supportingFailures: supporting
      .filter((t) => t.zone === "RED")
      .map((t) => `${displayName(t.column)} (${t.zone})`),
    status: resolveActivityStatus(
      critical.map((t) => t.zone),
      supporting.map((t) => t.zone),
      config.rules,
    )
  };
}

export function assessPersonaClient(
  client: PersonaClient,
  rules: readonly ActivityRule[],
  config: ActivityConfig,
): PersonaAssessment {
  return {
    client,
    activities: rules.map((rule) => ({
      activity: rule.activity,
      fiveYear: assessHorizon(client, rule, "fiveYear", config),
      tenYear: assessHorizon(client, rule, "tenYear", config)
    }))
  };
}

export function countStatuses(assessment: PersonaAssessment, horizon: Horizon): StatusCounts {
  const counts: StatusCounts = { GREEN: 0, YELLOW: 0, RED: 0 };
  for (const activity of assessment.activities) counts[activity[horizon].status] += 1;
  return counts;
}
