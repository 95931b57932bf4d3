/**
 * Scoring Pipeline
 *
 * client record → per-test scores → pillar ages → BFA → Healthspan Index.
 * Each client is scored independently against the shared, read-only context.
 */

import {
  clientRecordSchema,
  normativeTestIds,
  type ClientRecord,
  type Gender,
  type TestId
} from "@healthspan/contracts";
import { calculateBfa } from "./bfa-calculation.js";
import type { ScoringContext } from "./context.js";
import { InvalidClientDataError } from "./errors.js";
import { calculateHealthspanIndex, categorizeHealthspanIndex } from "./healthspan-index.js";
import { scorePillars, type PillarAges } from "./pillar-scoring.js";
import { scoreAllTests, type TestScores } from "./test-scoring.js";

export type ClientStatus = "COMPLETE" | "INCOMPLETE";

export interface ScoredClient {
  client: ClientRecord;
  testScores: TestScores;
  metabolicIndex: number | null;
  pillars: PillarAges;
  biologicalFunctionalAge: number | null;
  healthspanIndex: number | null;
  healthspanCategory: string | null;
  status: ClientStatus;
  /** Scored tests with no raw value. */
  missingTests: TestId[];
}

export interface BatchResult {
  scored: ScoredClient[];
  skipped: InvalidClientDataError[];
}

export function scoreClient(client: ClientRecord, ctx: ScoringContext): ScoredClient {
  const { config } = ctx;
  const testScores = scoreAllTests(client, ctx);
  const { pillars, metabolicIndex } = scorePillars(client.age, testScores, config);
  const bfa = calculateBfa(pillars, config.pillarWeights);
  const healthspanIndex = bfa === null ? null : calculateHealthspanIndex(client.age, bfa, config.healthspan);
  const healthspanCategory =
    healthspanIndex === null ? null : categorizeHealthspanIndex(healthspanIndex, config.categories);

  const missingTests = [...testScores.values()].filter((s) => s.value === null).map((s) => s.testId);

  return {
    client,
    testScores,
    metabolicIndex,
    pillars,
    biologicalFunctionalAge: bfa,
    healthspanIndex,
    healthspanCategory,
    status: bfa === null ? "INCOMPLETE" : "COMPLETE",
    missingTests
  };
}

function validateClient(client: ClientRecord): ClientRecord | InvalidClientDataError {
  const parsed = clientRecordSchema.safeParse(client);
  if (parsed.success) return parsed.data;
  const name = typeof client.name === "string" && client.name.length > 0 ? client.name : "(unnamed)";
  return new InvalidClientDataError(
    name,
    parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
  );
}

/**
 * Score a batch in input order. Invalid clients are skipped and returned;
 * missing normative coverage for a gender in the batch aborts the run.
 */
export function scoreBatch(clients: readonly ClientRecord[], ctx: ScoringContext): BatchResult {
  const valid: ClientRecord[] = [];
  const skipped: InvalidClientDataError[] = [];
  for (const client of clients) {
    const checked = validateClient(client);
    if (checked instanceof InvalidClientDataError) skipped.push(checked);
    else valid.push(checked);
  }

  const genders = new Set<Gender>(valid.map((c) => c.gender));
  const required = normativeTestIds();
  ctx.table.assertCoverage([...genders].flatMap((gender) => required.map((testId) => ({ testId, gender }))));

  return { scored: valid.map((client) => scoreClient(client, ctx)), skipped };
}
