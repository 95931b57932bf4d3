import type { NormativeRow } from "@healthspan/contracts";
import { resolveScoringConfig, type ResolvedScoringConfig } from "./config.js";
import { NormativeTable } from "./normative-table.js";

/** Everything a scoring call reads. Built once per run, never mutated. */
export type ScoringContext = Readonly<{
  table: NormativeTable;
  config: ResolvedScoringConfig;
}>;

export function createScoringContext(rows: readonly NormativeRow[], rawConfig: unknown): ScoringContext {
  const config = resolveScoringConfig(rawConfig);
  const table = NormativeTable.fromRows(rows);
  return Object.freeze({ table, config });
}
