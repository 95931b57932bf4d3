import { createScoringContext, scoreBatch, type ScoredClient } from "@healthspan/healthspan-engine";
import { parseClientWorkbook, parseNormativeWorkbook } from "@healthspan/importers";
import { buildScoringConfigInput, readConfigOverrides } from "../lib/config.js";
import type { Logger } from "../lib/logger.js";
import { round2, writeBfaReport } from "../report/bfa-report.js";
import { logValidationErrors, requireFile } from "./shared.js";

export type BfaOptions = {
  clientsPath: string;
  normativePath: string;
  configPath?: string;
  outputPath: string;
};

export type BfaRunSummary = {
  scored: number;
  complete: number;
  skipped: number;
  /** Null when nothing was scored and no report was written. */
  outputPath: string | null;
};

function describeResult(result: ScoredClient): string {
  const { client } = result;
  if (result.healthspanIndex === null || result.biologicalFunctionalAge === null) {
    return `${client.name}: INCOMPLETE (missing ${result.missingTests.join(", ") || "pillar data"})`;
  }
  return `${client.name}: BFA ${round2(result.biologicalFunctionalAge)}, index ${round2(result.healthspanIndex)} (${result.healthspanCategory ?? "uncategorised"})`;
}

/**
 * Score a client workbook against a normative workbook and write the BFA
 * report. Fatal scoring errors propagate; skipped rows and clients are logged.
 */
export function runBfa(options: BfaOptions, logger: Logger): BfaRunSummary {
  const clientsPath = requireFile(options.clientsPath, "Client workbook");
  const normativePath = requireFile(options.normativePath, "Normative workbook");

  logger.info(`Loading normative data from ${normativePath}`);
  const normative = parseNormativeWorkbook(normativePath);
  logValidationErrors(logger, normative.errors);
  logger.debug(`${normative.rows.length} normative rows`);

  const overrides = readConfigOverrides(options.configPath);
  const ctx = createScoringContext(normative.rows, buildScoringConfigInput(overrides, normative.overrides));

  logger.info(`Reading clients from ${clientsPath}`);
  const parsed = parseClientWorkbook(clientsPath);
  logValidationErrors(logger, parsed.errors);

  const batch = scoreBatch(parsed.clients, ctx);
  for (const skipped of batch.skipped) {
    logger.warn(`Skipped ${skipped.clientName}: ${skipped.details.join("; ")}`);
  }
  for (const result of batch.scored) logger.info(describeResult(result));

  const complete = batch.scored.filter((r) => r.status === "COMPLETE").length;
  const skipped = parsed.errors.filter((e) => e.code === "INVALID_CLIENT").length + batch.skipped.length;

  if (batch.scored.length === 0) {
    logger.error("No clients could be scored");
    return { scored: 0, complete: 0, skipped, outputPath: null };
  }

  writeBfaReport(batch.scored, options.outputPath);
  logger.info(`Wrote ${batch.scored.length} result(s) to ${options.outputPath} (${complete} complete)`);
  return { scored: batch.scored.length, complete, skipped, outputPath: options.outputPath };
}
