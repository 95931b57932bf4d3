import * as XLSX from "xlsx";
import { TEST_DEFINITIONS, pillarIds, type PillarId } from "@healthspan/contracts";
import type { ScoredClient } from "@healthspan/healthspan-engine";
import { writeWorkbook, type WorkbookFormat } from "@healthspan/importers";

export const BFA_SHEET = "BFA_Results";
export const INCOMPLETE = "INCOMPLETE";

const PILLAR_COLUMNS: Record<PillarId, string> = {
  vitality: "Vitality_Functional_Age",
  strength: "Strength_Functional_Age",
  metabolic: "Metabolic_Functional_Age",
  mobility: "Mobility_Functional_Age",
  cognitive: "Cognitive_Functional_Age"
};

export type ReportCell = string | number;

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function result(value: number | null): ReportCell {
  return value === null ? INCOMPLETE : round2(value);
}

export function bfaReportHeader(): string[] {
  return [
    "Name",
    "Age",
    "Gender",
    ...TEST_DEFINITIONS.map((d) => d.reportColumn),
    ...pillarIds.map((p) => PILLAR_COLUMNS[p]),
    "Biological_Functional_Age",
    "Healthspan_Index",
    "Healthspan_Category"
  ];
}

/**
 * Inputs are written as read, blank when missing. Derived results are
 * rounded to two decimals and read INCOMPLETE when absent.
 */
export function bfaReportRow(scored: ScoredClient): ReportCell[] {
  const { client } = scored;
  return [
    client.name,
    client.age,
    client.gender,
    ...TEST_DEFINITIONS.map((d) => client.values[d.id] ?? ""),
    ...pillarIds.map((p) => result(scored.pillars[p])),
    result(scored.biologicalFunctionalAge),
    result(scored.healthspanIndex),
    scored.healthspanCategory ?? INCOMPLETE
  ];
}

export function buildBfaWorkbook(results: readonly ScoredClient[]): XLSX.WorkBook {
  const wb = XLSX.utils.book_new();
  const sheet = XLSX.utils.aoa_to_sheet([bfaReportHeader(), ...results.map(bfaReportRow)]);
  XLSX.utils.book_append_sheet(wb, sheet, BFA_SHEET);
  return wb;
}

export function bfaReportFormat(outputPath: string): WorkbookFormat {
  return outputPath.toLowerCase().endsWith(".xlsx") ? "xlsx" : "csv";
}

/** `.xlsx` paths get a workbook; every other extension gets CSV. */
export function writeBfaReport(results: readonly ScoredClient[], outputPath: string): void {
  writeWorkbook(buildBfaWorkbook(results), outputPath, bfaReportFormat(outputPath));
}
