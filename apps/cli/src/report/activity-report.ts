import * as XLSX from "xlsx";
import type { ActivityConfig, PersonaClient } from "@healthspan/contracts";
import { countStatuses, type PersonaAssessment } from "@healthspan/healthspan-engine";
import { writeWorkbook } from "@healthspan/importers";

export const SUMMARY_SHEET = "Summary";

export const ACTIVITY_COLUMNS = [
  "Activity",
  "5 Year Critical Failures",
  "5 Year Supporting Failures",
  "5 Year Final Status",
  "10 Year Critical Failures",
  "10 Year Supporting Failures",
  "10 Year Final Status"
] as const;

export const SUMMARY_COLUMNS = [
  "Client",
  "Age",
  "Gender",
  "Sheet",
  "5Y GREEN",
  "5Y YELLOW",
  "5Y RED",
  "10Y GREEN",
  "10Y YELLOW",
  "10Y RED"
] as const;

const INVALID_SHEET_CHARS = /[[\]:*?\/\\]/g;

export function safeSheetName(name: string, maxLength: number): string {
  const cleaned = name.replace(INVALID_SHEET_CHARS, "_").trim();
  return (cleaned || "Sheet").slice(0, maxLength);
}

export function sheetNameFor(client: PersonaClient, report: ActivityConfig["report"]): string {
  const filled = report.sheetNameTemplate
    .replace(/\{name\}/g, client.name)
    .replace(/\{age\}/g, client.age === null ? "" : String(client.age))
    .replace(/^[_\s]+|[_\s]+$/g, "");
  return safeSheetName(filled, report.maxSheetNameLength);
}

/** Appends `_2`, `_3`, … inside the length limit until the name is free. */
export function uniqueSheetName(base: string, used: ReadonlySet<string>, maxLength: number): string {
  let candidate = base;
  for (let n = 2; used.has(candidate); n++) {
    const suffix = `_${n}`;
    candidate = `${base.slice(0, maxLength - suffix.length)}${suffix}`;
  }
  return candidate;
}

export function activityRows(assessment: PersonaAssessment): string[][] {
  return assessment.activities.map((a) => [
    a.activity,
    a.fiveYear.criticalFailures.join(", "),
    a.fiveYear.supportingFailures.join(", "),
    a.fiveYear.status,
    a.tenYear.criticalFailures.join(", "),
    a.tenYear.supportingFailures.join(", "),
    a.tenYear.status
  ]);
}

export function buildActivityWorkbook(
  assessments: readonly PersonaAssessment[],
  report: ActivityConfig["report"]
): XLSX.WorkBook {
  const wb = XLSX.utils.book_new();
  const used = new Set<string>([SUMMARY_SHEET]);
  const summary: (string | number)[][] = [[...SUMMARY_COLUMNS]];

  for (const assessment of assessments) {
    const { client } = assessment;
    const sheetName = uniqueSheetName(sheetNameFor(client, report), used, report.maxSheetNameLength);
    used.add(sheetName);

    const sheet = XLSX.utils.aoa_to_sheet([[...ACTIVITY_COLUMNS], ...activityRows(assessment)]);
    XLSX.utils.book_append_sheet(wb, sheet, sheetName);

    const five = countStatuses(assessment, "fiveYear");
    const ten = countStatuses(assessment, "tenYear");
    summary.push([
      client.name,
      client.age ?? "",
      client.gender ?? "",
      sheetName,
      five.GREEN,
      five.YELLOW,
      five.RED,
      ten.GREEN,
      ten.YELLOW,
      ten.RED
    ]);
  }

  XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(summary), SUMMARY_SHEET);
  return wb;
}

export function writeActivityReport(
  assessments: readonly PersonaAssessment[],
  report: ActivityConfig["report"],
  outputPath: string
): void {
  writeWorkbook(buildActivityWorkbook(assessments, report), outputPath, "xlsx");
}
