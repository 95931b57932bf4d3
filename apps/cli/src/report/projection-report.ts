import * as XLSX from "xlsx";
import { getTestDefinition } from "@healthspan/contracts";
import type { ClientProjection } from "@healthspan/healthspan-engine";
import { writeWorkbook } from "@healthspan/importers";
import { safeSheetName, uniqueSheetName } from "./activity-report.js";

export const PROJECTION_COLUMNS = ["Test", "Baseline", "Year 5 Mean", "Year 10 Mean"] as const;

const MAX_SHEET_NAME = 31;

type Cell = string | number;

export function projectionSheetName(projection: ClientProjection): string {
  const { name, age } = projection.client;
  return safeSheetName(`${name}_${Math.trunc(age)}`, MAX_SHEET_NAME);
}

/**
 * Persona layout: Name, Age and Gender in A1:B3, the column header on
 * row 4 and one test per row from row 5, so the sheet reads back as an
 * activities input.
 */
export function projectionSheetRows(projection: ClientProjection): Cell[][] {
  const { client } = projection;
  return [
    ["Name", client.name],
    ["Age", client.age],
    ["Gender", client.gender],
    [...PROJECTION_COLUMNS],
    ...projection.tests.map((t) => [
      getTestDefinition(t.testId).label,
      t.baseline ?? "",
      t.fiveYear ?? "",
      t.tenYear ?? ""
    ])
  ];
}

export function buildProjectionWorkbook(projections: readonly ClientProjection[]): XLSX.WorkBook {
  const wb = XLSX.utils.book_new();
  const used = new Set<string>();
  for (const projection of projections) {
    const name = uniqueSheetName(projectionSheetName(projection), used, MAX_SHEET_NAME);
    used.add(name);
    const sheet = XLSX.utils.aoa_to_sheet(projectionSheetRows(projection));
    sheet["!cols"] = [{ wch: 24 }, { wch: 12 }, { wch: 14 }, { wch: 14 }];
    XLSX.utils.book_append_sheet(wb, sheet, name);
  }
  return wb;
}

export function writeProjectionReport(projections: readonly ClientProjection[], outputPath: string): void {
  writeWorkbook(buildProjectionWorkbook(projections), outputPath, "xlsx");
}
