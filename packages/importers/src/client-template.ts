import * as XLSX from "xlsx";
import { TEST_DEFINITIONS } from "@healthspan/contracts";
import { writeWorkbook } from "./workbook.js";

export const CLIENT_TEMPLATE_SHEET = "Client";

/** Rows of a blank key/value client sheet; the importer reads back every label. */
export function clientTemplateRows(): (string | number | null)[][] {
  return [
    ["Field", "Value", "Unit"],
    ["Name", null, null],
    ["Age", null, "years"],
    ["Gender", null, "Male / Female"],
    ...TEST_DEFINITIONS.map((d) => [d.label, null, d.unit])
  ];
}

export function buildClientTemplate(): XLSX.WorkBook {
  const wb = XLSX.utils.book_new();
  const sheet = XLSX.utils.aoa_to_sheet(clientTemplateRows());
  sheet["!cols"] = [{ wch: 24 }, { wch: 12 }, { wch: 16 }];
  XLSX.utils.book_append_sheet(wb, sheet, CLIENT_TEMPLATE_SHEET);
  return wb;
}

export function writeClientTemplate(filePath: string): void {
  writeWorkbook(buildClientTemplate(), filePath);
}
