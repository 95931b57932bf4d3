import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";

export type Cell = string | number | boolean | Date | null;

export function readWorkbook(filePath: string): XLSX.WorkBook {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`Workbook not found: ${resolved}`);
  }
  return XLSX.read(fs.readFileSync(resolved), { type: "buffer" });
}

export type WorkbookFormat = "xlsx" | "csv";

export function formatForPath(filePath: string): WorkbookFormat {
  return path.extname(filePath).toLowerCase() === ".csv" ? "csv" : "xlsx";
}

/** CSV holds the first sheet only. */
export function writeWorkbook(
  workbook: XLSX.WorkBook,
  filePath: string,
  format: WorkbookFormat = formatForPath(filePath)
): void {
  const resolved = path.resolve(filePath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });

  if (format === "csv") {
    const [first] = workbook.SheetNames;
    const sheet = first ? workbook.Sheets[first] : undefined;
    fs.writeFileSync(resolved, sheet ? XLSX.utils.sheet_to_csv(sheet) : "", "utf8");
    return;
  }
  const bytes: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  fs.writeFileSync(resolved, bytes);
}

/**
 * Grid of cell values anchored at A1, so `grid[r][c]` is row r + 1, column c.
 * Blank cells are null.
 */
export function sheetGrid(sheet: XLSX.WorkSheet): Cell[][] {
  const ref = sheet["!ref"];
  if (!ref) return [];
  const range = XLSX.utils.decode_range(ref);
  range.s = { r: 0, c: 0 };
  return XLSX.utils.sheet_to_json<Cell[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: true,
    range: XLSX.utils.encode_range(range)
  });
}

export function headerKey(header: string): string {
  return header.trim().toLowerCase().replace(/\s+/g, "_");
}

/** Rows keyed by snake-cased header (`Test ID` → `test_id`), blank cells as "". */
export function sheetRecords(sheet: XLSX.WorkSheet): Record<string, unknown>[] {
  return XLSX.utils
    .sheet_to_json<Record<string, unknown>>(sheet, { defval: "" })
    .map((row) => Object.fromEntries(Object.entries(row).map(([key, value]) => [headerKey(key), value])));
}

export function cellText(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value).trim();
}
