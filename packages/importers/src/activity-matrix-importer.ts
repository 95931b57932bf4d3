import type { ActivityRequirement, ActivityRule, Importance } from "@healthspan/contracts";
import { inferTestKey, isMetaColumn, normalizeLabel } from "./label-match.js";
import type { ActivityMatrixParseResult, ValidationError } from "./types.js";
import { cellText, readWorkbook, sheetGrid, type Cell } from "./workbook.js";

type Matrix = {
  sheet: string;
  columns: string[];
  rows: Map<string, Map<string, Cell>>;
};

export function inferImportance(value: unknown): Importance | null {
  const text = cellText(value).toLowerCase();
  if (text.includes("critical")) return "Critical";
  if (text.includes("supporting")) return "Supporting";
  return null;
}

/** First sheet, header in row 1, keyed by its `Activity` column. */
function readMatrix(filePath: string, errors: ValidationError[]): Matrix | null {
  const workbook = readWorkbook(filePath);
  const [sheetName] = workbook.SheetNames;
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheetName || !sheet) {
    errors.push({ sheet: filePath, rowNumber: null, code: "MISSING_SHEET", message: `${filePath} has no sheets` });
    return null;
  }

  const [header = [], ...body] = sheetGrid(sheet);
  const headers = header.map(cellText);
  const activityCol = headers.findIndex((h) => normalizeLabel(h) === "activity");
  if (activityCol < 0) {
    errors.push({ sheet: sheetName, rowNumber: 1, code: "MISSING_COLUMN", message: `Expected an Activity column in ${filePath}` });
    return null;
  }

  const rows = new Map<string, Map<string, Cell>>();
  body.forEach((row) => {
    const activity = cellText(row[activityCol]);
    if (!activity) return;
    const cells = new Map<string, Cell>();
    headers.forEach((h, col) => {
      if (h) cells.set(h, row[col] ?? null);
    });
    rows.set(activity, cells);
  });

  return { sheet: sheetName, columns: headers.filter((h) => !isMetaColumn(h)), rows };
}

function limitCell(value: Cell | undefined): string | number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  const text = cellText(value);
  return text ? text : null;
}

/**
 * Join the limits matrix with the classifications matrix into one rule per
 * activity. Test columns come from the limits matrix; a test with no
 * classification counts as Supporting.
 */
export function parseActivityMatrices(limitsPath: string, classificationsPath: string): ActivityMatrixParseResult {
  const errors: ValidationError[] = [];
  const limits = readMatrix(limitsPath, errors);
  const classes = readMatrix(classificationsPath, errors);
  if (!limits || !classes) return { rules: [], testColumns: [], errors };

  if (limits.columns.length === 0) {
    errors.push({ sheet: limits.sheet, rowNumber: 1, code: "NO_TEST_COLUMNS", message: "No test columns in the limits matrix" });
  }

  const rules: ActivityRule[] = [];
  for (const [activity, cells] of limits.rows) {
    const requirements: ActivityRequirement[] = [];
    for (const column of limits.columns) {
      const rawLimit = limitCell(cells.get(column));
      if (rawLimit === null) continue;
      requirements.push({
        column,
        testKey: inferTestKey(column),
        rawLimit,
        importance: inferImportance(classes.rows.get(activity)?.get(column)) ?? "Supporting"
      });
    }
    rules.push({ activity, requirements });
  }

  return { rules, testColumns: limits.columns, errors };
}
