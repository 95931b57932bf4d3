import { emptyTestValues, type ClientRecord, type TestValues } from "@healthspan/contracts";
import { cleanNumber, matchTestId, normalizeLabel, parseGender } from "./label-match.js";
import type { ClientParseResult, ValidationError } from "./types.js";
import { cellText, readWorkbook, sheetGrid, type Cell } from "./workbook.js";

type ClientField = "name" | "age" | "gender";

function clientField(label: Cell | undefined): ClientField | null {
  const normalized = normalizeLabel(label);
  if (normalized === "name" || normalized === "client" || normalized === "client name") return "name";
  if (normalized === "age") return "age";
  if (normalized === "gender" || normalized === "sex") return "gender";
  return null;
}

type Draft = {
  name: string;
  age: unknown;
  gender: unknown;
  values: TestValues;
};

function toClient(draft: Draft, sheet: string, rowNumber: number | null, errors: ValidationError[]): ClientRecord | null {
  const age = cleanNumber(draft.age);
  const gender = parseGender(draft.gender);
  const problems: string[] = [];
  if (age === null || age <= 0) problems.push(`invalid age "${cellText(draft.age)}"`);
  if (!gender) problems.push(`invalid gender "${cellText(draft.gender)}"`);
  if (age === null || age <= 0 || !gender) {
    errors.push({ sheet, rowNumber, code: "INVALID_CLIENT", message: `${draft.name}: ${problems.join(", ")}` });
    return null;
  }
  return { name: draft.name, age, gender, values: draft.values };
}

function isTabular(grid: Cell[][]): boolean {
  const fields = new Set((grid[0] ?? []).map(clientField));
  return fields.has("name") && fields.has("age");
}

/** Column A label, column B value; one client per sheet. */
function parseKeyValueSheet(sheetName: string, grid: Cell[][], errors: ValidationError[]): ClientRecord | null {
  const draft: Draft = { name: sheetName, age: null, gender: null, values: emptyTestValues() };
  let recognised = false;

  for (const row of grid) {
    const [label, value] = row;
    const field = clientField(label);
    if (field === "name") {
      draft.name = cellText(value) || sheetName;
      continue;
    }
    if (field) {
      draft[field] = value;
      recognised = true;
      continue;
    }
    const testId = matchTestId(label);
    if (testId) {
      draft.values[testId] = cleanNumber(value);
      recognised = true;
    }
  }

  // Sheets without any client field (instructions, notes) are not clients.
  if (!recognised) return null;
  return toClient(draft, sheetName, null, errors);
}

/** Header row with name and age; one client per following row. */
function parseTabularSheet(sheetName: string, grid: Cell[][], errors: ValidationError[]): ClientRecord[] {
  const [header = [], ...body] = grid;
  const columns = header.map((label) => ({ field: clientField(label), testId: matchTestId(label) }));

  const clients: ClientRecord[] = [];
  body.forEach((row, idx) => {
    if (row.every((c) => cellText(c) === "")) return;
    const draft: Draft = { name: "", age: null, gender: null, values: emptyTestValues() };
    columns.forEach(({ field, testId }, col) => {
      const value = row[col] ?? null;
      if (field === "name") draft.name = cellText(value);
      else if (field) draft[field] = value;
      else if (testId) draft.values[testId] = cleanNumber(value);
    });
    if (!draft.name) draft.name = `${sheetName} row ${idx + 2}`;

    const client = toClient(draft, sheetName, idx + 2, errors);
    if (client) clients.push(client);
  });
  return clients;
}

/**
 * Read a client workbook. Each sheet is either one key/value client or a
 * table of clients. Clients with an unusable age or gender are reported
 * as INVALID_CLIENT and left out.
 */
export function parseClientWorkbook(filePath: string): ClientParseResult {
  const errors: ValidationError[] = [];
  const workbook = readWorkbook(filePath);
  const clients: ClientRecord[] = [];

  for (const sheetName of workbook.SheetNames) {
    const sheet = workbook.Sheets[sheetName];
    if (!sheet) continue;
    const grid = sheetGrid(sheet);
    if (isTabular(grid)) {
      clients.push(...parseTabularSheet(sheetName, grid, errors));
    } else {
      const client = parseKeyValueSheet(sheetName, grid, errors);
      if (client) clients.push(client);
    }
  }

  if (clients.length === 0 && errors.length === 0) {
    errors.push({ sheet: "", rowNumber: null, code: "NO_CLIENTS", message: "No client sheets found" });
  }
  return { clients, errors };
}
