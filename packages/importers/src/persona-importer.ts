import type { PersonaClient } from "@healthspan/contracts";
import { cleanNumber, inferTestKey, normalizeLabel, parseGender } from "./label-match.js";
import type { PersonaParseResult, ValidationError } from "./types.js";
import { cellText, readWorkbook, sheetGrid, type Cell } from "./workbook.js";

export type PersonaLayout = {
  metadataRows: number;
  /** 1-based row where the projection table starts. */
  tableStartRow: number;
  labelCol: number;
  fiveYearCol: number;
  tenYearCol: number;
  /** Consecutive blank labels that end the table. */
  blankRunLimit: number;
};

export const DEFAULT_PERSONA_LAYOUT: PersonaLayout = {
  metadataRows: 4,
  tableStartRow: 5,
  labelCol: 0,
  fiveYearCol: 2,
  tenYearCol: 3,
  blankRunLimit: 10
};

function readSheet(sheetName: string, grid: Cell[][], layout: PersonaLayout, errors: ValidationError[]): PersonaClient {
  const meta = new Map<string, Cell>();
  for (const row of grid.slice(0, layout.metadataRows)) {
    const key = normalizeLabel(row[0]);
    if (key) meta.set(key, row[1] ?? null);
  }

  const age = cleanNumber(meta.get("age"));
  const client: PersonaClient = {
    name: cellText(meta.get("name")) || sheetName,
    age: age === null ? null : Math.trunc(age),
    gender: parseGender(meta.get("gender") ?? meta.get("sex")),
    sheetName,
    projections: {}
  };

  let blanks = 0;
  for (let r = layout.tableStartRow - 1; r < grid.length && blanks < layout.blankRunLimit; r++) {
    const row = grid[r] ?? [];
    const label = cellText(row[layout.labelCol]);
    if (!label) {
      blanks += 1;
      continue;
    }
    blanks = 0;
    client.projections[inferTestKey(label)] = {
      label,
      fiveYear: cleanNumber(row[layout.fiveYearCol]),
      tenYear: cleanNumber(row[layout.tenYearCol])
    };
  }

  if (Object.keys(client.projections).length === 0) {
    errors.push({ sheet: sheetName, rowNumber: null, code: "NO_PROJECTIONS", message: `No tests parsed for ${client.name}` });
  }
  return client;
}

/** One persona client per sheet: Name/Age/Gender in A1:B4, projections below. */
export function parsePersonaWorkbook(filePath: string, layout: PersonaLayout = DEFAULT_PERSONA_LAYOUT): PersonaParseResult {
  const errors: ValidationError[] = [];
  const workbook = readWorkbook(filePath);
  const clients: PersonaClient[] = [];
  for (const sheetName of workbook.SheetNames) {
    const sheet = workbook.Sheets[sheetName];
    if (sheet) clients.push(readSheet(sheetName, sheetGrid(sheet), layout, errors));
  }
  return { clients, errors };
}
