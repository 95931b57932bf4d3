import { describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { emptyTestValues } from "@healthspan/contracts";
import type { ScoredClient } from "@healthspan/healthspan-engine";
import { readWorkbook, sheetGrid } from "@healthspan/importers";
import { bfaReportFormat, bfaReportHeader, bfaReportRow, round2, writeBfaReport } from "./bfa-report.js";

function scored(overrides: Partial<ScoredClient> = {}): ScoredClient {
  return {
    client: {
      name: "Pat Doe",
      age: 50,
      gender: "Male",
      values: { ...emptyTestValues(), vo2_max: 38.456, grip_strength: 44, whtr: 0.455 }
    },
    testScores: new Map(),
    metabolicIndex: 5,
    pillars: { vitality: 50.123, strength: 49.5, metabolic: 50, mobility: 51.25, cognitive: 50 },
    biologicalFunctionalAge: 50.1666,
    healthspanIndex: 668.333,
    healthspanCategory: "Good",
    status: "COMPLETE",
    missingTests: [],
    ...overrides
  };
}

function tmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "hs-report-"));
}

describe("bfaReportHeader", () => {
  it("lists identity, raw values, pillars and results in order", () => {
    const header = bfaReportHeader();
    expect(header).toHaveLength(29);
    expect(header.slice(0, 4)).toEqual(["Name", "Age", "Gender", "VO2_Max"]);
    expect(header.slice(20)).toEqual([
      "Working_Memory",
      "Vitality_Functional_Age",
      "Strength_Functional_Age",
      "Metabolic_Functional_Age",
      "Mobility_Functional_Age",
      "Cognitive_Functional_Age",
      "Biological_Functional_Age",
      "Healthspan_Index",
      "Healthspan_Category"
    ]);
  });
});

describe("bfaReportRow", () => {
  it("writes raw values as read and leaves missing ones blank", () => {
    const row = bfaReportRow(scored());
    expect(row.slice(0, 3)).toEqual(["Pat Doe", 50, "Male"]);
    expect(row.slice(3, 10)).toEqual([38.456, "", 44, "", "", "", 0.455]);
    expect(row.slice(10, 21)).toEqual(new Array<string>(11).fill(""));
  });

  it("rounds derived results to two decimals", () => {
    expect(bfaReportRow(scored()).slice(21)).toEqual([50.12, 49.5, 50, 51.25, 50, 50.17, 668.33, "Good"]);
  });

  it("keeps a fractional age unrounded", () => {
    const base = scored();
    const row = bfaReportRow(scored({ client: { ...base.client, age: 50.456 } }));
    expect(row[1]).toBe(50.456);
  });

  it("marks absent results INCOMPLETE", () => {
    const row = bfaReportRow(
      scored({
        pillars: { vitality: null, strength: 49.5, metabolic: 50, mobility: 51.25, cognitive: 50 },
        biologicalFunctionalAge: null,
        healthspanIndex: null,
        healthspanCategory: null,
        status: "INCOMPLETE"
      })
    );
    expect(row.slice(21)).toEqual(["INCOMPLETE", 49.5, 50, 51.25, 50, "INCOMPLETE", "INCOMPLETE", "INCOMPLETE"]);
  });
});

describe("round2", () => {
  it("rounds half away from zero at the second decimal", () => {
    expect(round2(1.005 + 1e-9)).toBe(1.01);
    expect(round2(669.99999999)).toBe(670);
  });
});

describe("writeBfaReport", () => {
  it("writes CSV for non-xlsx paths", () => {
    const file = path.join(tmpDir(), "results.csv");
    writeBfaReport([scored()], file);

    const lines = fs.readFileSync(file, "utf8").split("\n");
    expect(lines[0]).toBe(bfaReportHeader().join(","));
    expect(lines[1]?.split(",")).toEqual(bfaReportRow(scored()).map(String));
  });

  it("writes a BFA_Results sheet for xlsx paths", () => {
    const file = path.join(tmpDir(), "nested", "results.xlsx");
    writeBfaReport([scored()], file);

    const wb = readWorkbook(file);
    expect(wb.SheetNames).toEqual(["BFA_Results"]);
    const sheet = wb.Sheets["BFA_Results"];
    expect(sheet).toBeDefined();
    const grid = sheet ? sheetGrid(sheet) : [];
    expect(grid[1]?.[0]).toBe("Pat Doe");
    expect(grid[1]?.[28]).toBe("Good");
  });

  it("picks the format from the extension", () => {
    expect(bfaReportFormat("out/Results.XLSX")).toBe("xlsx");
    expect(bfaReportFormat("out/results.txt")).toBe("csv");
  });
});
