import * as XLSX from "xlsx";
import { z } from "zod";
import {
  bodyFatBandSchema,
  normativeRowSchema,
  riskBandsSchema,
  thresholdMarkers,
  type BodyFatBand,
  type Gender,
  type NormativeRow,
  type ThresholdMarker
} from "@healthspan/contracts";
import { cleanNumber, matchTestId, parseGender, parseNormativeGender } from "./label-match.js";
import type { NormativeParseResult, ThresholdOverrides, ValidationError } from "./types.js";
import { cellText, readWorkbook, sheetRecords } from "./workbook.js";

export const NORMATIVE_SHEET = "Normative_Data";
export const THRESHOLD_SHEET = "Metabolic_Thresholds";
export const BODY_FAT_SHEET = "Body_Fat_Bands";

const cell = z.union([z.string(), z.number()]).optional();

const normativeSheetRow = z.object({
  test_id: cell,
  gender: cell,
  age: cell,
  age_range: cell,
  value: cell
});

const thresholdSheetRow = z.object({
  marker: cell,
  low_risk: cell,
  normal: cell,
  elevated: cell
});

const bodyFatSheetRow = z.object({
  gender: cell,
  age_range: cell,
  healthy_max: cell,
  overweight_max: cell,
  obese_min: cell
});

/** `40-49`, `40–49`, `40 - 49`; a single age or `70+` is taken as its decade. */
export function parseAgeRange(value: unknown): [number, number] | null {
  const text = cellText(value).replace(/[–—]/g, "-").replace(/\s+/g, "");
  if (!text) return null;
  const range = /^(\d+(?:\.\d+)?)-(\d+(?:\.\d+)?)$/.exec(text);
  if (range?.[1] && range[2]) return [Number(range[1]), Number(range[2])];
  const single = cleanNumber(text);
  return single === null ? null : [single, single + 9];
}

/** `<90` → (-∞, 90], `90-129` → [90, 129], `>130` → [130, ∞). */
export function parseRiskRange(value: unknown): [number, number] | null {
  const text = cellText(value).replace(/[–—]/g, "-").replace(/\s+/g, "");
  if (!text) return null;
  const bound = cleanNumber(text.replace(/^[<>]=?/, ""));
  if (text.startsWith("<")) return bound === null ? null : [-Infinity, bound];
  if (text.startsWith(">")) return bound === null ? null : [bound, Infinity];
  const range = /^(-?\d+(?:\.\d+)?)-(-?\d+(?:\.\d+)?)$/.exec(text);
  if (range?.[1] && range[2]) return [Number(range[1]), Number(range[2])];
  return bound === null ? null : [bound, bound];
}

function issueText(error: z.ZodError): string {
  return error.issues.map((i) => i.message).join("; ");
}

function isThresholdMarker(value: string): value is ThresholdMarker {
  return thresholdMarkers.some((m) => m === value);
}

function parseNormativeRows(sheet: XLSX.WorkSheet, errors: ValidationError[]): NormativeRow[] {
  const rows: NormativeRow[] = [];
  sheetRecords(sheet).forEach((record, idx) => {
    const rowNumber = idx + 2;
    const push = (code: string, message: string): void => {
      errors.push({ sheet: NORMATIVE_SHEET, rowNumber, code, message });
    };

    const raw = normativeSheetRow.safeParse(record);
    if (!raw.success) return push("INVALID_ROW", issueText(raw.error));

    const testId = matchTestId(raw.data.test_id);
    if (!testId) return push("UNKNOWN_TEST", `Unrecognised test: ${cellText(raw.data.test_id)}`);
    const gender = parseNormativeGender(raw.data.gender);
    if (!gender) return push("INVALID_GENDER", `Unrecognised gender: ${cellText(raw.data.gender)}`);

    const age = cleanNumber(raw.data.age);
    const ageRange = parseAgeRange(raw.data.age_range);
    const value = cleanNumber(raw.data.value);
    const parsed = normativeRowSchema.safeParse({
      testId,
      gender,
      age: age ?? undefined,
      ageRange: ageRange ?? undefined,
      value
    });
    if (!parsed.success) return push("INVALID_ROW", issueText(parsed.error));
    rows.push(parsed.data);
  });
  return rows;
}

function parseThresholds(sheet: XLSX.WorkSheet, overrides: ThresholdOverrides, errors: ValidationError[]) {
  sheetRecords(sheet).forEach((record, idx) => {
    const rowNumber = idx + 2;
    const push = (code: string, message: string): void => {
      errors.push({ sheet: THRESHOLD_SHEET, rowNumber, code, message });
    };

    const raw = thresholdSheetRow.safeParse(record);
    if (!raw.success) return push("INVALID_ROW", issueText(raw.error));
    const marker = matchTestId(raw.data.marker);
    if (!marker || !isThresholdMarker(marker)) {
      return push("UNKNOWN_MARKER", `Not a threshold marker: ${cellText(raw.data.marker)}`);
    }

    const low = parseRiskRange(raw.data.low_risk);
    const normal = parseRiskRange(raw.data.normal);
    const elevated = parseRiskRange(raw.data.elevated);
    if (!low || !normal || !elevated) return push("INVALID_RANGE", `Unparseable risk range for ${marker}`);

    const bands = riskBandsSchema.safeParse({ lowRiskMax: low[1], normalMax: normal[1], elevatedMin: elevated[0] });
    if (!bands.success) return push("INVALID_RANGE", `${marker}: ${issueText(bands.error)}`);
    overrides.metabolicThresholds[marker] = bands.data;
  });
}

function parseBodyFatBands(sheet: XLSX.WorkSheet, overrides: ThresholdOverrides, errors: ValidationError[]) {
  const byGender = new Map<Gender, BodyFatBand[]>();
  sheetRecords(sheet).forEach((record, idx) => {
    const rowNumber = idx + 2;
    const push = (code: string, message: string): void => {
      errors.push({ sheet: BODY_FAT_SHEET, rowNumber, code, message });
    };

    const raw = bodyFatSheetRow.safeParse(record);
    if (!raw.success) return push("INVALID_ROW", issueText(raw.error));
    const gender = parseGender(raw.data.gender);
    if (!gender) return push("INVALID_GENDER", `Unrecognised gender: ${cellText(raw.data.gender)}`);

    const band = bodyFatBandSchema.safeParse({
      ageRange: parseAgeRange(raw.data.age_range),
      healthyMax: cleanNumber(raw.data.healthy_max),
      overweightMax: cleanNumber(raw.data.overweight_max),
      obeseMin: cleanNumber(raw.data.obese_min)
    });
    if (!band.success) return push("INVALID_ROW", issueText(band.error));
    byGender.set(gender, [...(byGender.get(gender) ?? []), band.data]);
  });
  for (const [gender, bands] of byGender) overrides.bodyFatBands[gender] = bands;
}

/**
 * Read the normative workbook. Invalid rows are skipped and reported; the
 * optional threshold sheets become band overrides.
 */
export function parseNormativeWorkbook(filePath: string): NormativeParseResult {
  const errors: ValidationError[] = [];
  const overrides: ThresholdOverrides = { metabolicThresholds: {}, bodyFatBands: {} };
  const workbook = readWorkbook(filePath);

  const normativeSheet = workbook.Sheets[NORMATIVE_SHEET];
  if (!normativeSheet) {
    errors.push({ sheet: NORMATIVE_SHEET, rowNumber: null, code: "MISSING_SHEET", message: `${NORMATIVE_SHEET} is required` });
  }
  const rows = normativeSheet ? parseNormativeRows(normativeSheet, errors) : [];

  const thresholdSheet = workbook.Sheets[THRESHOLD_SHEET];
  if (thresholdSheet) parseThresholds(thresholdSheet, overrides, errors);
  const bodyFatSheet = workbook.Sheets[BODY_FAT_SHEET];
  if (bodyFatSheet) parseBodyFatBands(bodyFatSheet, overrides, errors);

  return { rows, overrides, errors };
}
