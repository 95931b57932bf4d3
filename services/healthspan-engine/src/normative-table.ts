/**
 * Normative Table
 *
 * Immutable age ↔ expected-value curves per (test, gender), built once per
 * run from reference rows. Age bands are reduced to their midpoint.
 * Forward lookups give the expected value for an age; inverse lookups give
 * the functional age at which a raw value is normal.
 */

import type { Direction, Gender, NormativeGender, NormativeRow, TestId } from "@healthspan/contracts";
import { DataCompletenessError, ReferenceDataError } from "./errors.js";
import { inverseInterpolate, linearInterpolate, midpoint, type CurvePoint } from "./interpolation.js";

export type CoverageRequirement = { testId: TestId; gender: Gender };

function curveKey(testId: TestId, gender: NormativeGender): string {
  return `${testId}::${gender}`;
}

export class NormativeTable {
  private readonly curves: ReadonlyMap<string, readonly CurvePoint[]>;

  private constructor(curves: Map<string, CurvePoint[]>) {
    this.curves = curves;
  }

  static fromRows(rows: readonly NormativeRow[]): NormativeTable {
    const grouped = new Map<string, CurvePoint[]>();
    for (const row of rows) {
      const x = row.ageRange ? midpoint(row.ageRange) : row.age;
      if (x === undefined) {
        throw new ReferenceDataError(`Normative row for ${row.testId} (${row.gender}) has no age`);
      }
      const key = curveKey(row.testId, row.gender);
      const points = grouped.get(key) ?? [];
      points.push({ x, y: row.value });
      grouped.set(key, points);
    }

    const duplicates: string[] = [];
    for (const [key, points] of grouped) {
      points.sort((a, b) => a.x - b.x);
      const seen = new Set<number>();
      for (const point of points) {
        if (seen.has(point.x)) duplicates.push(`${key} @ age ${point.x}`);
        seen.add(point.x);
      }
    }
    if (duplicates.length > 0) {
      throw new ReferenceDataError("Normative data has more than one value for the same age", duplicates);
    }

    return new NormativeTable(grouped);
  }

  /** Gender-specific curve, falling back to an "All" curve. */
  private lookup(testId: TestId, gender: Gender): readonly CurvePoint[] | undefined {
    return this.curves.get(curveKey(testId, gender)) ?? this.curves.get(curveKey(testId, "All"));
  }

  has(testId: TestId, gender: Gender): boolean {
    const points = this.lookup(testId, gender);
    return points !== undefined && points.length >= 2;
  }

  curve(testId: TestId, gender: Gender): readonly CurvePoint[] {
    const points = this.lookup(testId, gender);
    if (!points || points.length === 0) {
      throw new DataCompletenessError(`No normative data for ${testId} (${gender})`);
    }
    if (points.length < 2) {
      throw new DataCompletenessError(`Normative data for ${testId} (${gender}) needs at least two reference points`);
    }
    return points;
  }

  /** Fails once, listing every (test, gender) pair without a usable curve. */
  assertCoverage(requirements: readonly CoverageRequirement[]): void {
    const missing = requirements
      .filter((r) => !this.has(r.testId, r.gender))
      .map((r) => `${r.testId} (${r.gender})`);
    if (missing.length > 0) {
      throw new DataCompletenessError(`Normative data missing for ${missing.length} test/gender pair(s)`, missing);
    }
  }

  /** Age-adjusted expected value; ages outside the table take the edge value. */
  expectedValue(testId: TestId, gender: Gender, age: number): number {
    return linearInterpolate(age, this.curve(testId, gender));
  }

  /**
   * Age at which `rawValue` is the norm. Raw values beyond the table clamp
   * to the nearest bound; ties resolve to the matching age nearest `age`.
   */
  functionalAgeFor(testId: TestId, gender: Gender, age: number, rawValue: number, direction: Direction): number {
    return inverseInterpolate(rawValue, this.curve(testId, gender), direction, age);
  }
}
