import { describe, expect, it } from "vitest";
import { getDefaultScoringConfig } from "@healthspan/data";
import { resolveScoringConfig } from "./config.js";
import {
  bodyFatBandFor,
  bodyFatRiskBands,
  hscrpRiskScore,
  metabolicFunctionalAge,
  riskScoreFromBands
} from "./metabolic-scoring.js";

const config = resolveScoringConfig(getDefaultScoringConfig());
const apob = config.metabolicThresholds.apob;

describe("metabolic-scoring", () => {
  describe("riskScoreFromBands", () => {
    it("scores low-risk values as optimal", () => {
      expect(riskScoreFromBands(80, apob, config.riskScale)).toBe(5);
      expect(riskScoreFromBands(90, apob, config.riskScale)).toBe(5);
    });

    it("ramps through the normal band", () => {
      expect(riskScoreFromBands(110, apob, config.riskScale)).toBe(20);
    });

    it("starts the elevated band at the elevated floor", () => {
      expect(riskScoreFromBands(130, apob, config.riskScale)).toBe(35);
      expect(riskScoreFromBands(169, apob, config.riskScale)).toBe(67.5);
    });

    it("caps at the maximum", () => {
      expect(riskScoreFromBands(300, apob, config.riskScale)).toBe(100);
    });
  });

  describe("hscrpRiskScore", () => {
    it("follows the breakpoint curve", () => {
      expect(hscrpRiskScore(0.5, config.hscrpCurve)).toBe(5);
      expect(hscrpRiskScore(2, config.hscrpCurve)).toBe(30);
      expect(hscrpRiskScore(3, config.hscrpCurve)).toBe(50);
    });

    it("clamps at both ends", () => {
      expect(hscrpRiskScore(-1, config.hscrpCurve)).toBe(0);
      expect(hscrpRiskScore(20, config.hscrpCurve)).toBe(100);
    });
  });

  describe("body fat bands", () => {
    it("selects the band by its lower age bound", () => {
      expect(bodyFatBandFor(50, config.bodyFatBands.Male).ageRange).toEqual([40, 59]);
      expect(bodyFatBandFor(85, config.bodyFatBands.Male).ageRange).toEqual([60, 79]);
    });

    it("uses the youngest band below every range", () => {
      expect(bodyFatBandFor(15, config.bodyFatBands.Male).ageRange).toEqual([20, 39]);
    });

    it("maps a band onto risk thresholds", () => {
      expect(bodyFatRiskBands("Female", 45, config.bodyFatBands)).toEqual({
        lowRiskMax: 23,
        normalMax: 34,
        elevatedMin: 40
      });
    });
  });

  describe("metabolicFunctionalAge", () => {
    it("keeps the chronological age at the baseline index", () => {
      expect(metabolicFunctionalAge(50, 5, config.metabolicAge)).toBe(50);
    });

    it("moves six years per index point", () => {
      expect(metabolicFunctionalAge(50, 6, config.metabolicAge)).toBe(56);
    });

    it("caps the offset at the span", () => {
      expect(metabolicFunctionalAge(50, 20, config.metabolicAge)).toBe(80);
      expect(metabolicFunctionalAge(50, 0, config.metabolicAge)).toBe(20);
    });

    it("never goes below zero", () => {
      expect(metabolicFunctionalAge(20, 0, config.metabolicAge)).toBe(0);
    });
  });
});
