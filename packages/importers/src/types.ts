import type {
  ActivityRule,
  BodyFatBand,
  ClientRecord,
  Gender,
  NormativeRow,
  PersonaClient,
  RiskBands,
  ThresholdMarker
} from "@healthspan/contracts";

export type ValidationError = {
  sheet: string;
  rowNumber: number | null;
  code: string;
  message: string;
};

/** Band overrides read from the normative workbook; absent keys keep the configured bands. */
export type ThresholdOverrides = {
  metabolicThresholds: Partial<Record<ThresholdMarker, RiskBands>>;
  bodyFatBands: Partial<Record<Gender, BodyFatBand[]>>;
};

export type NormativeParseResult = {
  rows: NormativeRow[];
  overrides: ThresholdOverrides;
  errors: ValidationError[];
};

export type ClientParseResult = {
  clients: ClientRecord[];
  errors: ValidationError[];
};

export type ActivityMatrixParseResult = {
  rules: ActivityRule[];
  testColumns: string[];
  errors: ValidationError[];
};

export type PersonaParseResult = {
  clients: PersonaClient[];
  errors: ValidationError[];
};
