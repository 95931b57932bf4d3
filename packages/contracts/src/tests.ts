export const testIds = [
  "vo2_max",
  "fev1",
  "grip_strength",
  "sts_power",
  "vertical_jump",
  "body_fat_pct",
  "whtr",
  "fasting_glucose",
  "hba1c",
  "homa_ir",
  "apob",
  "hscrp",
  "gait_speed",
  "tug",
  "single_leg_stance",
  "sit_and_reach",
  "processing_speed",
  "working_memory"
] as const;

export type TestId = (typeof testIds)[number];

export const pillarIds = ["vitality", "strength", "metabolic", "mobility", "cognitive"] as const;

export type PillarId = (typeof pillarIds)[number];

export const genders = ["Male", "Female"] as const;

export type Gender = (typeof genders)[number];

/** Normative rows may apply to both genders (e.g. single-leg stance has no split). */
export type NormativeGender = Gender | "All";

export type Direction = "higher_is_better" | "lower_is_better";

export type ScoringStrategy =
  | { kind: "standard" }
  | { kind: "vitality"; reference: "normative" | "percent_predicted" }
  | { kind: "metabolic_risk"; bands: "thresholds" | "hscrp_curve" | "body_fat" }
  | { kind: "cognitive_sd" }
  | { kind: "recorded" };

export type TestDefinition = {
  id: TestId;
  label: string;
  unit: string;
  reportColumn: string;
  pillar: PillarId | null;
  direction: Direction;
  strategy: ScoringStrategy;
};

/** Metabolic markers scored against low / normal / elevated risk bands. */
export const thresholdMarkers = ["apob", "homa_ir", "hba1c", "whtr"] as const;

export type ThresholdMarker = (typeof thresholdMarkers)[number];

export const pillarTests = {
  vitality: ["vo2_max", "fev1"],
  strength: ["grip_strength", "sts_power", "vertical_jump"],
  metabolic: ["apob", "homa_ir", "hba1c", "whtr", "hscrp", "body_fat_pct"],
  mobility: ["gait_speed", "tug", "single_leg_stance", "sit_and_reach"],
  cognitive: ["processing_speed", "working_memory"]
} as const satisfies Record<PillarId, readonly TestId[]>;

export type PillarTestId<P extends PillarId> = (typeof pillarTests)[P][number];

// Order matches the report's raw-value columns.
export const TEST_DEFINITIONS: readonly TestDefinition[] = [
  {
    id: "vo2_max",
    label: "VO2 Max",
    unit: "ml/kg/min",
    reportColumn: "VO2_Max",
    pillar: "vitality",
    direction: "higher_is_better",
    strategy: { kind: "vitality", reference: "normative" }
  },
  {
    id: "fev1",
    label: "FEV1",
    unit: "% predicted",
    reportColumn: "FEV1",
    pillar: "vitality",
    direction: "higher_is_better",
    strategy: { kind: "vitality", reference: "percent_predicted" }
  },
  {
    id: "grip_strength",
    label: "Grip Strength",
    unit: "kg",
    reportColumn: "Grip_Strength",
    pillar: "strength",
    direction: "higher_is_better",
    strategy: { kind: "standard" }
  },
  {
    id: "sts_power",
    label: "STS Power",
    unit: "W/kg",
    reportColumn: "STS_Power",
    pillar: "strength",
    direction: "higher_is_better",
    strategy: { kind: "standard" }
  },
  {
    id: "vertical_jump",
    label: "Vertical Jump",
    unit: "cm",
    reportColumn: "Vertical_Jump",
    pillar: "strength",
    direction: "higher_is_better",
    strategy: { kind: "standard" }
  },
  {
    id: "body_fat_pct",
    label: "Body Fat %",
    unit: "%",
    reportColumn: "Body_Fat_Pct",
    pillar: "metabolic",
    direction: "lower_is_better",
    strategy: { kind: "metabolic_risk", bands: "body_fat" }
  },
  {
    id: "whtr",
    label: "Waist to Height Ratio",
    unit: "ratio",
    reportColumn: "WHtR",
    pillar: "metabolic",
    direction: "lower_is_better",
    strategy: { kind: "metabolic_risk", bands: "thresholds" }
  },
  {
    id: "fasting_glucose",
    label: "Fasting Glucose",
    unit: "mg/dL",
    reportColumn: "Fasting_Glucose",
    pillar: null,
    direction: "lower_is_better",
    strategy: { kind: "recorded" }
  },
  {
    id: "hba1c",
    label: "HbA1c",
    unit: "%",
    reportColumn: "HbA1c",
    pillar: "metabolic",
    direction: "lower_is_better",
    strategy: { kind: "metabolic_risk", bands: "thresholds" }
  },
  {
    id: "homa_ir",
    label: "HOMA-IR",
    unit: "index",
    reportColumn: "HOMA_IR",
    pillar: "metabolic",
    direction: "lower_is_better",
    strategy: { kind: "metabolic_risk", bands: "thresholds" }
  },
  {
    id: "apob",
    label: "ApoB",
    unit: "mg/dL",
    reportColumn: "ApoB",
    pillar: "metabolic",
    direction: "lower_is_better",
    strategy: { kind: "metabolic_risk", bands: "thresholds" }
  },
  {
    id: "hscrp",
    label: "hsCRP",
    unit: "mg/L",
    reportColumn: "hsCRP",
    pillar: "metabolic",
    direction: "lower_is_better",
    strategy: { kind: "metabolic_risk", bands: "hscrp_curve" }
  },
  {
    id: "gait_speed",
    label: "Gait Speed",
    unit: "m/s",
    reportColumn: "Gait_Speed",
    pillar: "mobility",
    direction: "higher_is_better",
    strategy: { kind: "standard" }
  },
  {
    id: "tug",
    label: "Timed Up and Go",
    unit: "s",
    reportColumn: "TUG",
    pillar: "mobility",
    direction: "lower_is_better",
    strategy: { kind: "standard" }
  },
  {
    id: "single_leg_stance",
    label: "Single Leg Stance",
    unit: "s",
    reportColumn: "Single_Leg_Stance",
    pillar: "mobility",
    direction: "higher_is_better",
    strategy: { kind: "standard" }
  },
  {
    id: "sit_and_reach",
    label: "Sit and Reach",
    unit: "cm",
    reportColumn: "Sit_And_Reach",
    pillar: "mobility",
    direction: "higher_is_better",
    strategy: { kind: "standard" }
  },
  {
    id: "processing_speed",
    label: "Processing Speed",
    unit: "SD",
    reportColumn: "Processing_Speed",
    pillar: "cognitive",
    direction: "higher_is_better",
    strategy: { kind: "cognitive_sd" }
  },
  {
    id: "working_memory",
    label: "Working Memory",
    unit: "SD",
    reportColumn: "Working_Memory",
    pillar: "cognitive",
    direction: "higher_is_better",
    strategy: { kind: "cognitive_sd" }
  }
];

const definitionsById = new Map<TestId, TestDefinition>(TEST_DEFINITIONS.map((d) => [d.id, d]));

export function getTestDefinition(id: TestId): TestDefinition {
  const definition = definitionsById.get(id);
  if (!definition) throw new Error(`Unknown test id: ${id}`);
  return definition;
}

const testIdSet = new Set<string>(testIds);

export function isTestId(value: string): value is TestId {
  return testIdSet.has(value);
}

/** Tests whose scoring reads a normative curve, i.e. the curves a run cannot do without. */
export function normativeTestIds(): TestId[] {
  return TEST_DEFINITIONS.filter(
    (d) => d.strategy.kind === "standard" || (d.strategy.kind === "vitality" && d.strategy.reference === "normative")
  ).map((d) => d.id);
}

export type TestValues = Record<TestId, number | null>;

const blankValues: TestValues = {
  vo2_max: null,
  fev1: null,
  grip_strength: null,
  sts_power: null,
  vertical_jump: null,
  body_fat_pct: null,
  whtr: null,
  fasting_glucose: null,
  hba1c: null,
  homa_ir: null,
  apob: null,
  hscrp: null,
  gait_speed: null,
  tug: null,
  single_leg_stance: null,
  sit_and_reach: null,
  processing_speed: null,
  working_memory: null
};

/** A value map with every test missing. */
export function emptyTestValues(): TestValues {
  return { ...blankValues };
}
