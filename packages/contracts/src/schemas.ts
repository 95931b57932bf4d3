import { z } from "zod";
import { genders, testIds } from "./tests.js";

export const testIdSchema = z.enum(testIds);
export const genderSchema = z.enum(genders);
export const normativeGenderSchema = z.enum(["Male", "Female", "All"]);

const age = z.number().finite().nonnegative();

// ============================================================================
// REFERENCE + CLIENT RECORDS
// ============================================================================

export const normativeRowSchema = z
  .object({
    testId: testIdSchema,
    gender: normativeGenderSchema,
    age: age.optional(),
    ageRange: z.tuple([age, age]).optional(),
    value: z.number().finite()
  })
  .superRefine((row, ctx) => {
    if ((row.age === undefined) === (row.ageRange === undefined)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Exactly one of age or ageRange is required" });
    }
    if (row.ageRange && row.ageRange[0] > row.ageRange[1]) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "ageRange lower bound exceeds upper bound" });
    }
  });

export type NormativeRow = z.infer<typeof normativeRowSchema>;

const rawValue = z.number().finite().nullable();

export const testValuesSchema = z.object({
  vo2_max: rawValue,
  fev1: rawValue,
  grip_strength: rawValue,
  sts_power: rawValue,
  vertical_jump: rawValue,
  body_fat_pct: rawValue,
  whtr: rawValue,
  fasting_glucose: rawValue,
  hba1c: rawValue,
  homa_ir: rawValue,
  apob: rawValue,
  hscrp: rawValue,
  gait_speed: rawValue,
  tug: rawValue,
  single_leg_stance: rawValue,
  sit_and_reach: rawValue,
  processing_speed: rawValue,
  working_memory: rawValue
});

export const clientRecordSchema = z.object({
  name: z.string().min(1),
  age: z.number().finite().positive(),
  gender: genderSchema,
  values: testValuesSchema
});

export type ClientRecord = z.infer<typeof clientRecordSchema>;

// ============================================================================
// SCORING CONFIGURATION
// ============================================================================

const weight = z.number().finite().min(0).max(1);
const weightGroup = z.record(z.string(), weight);

export const riskBandsSchema = z
  .object({
    lowRiskMax: z.number().finite(),
    normalMax: z.number().finite(),
    elevatedMin: z.number().finite()
  })
  .refine((b) => b.lowRiskMax < b.normalMax && b.normalMax <= b.elevatedMin, {
    message: "Risk bands must satisfy lowRiskMax < normalMax <= elevatedMin"
  });

export type RiskBands = z.infer<typeof riskBandsSchema>;

export const bodyFatBandSchema = z
  .object({
    ageRange: z.tuple([age, age]),
    healthyMax: z.number().finite(),
    overweightMax: z.number().finite(),
    obeseMin: z.number().finite()
  })
  .refine((b) => b.ageRange[0] <= b.ageRange[1], { message: "ageRange lower bound exceeds upper bound" })
  .refine((b) => b.healthyMax < b.overweightMax && b.overweightMax <= b.obeseMin, {
    message: "Body fat bands must satisfy healthyMax < overweightMax <= obeseMin"
  });

export type BodyFatBand = z.infer<typeof bodyFatBandSchema>;

export const healthspanCategorySchema = z.object({
  name: z.string().min(1),
  min: z.number().finite(),
  max: z.number().finite()
});

export type HealthspanCategoryBand = z.infer<typeof healthspanCategorySchema>;

export const scoringConfigSchema = z.object({
  pillarWeights: z.object({
    vitality: weight,
    strength: weight,
    metabolic: weight,
    mobility: weight,
    cognitive: weight
  }),
  subtestWeights: z.object({
    vitality: weightGroup,
    strength: weightGroup,
    metabolic: weightGroup,
    mobility: weightGroup,
    cognitive: weightGroup
  }),
  metabolicThresholds: z.object({
    apob: riskBandsSchema,
    homa_ir: riskBandsSchema,
    hba1c: riskBandsSchema,
    whtr: riskBandsSchema
  }),
  riskScale: z.object({
    optimal: z.number().finite().min(0),
    elevatedFloor: z.number().finite(),
    maximum: z.number().finite().max(100)
  }),
  hscrpCurve: z
    .array(z.object({ value: z.number().finite(), score: z.number().finite().min(0).max(100) }))
    .min(2),
  bodyFatBands: z.object({
    Male: z.array(bodyFatBandSchema).min(1),
    Female: z.array(bodyFatBandSchema).min(1)
  }),
  metabolicAge: z.object({
    baselineIndex: z.number().finite().positive(),
    spanYears: z.number().finite().nonnegative()
  }),
  vitality: z.object({
    deficitYears: z.number().finite().positive(),
    fev1PercentPredicted: z.number().finite().positive()
  }),
  cognitive: z.object({
    yearsPerSd: z.number().finite().positive(),
    minimumAge: age
  }),
  healthspan: z.object({
    baseScore: z.number().finite(),
    pointsPerYear: z.number().finite(),
    minScore: z.number().finite(),
    maxScore: z.number().finite(),
    bfaClamp: z.object({ min: age, max: age }).nullable().default(null)
  }),
  categories: z.array(healthspanCategorySchema).min(1)
});

export type ScoringConfigInput = z.input<typeof scoringConfigSchema>;
export type ScoringConfig = z.infer<typeof scoringConfigSchema>;

// ============================================================================
// ACTIVITY ASSESSMENT
// ============================================================================

export const importanceSchema = z.enum(["Critical", "Supporting"]);
export type Importance = z.infer<typeof importanceSchema>;

export const activityRequirementSchema = z.object({
  column: z.string().min(1),
  testKey: z.string().min(1),
  rawLimit: z.union([z.string().min(1), z.number().finite()]),
  importance: importanceSchema
});

export type ActivityRequirement = z.infer<typeof activityRequirementSchema>;

export const activityRuleSchema = z.object({
  activity: z.string().min(1),
  requirements: z.array(activityRequirementSchema)
});

export type ActivityRule = z.infer<typeof activityRuleSchema>;

export const projectionSchema = z.object({
  label: z.string(),
  fiveYear: z.number().finite().nullable(),
  tenYear: z.number().finite().nullable()
});

export const personaClientSchema = z.object({
  name: z.string().min(1),
  age: z.number().finite().nullable(),
  gender: genderSchema.nullable(),
  sheetName: z.string(),
  projections: z.record(z.string(), projectionSchema)
});

export type PersonaClient = z.infer<typeof personaClientSchema>;

export const activityConfigSchema = z.object({
  zones: z
    .object({
      redBelow: z.number().finite(),
      yellowMax: z.number().finite()
    })
    .refine((zones) => zones.redBelow <= zones.yellowMax, { message: "redBelow must not exceed yellowMax" }),
  rules: z
    .object({
      supportingRedForRed: z.number().int().nonnegative(),
      supportingRedForYellow: z.number().int().nonnegative()
    })
    .refine((rules) => rules.supportingRedForYellow <= rules.supportingRedForRed, {
      message: "supportingRedForYellow must not exceed supportingRedForRed"
    }),
  report: z.object({
    sheetNameTemplate: z.string().min(1).default("{name}_{age}"),
    maxSheetNameLength: z.number().int().min(1).max(31).default(31)
  })
});

export type ActivityConfigInput = z.input<typeof activityConfigSchema>;
export type ActivityConfig = z.infer<typeof activityConfigSchema>;

// ============================================================================
// PROJECTION (MONTE CARLO)
// ============================================================================

const perTestNumber = (schema: z.ZodNumber) => z.record(testIdSchema, schema);

const fractionRangeSchema = z
  .tuple([z.number().finite(), z.number().finite()])
  .refine(([low, high]) => low <= high, { message: "range low must not exceed high" });

export const projectionConfigSchema = z
  .object({
    /** Tests projected, in report order. */
    tests: z.array(testIdSchema).min(1),
    simulations: z.number().int().positive().default(2000),
    seed: z.number().int().nonnegative().nullable().default(null),
    decline: z.object({
      /** Fraction lost per decade, or SD per decade for absolute-decline tests. */
      baseRatePerDecade: perTestNumber(z.number().finite().nonnegative()),
      postRatePerDecade: perTestNumber(z.number().finite().nonnegative()).default({}),
      accelerateFromAge: perTestNumber(z.number().finite().positive()).default({})
    }),
    absoluteDeclineTests: z.array(testIdSchema).default([]),
    allowNegativeTests: z.array(testIdSchema).default([]),
    rateUncertaintyCv: perTestNumber(z.number().finite().nonnegative()),
    rateLognormal: z.array(testIdSchema).default([]),
    measurementCv: perTestNumber(z.number().finite().nonnegative()),
    measurementLognormal: z.array(testIdSchema).default([]),
    improvement: z.object({
      vo2AgeCutoff: z.number().finite(),
      vo2Under: fractionRangeSchema,
      vo2Over: fractionRangeSchema,
      homaIrReduction: z
        .object({
          median: z.number().positive(),
          q10: z.number().positive(),
          q90: z.number().positive(),
          min: z.number().finite().default(0),
          max: z.number().finite().default(1)
        })
        .refine((h) => h.q10 < h.median && h.median < h.q90, { message: "expected q10 < median < q90" }),
      ranges: z.record(testIdSchema, fractionRangeSchema).default({})
    }),
    practiceEffect: z
      .object({
        enabled: z.boolean().default(false),
        year: z.union([z.literal(5), z.literal(10)]).default(5),
        tests: z.array(testIdSchema).default([]),
        amount: z.number().finite().default(0)
      })
      .default({}),
    /** Pairwise correlations of the sampled decline rates. */
    correlations: z.array(z.tuple([testIdSchema, testIdSchema, z.number().min(-1).max(1)])).default([]),
    sanityCheck: z
      .object({
        enabled: z.boolean().default(true),
        toleranceAbs: z.number().nonnegative().default(0),
        toleranceRel: z.number().nonnegative().default(0.01)
      })
      .default({})
  })
  .superRefine((config, ctx) => {
    const listed = new Set<string>(config.tests);
    for (const testId of config.tests) {
      for (const [section, values] of [
        ["decline.baseRatePerDecade", config.decline.baseRatePerDecade],
        ["rateUncertaintyCv", config.rateUncertaintyCv],
        ["measurementCv", config.measurementCv]
      ] as const) {
        if (values[testId] === undefined) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [section, testId], message: "required for every projected test" });
        }
      }
      if (config.rateLognormal.includes(testId) && (config.decline.baseRatePerDecade[testId] ?? 0) <= 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["decline.baseRatePerDecade", testId],
          message: "lognormal rates need a positive base rate"
        });
      }
    }
    config.correlations.forEach(([a, b], i) => {
      if (!listed.has(a) || !listed.has(b) || a === b) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["correlations", i], message: `invalid pair ${a}/${b}` });
      }
    });
  });

export type ProjectionConfigInput = z.input<typeof projectionConfigSchema>;
export type ProjectionConfig = z.infer<typeof projectionConfigSchema>;
