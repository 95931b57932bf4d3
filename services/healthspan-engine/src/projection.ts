/**
 * Monte Carlo Projection
 *
 * Projects each client's test results 5 and 10 years ahead. Every
 * simulation samples correlated per-test decline rates, backs a "true"
 * baseline out of the measured one, ages it (optionally after an
 * intervention gain), and re-applies measurement noise. The reported value
 * is the mean over all simulations.
 */

import {
  getTestDefinition,
  projectionConfigSchema,
  type ClientRecord,
  type Direction,
  type ProjectionConfig,
  type TestId
} from "@healthspan/contracts";
import { ConfigurationError } from "./errors.js";
import { choleskyDecompose, correlatedNormals, createRng, type Rng } from "./random.js";

export const projectionScenarios = ["decline", "improvement"] as const;
export type ProjectionScenario = (typeof projectionScenarios)[number];

export const PROJECTION_HORIZONS = [5, 10] as const;

// Standard normal quantile at 0.9.
const Z90 = 1.2815515655446004;

export type ProjectionModel = {
  config: ProjectionConfig;
  /** Cholesky factor of the rate correlations, rows in `config.tests` order. */
  factor: number[][];
};

export type TestProjection = {
  testId: TestId;
  baseline: number | null;
  fiveYear: number | null;
  tenYear: number | null;
};

export type ClientProjection = {
  client: ClientRecord;
  scenario: ProjectionScenario;
  tests: TestProjection[];
  warnings: string[];
};

export function resolveProjectionConfig(input: unknown): ProjectionConfig {
  const parsed = projectionConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Projection configuration is invalid",
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }
  return parsed.data;
}

export function buildProjectionModel(config: ProjectionConfig): ProjectionModel {
  const index = new Map(config.tests.map((t, i) => [t, i]));
  const matrix: number[][] = config.tests.map((_, i) => config.tests.map((__, j) => (i === j ? 1 : 0)));
  for (const [a, b, rho] of config.correlations) {
    const i = index.get(a);
    const j = index.get(b);
    const rowI = i === undefined ? undefined : matrix[i];
    const rowJ = j === undefined ? undefined : matrix[j];
    if (i === undefined || j === undefined || !rowI || !rowJ) continue;
    rowI[j] = rho;
    rowJ[i] = rho;
  }
  const factor = choleskyDecompose(matrix);
  if (!factor) {
    throw new ConfigurationError("Projection correlations are not positive definite");
  }
  return { config, factor };
}

export function lognormalSigma(cv: number): number {
  return Math.sqrt(Math.log(1 + cv * cv));
}

/**
 * Value after `years` of decline starting at `startAge`. Rates are per
 * decade: a fraction of the value, or an absolute amount for
 * `absolute` tests. From `accelerateFromAge` on, `postRate` applies.
 */
export function applyDecline(
  value: number,
  startAge: number,
  years: number,
  rate: number,
  postRate: number | null,
  accelerateFromAge: number | null,
  direction: Direction,
  absolute: boolean,
): number {
  if (years <= 0) return value;
  let early = years;
  let late = 0;
  if (accelerateFromAge !== null) {
    early = startAge < accelerateFromAge ? Math.min(years, accelerateFromAge - startAge) : 0;
    late = years - early;
  }

  const higher = direction === "higher_is_better";
  const segment = (v: number, r: number, span: number): number => {
    if (span <= 0) return v;
    if (absolute) {
      const amount = r * (span / 10);
      return higher ? v - amount : v + amount;
    }
    // Negative values move further from zero when they worsen.
    const worse = higher === v >= 0 ? 1 - r : 1 + r;
    return v * worse ** (span / 10);
  };

  let result = segment(value, rate, early);
  result = segment(result, postRate ?? rate, late);
  return result;
}

function isAbsolute(config: ProjectionConfig, testId: TestId): boolean {
  return config.absoluteDeclineTests.includes(testId);
}

function floorAtZero(config: ProjectionConfig, testId: TestId, value: number): number {
  return value < 0 && !config.allowNegativeTests.includes(testId) ? 0 : value;
}

/** Measured value for a true value. */
function observe(config: ProjectionConfig, testId: TestId, trueValue: number, rng: Rng): number {
  const cv = config.measurementCv[testId] ?? 0;
  if (config.measurementLognormal.includes(testId)) {
    if (trueValue <= 0) return 0;
    return trueValue * Math.exp(lognormalSigma(cv) * rng.gaussian());
  }
  return floorAtZero(config, testId, trueValue + Math.abs(trueValue) * cv * rng.gaussian());
}

/** One plausible true value behind a measured one. */
function infer(config: ProjectionConfig, testId: TestId, observed: number, rng: Rng): number {
  const cv = config.measurementCv[testId] ?? 0;
  if (config.measurementLognormal.includes(testId)) {
    if (observed <= 0) return 0;
    return observed / Math.exp(lognormalSigma(cv) * rng.gaussian());
  }
  return floorAtZero(config, testId, observed - Math.abs(observed) * cv * rng.gaussian());
}

function sampleRate(config: ProjectionConfig, testId: TestId, z: number): number {
  const mu = config.decline.baseRatePerDecade[testId] ?? 0;
  const cv = config.rateUncertaintyCv[testId] ?? 0;
  if (config.rateLognormal.includes(testId)) {
    return Math.exp(Math.log(mu) + lognormalSigma(cv) * z);
  }
  return Math.max(0, mu + Math.abs(mu) * cv * z);
}

function improvementFraction(config: ProjectionConfig, testId: TestId, age: number, rng: Rng): number {
  const { improvement } = config;
  if (testId === "vo2_max") {
    const [low, high] = age < improvement.vo2AgeCutoff ? improvement.vo2Under : improvement.vo2Over;
    return rng.uniform(low, high);
  }
  if (testId === "homa_ir") {
    const { median, q10, q90, min, max } = improvement.homaIrReduction;
    const sigma = (Math.log(q90) - Math.log(q10)) / (2 * Z90);
    return Math.min(max, Math.max(min, Math.exp(Math.log(median) + sigma * rng.gaussian())));
  }
  const range = improvement.ranges[testId];
  return range ? rng.uniform(range[0], range[1]) : 0;
}

function improve(value: number, fraction: number, direction: Direction, absolute: boolean): number {
  const lower = direction === "lower_is_better";
  if (absolute) return lower ? value - fraction : value + fraction;
  const better = lower === value >= 0 ? 1 - fraction : 1 + fraction;
  return value * better;
}

function practice(config: ProjectionConfig, testId: TestId, years: number, value: number): number {
  const effect = config.practiceEffect;
  if (!effect.enabled || effect.year !== years || !effect.tests.includes(testId)) return value;
  if (isAbsolute(config, testId)) return value + effect.amount;
  return value >= 0 ? value * (1 + effect.amount) : value * (1 - effect.amount);
}

/** Mean projections that moved in the improving direction by more than the tolerance. */
function sanityWarnings(config: ProjectionConfig, tests: readonly TestProjection[]): string[] {
  const { enabled, toleranceAbs, toleranceRel } = config.sanityCheck;
  if (!enabled) return [];
  const warnings: string[] = [];
  for (const t of tests) {
    if (t.baseline === null) continue;
    const baseline = t.baseline;
    const higher = getTestDefinition(t.testId).direction === "higher_is_better";
    const tolerance = Math.max(toleranceAbs, toleranceRel * Math.abs(baseline));
    for (const [years, mean] of [
      [5, t.fiveYear],
      [10, t.tenYear]
    ] as const) {
      if (mean === null) continue;
      const delta = mean - baseline;
      if (higher ? delta > tolerance : delta < -tolerance) {
        warnings.push(`${t.testId}: year ${years} mean ${mean} moved the wrong way from baseline ${baseline}`);
      }
    }
  }
  return warnings;
}

/** Tests without a baseline are carried through with null projections. */
export function projectClient(
  client: ClientRecord,
  model: ProjectionModel,
  scenario: ProjectionScenario,
  rng: Rng,
): ClientProjection {
  const { config, factor } = model;
  const tests = config.tests;
  const sums = new Map<TestId, { fiveYear: number; tenYear: number }>(
    tests.map((t) => [t, { fiveYear: 0, tenYear: 0 }])
  );

  for (let sim = 0; sim < config.simulations; sim++) {
    const z = correlatedNormals(factor, rng);

    tests.forEach((testId, i) => {
      const baseline = client.values[testId];
      const total = sums.get(testId);
      if (baseline === null || !total) return;

      const { direction } = getTestDefinition(testId);
      const absolute = isAbsolute(config, testId);
      const mu = config.decline.baseRatePerDecade[testId] ?? 0;
      const rate = sampleRate(config, testId, z[i] ?? 0);
      const postMu = config.decline.postRatePerDecade[testId];
      const postRate = postMu === undefined ? null : mu > 0 ? postMu * (rate / mu) : postMu;
      const accelerateFrom = config.decline.accelerateFromAge[testId] ?? null;
      const trueValue = infer(config, testId, baseline, rng);

      for (const years of PROJECTION_HORIZONS) {
        let value = trueValue;
        if (scenario === "improvement") {
          value = improve(value, improvementFraction(config, testId, client.age, rng), direction, absolute);
          // The intervention takes the first year; ageing covers the rest.
          value = applyDecline(value, client.age + 1, years - 1, rate, postRate, accelerateFrom, direction, absolute);
        } else {
          value = applyDecline(value, client.age, years, rate, postRate, accelerateFrom, direction, absolute);
        }
        value = practice(config, testId, years, value);
        const observed = observe(config, testId, value, rng);
        if (years === 5) total.fiveYear += observed;
        else total.tenYear += observed;
      }
    });
  }

  const projected = tests.map((testId): TestProjection => {
    const baseline = client.values[testId];
    const total = sums.get(testId);
    return {
      testId,
      baseline,
      fiveYear: baseline === null || !total ? null : total.fiveYear / config.simulations,
      tenYear: baseline === null || !total ? null : total.tenYear / config.simulations
    };
  });

  return {
    client,
    scenario,
    tests: projected,
    warnings: scenario === "decline" ? sanityWarnings(config, projected) : []
  };
}

/** Projects clients in order from one seeded stream; the same seed gives the same output. */
export function projectBatch(
  clients: readonly ClientRecord[],
  model: ProjectionModel,
  scenario: ProjectionScenario,
  seed: number,
): ClientProjection[] {
  const rng = createRng(seed);
  return clients.map((client) => projectClient(client, model, scenario, rng));
}
