export * from "./errors.js";
export * from "./interpolation.js";
export * from "./normative-table.js";
export * from "./config.js";
export * from "./context.js";
export * from "./metabolic-scoring.js";
export * from "./test-scoring.js";
export * from "./pillar-scoring.js";
export * from "./bfa-calculation.js";
export * from "./healthspan-index.js";
export * from "./pipeline.js";
export * from "./activity-limits.js";
export * from "./activity-assessment.js";
export * from "./random.js";
export * from "./projection.js";
