export * from "./types.js";
export * from "./workbook.js";
export * from "./label-match.js";
export * from "./normative-importer.js";
export * from "./client-importer.js";
export * from "./activity-matrix-importer.js";
export * from "./persona-importer.js";
export * from "./client-template.js";
