export * from "./tests.js";
export * from "./schemas.js";
