import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import { LOG_LEVELS } from "./logger.js";

export function bootstrapEnv() {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [
    path.resolve(process.cwd(), ".env"),
    path.resolve(process.cwd(), "../../.env"),
    path.resolve(here, "../../../../.env"),
  ];

  for (const envPath of candidates) {
    if (!fs.existsSync(envPath)) continue;
    loadEnv({ path: envPath, override: false });
    return;
  }
}

const optionalPath = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const envSchema = z.object({
  HEALTHSPAN_NORMATIVE_DB: optionalPath,
  HEALTHSPAN_CONFIG: optionalPath,
  HEALTHSPAN_OUTPUT_DIR: optionalPath,
  LOG_LEVEL: z
    .string()
    .optional()
    .transform((value) => value?.trim().toLowerCase())
    .pipe(z.enum(LOG_LEVELS).catch("info"))
});

export type CliEnv = {
  normativeDb: string | undefined;
  config: string | undefined;
  outputDir: string | undefined;
  logLevel: (typeof LOG_LEVELS)[number];
};

/** Unknown LOG_LEVEL values fall back to info. */
export function readEnv(env: NodeJS.ProcessEnv = process.env): CliEnv {
  const parsed = envSchema.parse(env);
  return {
    normativeDb: parsed.HEALTHSPAN_NORMATIVE_DB,
    config: parsed.HEALTHSPAN_CONFIG,
    outputDir: parsed.HEALTHSPAN_OUTPUT_DIR,
    logLevel: parsed.LOG_LEVEL
  };
}
