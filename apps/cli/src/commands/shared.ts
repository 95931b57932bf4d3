import fs from "node:fs";
import path from "node:path";
import type { ValidationError } from "@healthspan/importers";
import { UsageError } from "../lib/cli-error.js";
import type { Logger } from "../lib/logger.js";

export function requireFile(filePath: string, what: string): string {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) throw new UsageError(`${what} not found: ${resolved}`);
  return resolved;
}

export function formatValidationError(error: ValidationError): string {
  const where = error.rowNumber === null ? error.sheet : `${error.sheet} row ${error.rowNumber}`;
  return `${where}: [${error.code}] ${error.message}`;
}

export function logValidationErrors(logger: Logger, errors: readonly ValidationError[]): void {
  for (const error of errors) logger.warn(formatValidationError(error));
}
