import { writeClientTemplate } from "@healthspan/importers";
import type { Logger } from "../lib/logger.js";

export function runTemplate(outputPath: string, logger: Logger): string {
  writeClientTemplate(outputPath);
  logger.info(`Wrote client template to ${outputPath}`);
  return outputPath;
}
