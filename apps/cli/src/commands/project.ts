import path from "node:path";
import {
  buildProjectionModel,
  projectBatch,
  projectionScenarios,
  type ProjectionScenario
} from "@healthspan/healthspan-engine";
import { parseClientWorkbook } from "@healthspan/importers";
import { readConfigOverrides, resolveProjectionSettings } from "../lib/config.js";
import type { Logger } from "../lib/logger.js";
import { writeProjectionReport } from "../report/projection-report.js";
import { logValidationErrors, requireFile } from "./shared.js";

export type ProjectOptions = {
  clientsPath: string;
  configPath?: string;
  outputDir: string;
  scenarios: readonly ProjectionScenario[];
  seed?: number;
  simulations?: number;
};

export type ProjectRunSummary = {
  clients: number;
  seed: number;
  outputs: string[];
};

export function projectionFileName(scenario: ProjectionScenario): string {
  return `projection_${scenario}.xlsx`;
}

export function isProjectionScenario(value: string): value is ProjectionScenario {
  return projectionScenarios.some((s) => s === value);
}

/**
 * Simulate 5- and 10-year projections for every client in a workbook and
 * write one persona workbook per scenario. Each scenario restarts the
 * random stream from the same seed.
 */
export function runProject(options: ProjectOptions, logger: Logger): ProjectRunSummary {
  const clientsPath = requireFile(options.clientsPath, "Client workbook");
  const settings = resolveProjectionSettings(readConfigOverrides(options.configPath));
  const config = { ...settings, simulations: options.simulations ?? settings.simulations };
  const seed = options.seed ?? config.seed ?? Date.now() % 2 ** 32;
  logger.info(`Projecting with ${config.simulations} simulations, seed ${seed}`);

  const parsed = parseClientWorkbook(clientsPath);
  logValidationErrors(logger, parsed.errors);
  if (parsed.clients.length === 0) {
    logger.error("No clients to project");
    return { clients: 0, seed, outputs: [] };
  }

  const model = buildProjectionModel(config);
  const outputs: string[] = [];
  for (const scenario of options.scenarios) {
    const projections = projectBatch(parsed.clients, model, scenario, seed);
    for (const projection of projections) {
      for (const warning of projection.warnings) logger.warn(`${projection.client.name}: ${warning}`);
      logger.debug(`${scenario}: ${projection.client.name}`);
    }
    const outputPath = path.join(options.outputDir, projectionFileName(scenario));
    writeProjectionReport(projections, outputPath);
    logger.info(`Wrote ${projections.length} ${scenario} projection(s) to ${outputPath}`);
    outputs.push(outputPath);
  }
  return { clients: parsed.clients.length, seed, outputs };
}
