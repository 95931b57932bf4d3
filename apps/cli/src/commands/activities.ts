import { assessPersonaClient, type PersonaAssessment } from "@healthspan/healthspan-engine";
import { parseActivityMatrices, parsePersonaWorkbook } from "@healthspan/importers";
import { readConfigOverrides, resolveActivityConfig } from "../lib/config.js";
import type { Logger } from "../lib/logger.js";
import { writeActivityReport } from "../report/activity-report.js";
import { logValidationErrors, requireFile } from "./shared.js";

export type ActivitiesOptions = {
  clientsPath: string;
  limitsPath: string;
  classificationsPath: string;
  configPath?: string;
  outputPath: string;
};

export type ActivitiesRunSummary = {
  clients: number;
  activities: number;
  outputPath: string | null;
};

export function runActivities(options: ActivitiesOptions, logger: Logger): ActivitiesRunSummary {
  const clientsPath = requireFile(options.clientsPath, "Persona workbook");
  const limitsPath = requireFile(options.limitsPath, "Limits matrix");
  const classificationsPath = requireFile(options.classificationsPath, "Classifications matrix");

  const config = resolveActivityConfig(readConfigOverrides(options.configPath));

  const matrix = parseActivityMatrices(limitsPath, classificationsPath);
  logValidationErrors(logger, matrix.errors);
  logger.info(`${matrix.rules.length} activities across ${matrix.testColumns.length} test columns`);

  const personas = parsePersonaWorkbook(clientsPath);
  logValidationErrors(logger, personas.errors);

  const assessments: PersonaAssessment[] = [];
  for (const client of personas.clients) {
    if (client.gender === null) {
      logger.warn(`${client.name}: gender not recognised, gender-tagged limits fall back to the easier value`);
    }
    const assessment = assessPersonaClient(client, matrix.rules, config);
    const red = assessment.activities.filter((a) => a.tenYear.status === "RED").length;
    logger.info(`${client.name}: ${assessment.activities.length} activities, ${red} RED at 10 years`);
    assessments.push(assessment);
  }

  if (assessments.length === 0 || matrix.rules.length === 0) {
    logger.error("Nothing to assess");
    return { clients: assessments.length, activities: matrix.rules.length, outputPath: null };
  }

  writeActivityReport(assessments, config.report, options.outputPath);
  logger.info(`Wrote activity report to ${options.outputPath}`);
  return { clients: assessments.length, activities: matrix.rules.length, outputPath: options.outputPath };
}
