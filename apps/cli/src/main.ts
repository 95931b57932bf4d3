import path from "node:path";
import { parseArgs } from "node:util";
import { z } from "zod";
import { projectionScenarios, type ProjectionScenario } from "@healthspan/healthspan-engine";
import { runActivities } from "./commands/activities.js";
import { runBfa } from "./commands/bfa.js";
import { isProjectionScenario, runProject } from "./commands/project.js";
import { runTemplate } from "./commands/template.js";
import { ExitCode, UsageError, describeError, exitCodeFor, type ExitCodeType } from "./lib/cli-error.js";
import type { CliEnv } from "./lib/env.js";
import { consoleSink, createLogger, type LogSink } from "./lib/logger.js";

export const USAGE = `Usage:
  healthspan bfa <clients.xlsx> [-n normative.xlsx] [-c config.json] [-o out.csv|out.xlsx] [-v]
  healthspan activities --clients <persona.xlsx> --limits <limits.xlsx> --classifications <classes.xlsx>
                        [-c config.json] [-o out.xlsx] [-v]
  healthspan project <clients.xlsx> [-c config.json] [--out-dir dir] [--seed n] [--simulations n]
                     [--scenario decline|improvement]
  healthspan template [output.xlsx]

Environment:
  HEALTHSPAN_NORMATIVE_DB  default normative workbook
  HEALTHSPAN_CONFIG        default JSON configuration override
  HEALTHSPAN_OUTPUT_DIR    directory for default report paths
  LOG_LEVEL                debug | info | warn | error`;

export const DEFAULT_NORMATIVE_DB = "Normative Database.xlsx";

function parseCommandLine(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        normative: { type: "string", short: "n" },
        config: { type: "string", short: "c" },
        output: { type: "string", short: "o" },
        clients: { type: "string" },
        limits: { type: "string" },
        classifications: { type: "string" },
        "out-dir": { type: "string" },
        seed: { type: "string" },
        simulations: { type: "string" },
        scenario: { type: "string" },
        verbose: { type: "boolean", short: "v" },
        help: { type: "boolean", short: "h" }
      }
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

function required(value: string | undefined, flag: string): string {
  if (!value) throw new UsageError(`Missing ${flag}`);
  return value;
}

const seedSchema = z.coerce.number().int().nonnegative().max(2 ** 32 - 1);
const simulationsSchema = z.coerce.number().int().positive();

function optionalNumber(schema: z.ZodNumber, value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = schema.safeParse(value);
  if (!parsed.success) throw new UsageError(`Invalid ${flag}: ${value}`);
  return parsed.data;
}

function scenariosFrom(value: string | undefined): ProjectionScenario[] {
  if (value === undefined) return [...projectionScenarios];
  if (!isProjectionScenario(value)) throw new UsageError(`Unknown scenario: ${value}`);
  return [value];
}

export function main(argv: readonly string[], env: CliEnv, sink: LogSink = consoleSink): ExitCodeType {
  let logger = createLogger("healthspan", env.logLevel, sink);
  try {
    const { values, positionals } = parseCommandLine(argv);
    if (values.verbose) logger = createLogger("healthspan", "debug", sink);

    const [command, ...rest] = positionals;
    if (values.help) {
      console.log(USAGE);
      return ExitCode.OK;
    }
    const outputDir = env.outputDir ?? "output";

    switch (command) {
      case "bfa": {
        const [clientsPath] = rest;
        const summary = runBfa(
          {
            clientsPath: required(clientsPath, "client workbook argument"),
            normativePath: values.normative ?? env.normativeDb ?? DEFAULT_NORMATIVE_DB,
            configPath: values.config ?? env.config,
            outputPath: values.output ?? path.join(outputDir, "bfa_results.csv")
          },
          logger.child("bfa")
        );
        return summary.scored > 0 ? ExitCode.OK : ExitCode.FAILURE;
      }
      case "activities": {
        const summary = runActivities(
          {
            clientsPath: required(values.clients, "--clients"),
            limitsPath: required(values.limits, "--limits"),
            classificationsPath: required(values.classifications, "--classifications"),
            configPath: values.config ?? env.config,
            outputPath: values.output ?? path.join(outputDir, "activity_report.xlsx")
          },
          logger.child("activities")
        );
        return summary.outputPath === null ? ExitCode.FAILURE : ExitCode.OK;
      }
      case "project": {
        const [clientsPath] = rest;
        const summary = runProject(
          {
            clientsPath: required(clientsPath, "client workbook argument"),
            configPath: values.config ?? env.config,
            outputDir: values["out-dir"] ?? outputDir,
            scenarios: scenariosFrom(values.scenario),
            seed: optionalNumber(seedSchema, values.seed, "--seed"),
            simulations: optionalNumber(simulationsSchema, values.simulations, "--simulations")
          },
          logger.child("project")
        );
        return summary.outputs.length > 0 ? ExitCode.OK : ExitCode.FAILURE;
      }
      case "template": {
        const [outputPath] = rest;
        runTemplate(outputPath ?? values.output ?? "client_template.xlsx", logger.child("template"));
        return ExitCode.OK;
      }
      case undefined:
        throw new UsageError("Missing command");
      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } catch (err) {
    for (const line of describeError(err)) logger.error(line);
    if (err instanceof UsageError) console.error(USAGE);
    return exitCodeFor(err);
  }
}
