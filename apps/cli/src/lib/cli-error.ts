import { ScoringError } from "@healthspan/healthspan-engine";

/**
 * Process exit codes.
 * FAILURE covers fatal scoring errors and runs where no client could be scored.
 */
export const ExitCode = {
  OK: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

export type ExitCodeType = (typeof ExitCode)[keyof typeof ExitCode];

/** Bad arguments or a missing input path. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function exitCodeFor(error: unknown): ExitCodeType {
  return error instanceof UsageError ? ExitCode.USAGE : ExitCode.FAILURE;
}

/** One line per error, ScoringError details indented below it. */
export function describeError(error: unknown): string[] {
  if (error instanceof ScoringError) {
    return [`[${error.code}] ${error.message}`, ...error.details.map((d) => `  - ${d}`)];
  }
  if (error instanceof Error) return [error.message];
  return [String(error)];
}
