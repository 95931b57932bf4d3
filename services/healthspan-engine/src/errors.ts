/**
 * Scoring error codes.
 * Fatal errors abort a run; INVALID_CLIENT_DATA only skips the client.
 */
export const ErrorCode = {
  DATA_COMPLETENESS: "DATA_COMPLETENESS",
  REFERENCE_DATA: "REFERENCE_DATA",
  CONFIGURATION: "CONFIGURATION",
  INVALID_CLIENT_DATA: "INVALID_CLIENT_DATA",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export class ScoringError extends Error {
  readonly code: ErrorCodeType;
  readonly details: string[];

  constructor(code: ErrorCodeType, message: string, details: string[] = []) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }

  get fatal(): boolean {
    return this.code !== ErrorCode.INVALID_CLIENT_DATA;
  }
}

/** No usable reference curve for a required (test, gender) pair. */
export class DataCompletenessError extends ScoringError {
  constructor(message: string, details: string[] = []) {
    super(ErrorCode.DATA_COMPLETENESS, message, details);
  }
}

export class ReferenceDataError extends ScoringError {
  constructor(message: string, details: string[] = []) {
    super(ErrorCode.REFERENCE_DATA, message, details);
  }
}

export class ConfigurationError extends ScoringError {
  constructor(message: string, details: string[] = []) {
    super(ErrorCode.CONFIGURATION, message, details);
  }
}

export class InvalidClientDataError extends ScoringError {
  readonly clientName: string;

  constructor(clientName: string, details: string[]) {
    super(ErrorCode.INVALID_CLIENT_DATA, `Invalid client record: ${clientName}`, details);
    this.clientName = clientName;
  }
}
