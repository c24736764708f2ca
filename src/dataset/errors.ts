/**
 * Raised when an IANA identifier has no Windows counterpart in the dataset
 */
export class UnknownTimezoneError extends Error {
  readonly timeZone: string;

  constructor(timeZone: string) {
    super(`Unknown timezone: ${timeZone}`);
    this.name = "UnknownTimezoneError";
    this.timeZone = timeZone;
  }
}

/**
 * Raised when the compiled dataset artifact is missing or malformed
 */
export class DatasetUnavailableError extends Error {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Windows zones dataset unavailable at ${path}: ${reason}`);
    this.name = "DatasetUnavailableError";
    this.path = path;
  }
}

export type BuildStage = "config" | "fetch" | "parse" | "validate" | "emit";

/**
 * Failure of one stage of the dataset build, always fatal
 */
export class DatasetBuildError extends Error {
  readonly stage: BuildStage;

  constructor(stage: BuildStage, message: string, options?: { cause?: unknown }) {
    super(`[${stage}] ${message}`, options);
    this.name = "DatasetBuildError";
    this.stage = stage;
  }
}
