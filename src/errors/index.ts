/**
 * Error taxonomy for the dispatch core.
 *
 * Configuration and mode errors are fatal to a run. Malformed list entries are
 * deferred: they travel with the affected sample and fail only that unit.
 */

export abstract class PipelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PipelineError";
  }

  /**
   * Format the error as a single diagnostic line.
   */
  format(): string {
    return `${this.name}: ${this.message}`;
  }
}

/**
 * A configuration or sample-list file could not be read.
 */
export class MissingFileError extends PipelineError {
  public readonly path: string;

  constructor(path: string, reason?: string) {
    super(reason ? `cannot read ${path} (${reason})` : `cannot read ${path}`);
    this.name = "MissingFileError";
    this.path = path;
  }
}

/**
 * Required configuration is absent, or a config line asks for something the
 * loader refuses to do.
 */
export class ValidationError extends PipelineError {
  /** Names of the offending config fields */
  public readonly fields: readonly string[];

  constructor(message: string, fields: readonly string[]) {
    super(message);
    this.name = "ValidationError";
    this.fields = fields;
  }
}

/**
 * A sample-list line that cannot produce a launchable unit.
 */
export class MalformedListEntryError extends PipelineError {
  public readonly listPath: string;
  public readonly lineNumber: number;

  constructor(listPath: string, lineNumber: number, message: string) {
    super(`${listPath}:${lineNumber}: ${message}`);
    this.name = "MalformedListEntryError";
    this.listPath = listPath;
    this.lineNumber = lineNumber;
  }
}
