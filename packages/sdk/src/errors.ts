/**
 * Error types for Game Data Finder operations
 *
 * Invariants:
 * - Searching never throws; errors only arise while loading data or building an index
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all Game Data Finder errors
 */
export abstract class GameDataError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a dataset file does not exist
 */
export class DatasetNotFoundError extends GameDataError {
  readonly code = "ENOENT";

  constructor(
    public readonly filePath: string,
    options?: ErrorOptions & { isDefault?: boolean }
  ) {
    super(
      options?.isDefault
        ? `Default dataset '${filePath}' not found in current directory. Use --file or GDFIND_DATA_FILE to specify a data source.`
        : `Dataset not found: ${filePath}`,
      options
    );
  }
}

/**
 * Thrown when a dataset file exists but cannot be read
 */
export class DatasetReadError extends GameDataError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read dataset: ${filePath}`, options);
  }
}

/**
 * Thrown when a dataset is not valid JSON or does not have the expected shape
 */
export class DatasetFormatError extends GameDataError {
  readonly code = "FORMAT_ERROR";

  constructor(
    source: string,
    public readonly issues: string[] = [],
    options?: ErrorOptions
  ) {
    super(
      issues.length > 0
        ? `Invalid dataset in ${source}: ${issues.join("; ")}`
        : `Invalid dataset in ${source}`,
      options
    );
  }
}

/**
 * Thrown when an asynchronous index build is cancelled through its AbortSignal
 */
export class IndexBuildAbortedError extends GameDataError {
  readonly code = "ABORTED";

  constructor(
    public readonly processed: number,
    public readonly total: number,
    options?: ErrorOptions
  ) {
    super(`Index build aborted after ${processed} of ${total} records`, options);
  }
}
