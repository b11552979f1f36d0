/**
 * Application errors
 *
 * Every error the HTTP layer maps to a status code extends AppError.
 * The global error handler in app.ts reads `code` and `statusCode`.
 */

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

// ═══════════════════════════════════════════════════════════════
// DATASET ERRORS
// ═══════════════════════════════════════════════════════════════

/**
 * Local dataset path could not be resolved against any candidate root
 */
export class DatasetNotFoundError extends AppError {
  readonly searched: string[];

  constructor(message: string, searched: string[]) {
    super('DATASET_NOT_FOUND', message, 404);
    this.searched = searched;
  }
}

/**
 * Transport failure while fetching a remote dataset
 */
export class DatasetFetchError extends AppError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, status?: number, cause?: unknown) {
    super('DATASET_FETCH_FAILED', message, 502, { cause });
    this.url = url;
    this.status = status;
  }
}

export class DatasetParseError extends AppError {
  constructor(source: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : 'not a JSON object';
    super('DATASET_PARSE_FAILED', `Dataset at ${source} is not valid JSON: ${reason}`, 422, { cause });
  }
}

/**
 * Any other failure while loading a dataset (e.g. unreadable file)
 */
export class DatasetLoadError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('DATASET_LOAD_FAILED', message, 400, { cause });
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super('CONFIG_INVALID', message, 500);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
