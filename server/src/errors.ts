export type SurveyErrorCode =
  | 'CATALOG_FETCH_FAILED'
  | 'CATALOG_PARSE_FAILED'
  | 'CATALOG_FILE_UNREADABLE'
  | 'TARGET_FILE_INVALID';

export class SurveyError extends Error {
  readonly code: SurveyErrorCode;

  constructor(code: SurveyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class CatalogFetchError extends SurveyError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super('CATALOG_FETCH_FAILED', message, { cause: options?.cause });
    this.status = options?.status;
  }
}

export class CatalogParseError extends SurveyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CATALOG_PARSE_FAILED', message, options);
  }
}

export class CatalogFileError extends SurveyError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super('CATALOG_FILE_UNREADABLE', `${filePath}: ${message}`, options);
    this.filePath = filePath;
  }
}

/** Missing file, missing column or a malformed row in a targets file. */
export class TargetFileError extends SurveyError {
  readonly filePath: string;
  readonly line?: number;

  constructor(filePath: string, message: string, options?: { line?: number; cause?: unknown }) {
    const where = options?.line !== undefined ? `${filePath}:${options.line}` : filePath;
    super('TARGET_FILE_INVALID', `${where}: ${message}`, { cause: options?.cause });
    this.filePath = filePath;
    this.line = options?.line;
  }
}
