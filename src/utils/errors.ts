/**
 * Typed errors for the conversion pipeline. Callers dispatch on
 * `instanceof` or on the fixed `code`.
 */

export type ReportErrorCode =
  | 'INVALID_ROOT'
  | 'EXPORT_FILE_UNREADABLE'
  | 'EXPORT_FILE_MALFORMED'
  | 'TIMESTAMP_UNPARSEABLE';

export class ReportError extends Error {
  readonly code: ReportErrorCode;

  constructor(message: string, code: ReportErrorCode) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
  }
}

export class InvocationError extends ReportError {
  readonly rootDir: string;

  constructor(rootDir: string) {
    super(`'${rootDir}' is not a directory or cannot be accessed.`, 'INVALID_ROOT');
    this.rootDir = rootDir;
  }
}

export class ExportFileError extends ReportError {
  readonly filePath: string;

  constructor(
    filePath: string,
    reason: string,
    code: 'EXPORT_FILE_UNREADABLE' | 'EXPORT_FILE_MALFORMED' = 'EXPORT_FILE_MALFORMED'
  ) {
    super(`${filePath}: ${reason}`, code);
    this.filePath = filePath;
  }
}

export class TimestampParseError extends ReportError {
  readonly raw: string;
  readonly filePath?: string;

  constructor(raw: string, filePath?: string) {
    super(TimestampParseError.describe(raw, filePath), 'TIMESTAMP_UNPARSEABLE');
    this.raw = raw;
    this.filePath = filePath;
  }

  /**
   * Attach the source file once it is known
   */
  withFile(filePath: string): TimestampParseError {
    return new TimestampParseError(this.raw, filePath);
  }

  private static describe(raw: string, filePath?: string): string {
    const base = `Unrecognized timestamp "${raw}"`;
    return filePath ? `${base} in ${filePath}` : base;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
