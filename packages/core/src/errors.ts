/**
 * Error taxonomy
 *
 * Every failure raised by the library extends ScreeningError.
 * Per-item vendor rejections are not errors: they are reported as data
 * on StatusResult / DownloadResult.
 */

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ScreeningError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed or missing input, detected locally before anything is sent.
 */
export class ValidationError extends ScreeningError {
  readonly issues: ValidationIssue[];

  constructor(subject: string, issues: ValidationIssue[]) {
    const detail = issues.map(issue => `[${issue.path}]: ${issue.message}`).join('; ');
    super(`Invalid ${subject}: ${detail}`);
    this.issues = issues;
  }
}

/**
 * Non-200 HTTP status, or a transport-level failure (DNS, TLS, timeout...).
 * `status` is undefined when no response was received at all.
 */
export class RequestFailed extends ScreeningError {
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, details: { status?: number; body?: string; cause?: unknown } = {}) {
    super(message, { cause: details.cause });
    this.status = details.status;
    this.body = details.body;
  }
}

/**
 * A 200 response whose body is not well-formed XML.
 */
export class ResponseParseError extends ScreeningError {
  readonly body: string;

  constructor(message: string, body: string) {
    super(message);
    this.body = body;
  }
}

export class XmlSyntaxError extends ScreeningError {
  readonly line?: number;
  readonly column?: number;

  constructor(message: string, line?: number, column?: number) {
    super(line !== undefined ? `${message} (line ${line}, column ${column ?? 0})` : message);
    this.line = line;
    this.column = column;
  }
}

export class ConfigError extends ScreeningError {}
