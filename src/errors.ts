/**
 * Error taxonomy for docsurvey
 * Only configuration errors and a missing scan root are fatal to a run
 */

export const ErrorCode = {
  CONFIGURATION: 'CONFIGURATION',
  SCAN: 'SCAN',
  EXTRACTION: 'EXTRACTION',
  UNSUPPORTED_FORMAT: 'UNSUPPORTED_FORMAT',
  PROVIDER: 'PROVIDER',
  REPORT_WRITE: 'REPORT_WRITE',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for all docsurvey errors
 */
export class DocsurveyError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DocsurveyError';
  }
}

/**
 * Invalid detection level, malformed config file, unknown provider reference
 */
export class ConfigurationError extends DocsurveyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.CONFIGURATION, message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Unreadable directory or permission denial during traversal
 */
export class ScanError extends DocsurveyError {
  constructor(
    public readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(ErrorCode.SCAN, message, options);
    this.name = 'ScanError';
  }
}

/**
 * Corrupt or unreadable document
 */
export class ExtractionError extends DocsurveyError {
  constructor(
    public readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(ErrorCode.EXTRACTION, message, options);
    this.name = 'ExtractionError';
  }
}

/**
 * No extractor is registered for the file's extension
 */
export class UnsupportedFormatError extends DocsurveyError {
  constructor(
    public readonly path: string,
    public readonly extension: string
  ) {
    super(ErrorCode.UNSUPPORTED_FORMAT, `No extractor available for ${extension || '(no extension)'} files`);
    this.name = 'UnsupportedFormatError';
  }
}

export type ProviderErrorKind = 'transient' | 'permanent';

/**
 * Failure reported by an AI provider adapter
 * Transient failures are retried, permanent ones advance the fallback chain
 */
export class ProviderError extends DocsurveyError {
  constructor(
    public readonly provider: string,
    public readonly kind: ProviderErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(ErrorCode.PROVIDER, message, options);
    this.name = 'ProviderError';
  }
}

/**
 * A single report file could not be written
 */
export class ReportWriteError extends DocsurveyError {
  constructor(
    public readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(ErrorCode.REPORT_WRITE, message, options);
    this.name = 'ReportWriteError';
  }
}

/**
 * Extract a readable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}
