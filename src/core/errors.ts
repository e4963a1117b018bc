/**
 * Error types shared by extractors, reconstructors and translators.
 *
 * Every error carries a stable `code` so callers can branch without
 * matching on message text.
 */

export type ErrorCode =
  | 'UNSUPPORTED_LANGUAGE'
  | 'INVALID_INPUT'
  | 'TRANSLATION_FAILED'
  | 'NETWORK_ERROR'
  | 'RATE_LIMIT_EXCEEDED'
  | 'EXTRACTION_FAILED'
  | 'UNSUPPORTED_FILE'
  | 'RECONSTRUCTION_FAILED';

export class LangshiftError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnsupportedLanguageError extends LangshiftError {
  readonly language: string;

  constructor(language: string) {
    super(`Language '${language}' is not supported`, 'UNSUPPORTED_LANGUAGE');
    this.language = language;
  }
}

export class InvalidInputError extends LangshiftError {
  constructor(message: string) {
    super(`Invalid input: ${message}`, 'INVALID_INPUT');
  }
}

export class TranslationFailedError extends LangshiftError {
  readonly translatorName: string;
  /** HTTP status, or PARSE_ERROR / EXTRACTION_ERROR / MOCK_ERROR */
  readonly errorCode?: string;

  constructor(message: string, translatorName: string, errorCode?: string) {
    super(`Translation failed: ${message}`, 'TRANSLATION_FAILED');
    this.translatorName = translatorName;
    this.errorCode = errorCode;
  }
}

export class NetworkError extends LangshiftError {
  constructor(message: string, cause?: unknown) {
    super(`Network error: ${message}`, 'NETWORK_ERROR', { cause });
  }
}

/** Reserved for backends that report quota exhaustion; nothing raises it yet. */
export class RateLimitExceededError extends LangshiftError {
  constructor() {
    super('Rate limit exceeded', 'RATE_LIMIT_EXCEEDED');
  }
}

export class ExtractionError extends LangshiftError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown, code: ErrorCode = 'EXTRACTION_FAILED') {
    super(message, code, { cause });
    this.path = path;
  }
}

export class UnsupportedFileError extends ExtractionError {
  constructor(path: string) {
    super(`No extractor supports ${path}`, path, undefined, 'UNSUPPORTED_FILE');
  }
}

export class ReconstructionError extends LangshiftError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, 'RECONSTRUCTION_FAILED', { cause });
    this.path = path;
  }
}

/**
 * Render an error for users: the underlying message plus the translator
 * that produced it, when known.
 */
export function describeError(error: unknown): string {
  if (error instanceof TranslationFailedError) {
    return `${error.message} (translator: ${error.translatorName})`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
