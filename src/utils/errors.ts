export type AnalysisErrorKind =
  | 'NoNetwork'
  | 'NoAPIKey'
  | 'Timeout'
  | 'ProviderError'
  | 'MalformedResponse'
  | 'CacheVersionMismatch'
  | 'InvalidCacheContent';

export class AnalysisError extends Error {
  constructor(
    public readonly kind: AnalysisErrorKind,
    message: string,
    public readonly code?: number
  ) {
    super(message);
    this.name = 'AnalysisError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NoNetworkError extends AnalysisError {
  constructor(message: string = 'No internet connection') {
    super('NoNetwork', message);
    this.name = 'NoNetworkError';
  }
}

export class NoApiKeyError extends AnalysisError {
  constructor(provider: string) {
    super('NoAPIKey', `No API key configured for provider "${provider}"`);
    this.name = 'NoApiKeyError';
  }
}

export class ProviderTimeoutError extends AnalysisError {
  constructor(message: string = 'Provider request timed out') {
    super('Timeout', message);
    this.name = 'ProviderTimeoutError';
  }
}

export class ProviderError extends AnalysisError {
  constructor(code: number, message: string = `Provider responded with status ${code}`) {
    super('ProviderError', message, code);
    this.name = 'ProviderError';
  }
}

export class MalformedResponseError extends AnalysisError {
  constructor(message: string = 'Provider reply did not contain a JSON object') {
    super('MalformedResponse', message);
    this.name = 'MalformedResponseError';
  }
}

export class CacheVersionMismatchError extends AnalysisError {
  constructor(found: unknown, expected: number) {
    super('CacheVersionMismatch', `Cache version ${String(found)} does not match ${expected}`);
    this.name = 'CacheVersionMismatchError';
  }
}

export class InvalidCacheContentError extends AnalysisError {
  constructor(message: string = 'Cached snapshot is malformed or empty') {
    super('InvalidCacheContent', message);
    this.name = 'InvalidCacheContentError';
  }
}

export function isAnalysisError(error: unknown): error is AnalysisError {
  return error instanceof AnalysisError;
}

/**
 * Extract an HTTP status from SDK errors, which expose it as `status`.
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** True for filesystem errors caused by a missing path */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
