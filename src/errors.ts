/**
 * Error taxonomy shared by the index, ingestion, crawler and loaders.
 *
 * Per-item operations (one URL, one file, one document of a batch) return a
 * {@link Result} and the caller skips the item; whole-pipeline operations
 * (opening the index, a single embedding call) throw.
 */

export type Result<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

export class SupportAgentError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends SupportAgentError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

export class DimensionMismatchError extends SupportAgentError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    context = 'vector'
  ) {
    super(
      `Dimension mismatch for ${context}: expected ${expected}, got ${actual}`
    );
  }
}

export class StorageError extends SupportAgentError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`${message} (${path})`, options);
  }
}

export class EmbeddingError extends SupportAgentError {}

export type IngestionStage = 'chunk' | 'embed' | 'index';

export class IngestionError extends SupportAgentError {
  constructor(
    message: string,
    public readonly stage: IngestionStage,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export type FetchErrorKind =
  | 'invalid-url'
  | 'timeout'
  | 'network'
  | 'http'
  | 'content-type'
  | 'render';

export class FetchError extends SupportAgentError {
  readonly status?: number;

  constructor(
    message: string,
    public readonly url: string,
    public readonly kind: FetchErrorKind,
    options?: { cause?: unknown; status?: number }
  ) {
    super(`Failed to fetch ${url}: ${message}`, options);
    this.status = options?.status;
  }
}

export type ExtractionErrorKind =
  | 'missing-file'
  | 'encrypted'
  | 'invalid-pdf'
  | 'invalid-html'
  | 'unknown';

export class ExtractionError extends SupportAgentError {
  constructor(
    message: string,
    public readonly source: string,
    public readonly kind: ExtractionErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class LlmError extends SupportAgentError {}

export class FeedbackError extends SupportAgentError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}
