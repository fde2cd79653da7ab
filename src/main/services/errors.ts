/**
 * Custom Error Classes for tubetagger
 *
 * Provides categorized error types for each processing step, so per-item
 * failures can be logged and recorded in the failure report with context.
 */

import type { PipelineStep } from '../../shared/types';

/**
 * Error categories matching the processing pipeline steps.
 */
export type ErrorCategory =
  | 'DownloadError'
  | 'FetchError'
  | 'TagWriteError'
  | 'PlacementError'
  | 'ConfigurationError';

/** Context accepted by every PipelineError constructor */
export interface PipelineErrorOptions {
  /** Source URL of the work item being processed (if applicable) */
  url?: string;
  /** Processing step where the error occurred */
  step?: PipelineStep;
  /** The original error that caused this error (if wrapping) */
  cause?: Error;
}

/**
 * Base class for all pipeline errors.
 * Extends the native Error class with additional context fields.
 */
export class PipelineError extends Error {
  /** Error category for classification */
  readonly category: ErrorCategory;
  /** Source URL being processed when the error occurred (if applicable) */
  readonly url: string | null;
  /** The processing step where the error occurred */
  readonly step: PipelineStep;
  /** The original error that caused this error (if wrapping) */
  readonly cause: Error | null;

  constructor(message: string, category: ErrorCategory, options?: PipelineErrorOptions) {
    super(message);
    this.name = category;
    this.category = category;
    this.url = options?.url ?? null;
    this.step = options?.step ?? 'unknown';
    this.cause = options?.cause ?? null;

    // Ensure prototype chain works correctly
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Returns a user-facing error message (no stack traces).
   */
  toUserMessage(): string {
    const urlInfo = this.url ? ` [${this.url}]` : '';
    return `${this.category}${urlInfo}: ${this.message}`;
  }
}

/** Reasons a download can fail, derived from the downloader's diagnostics */
export type DownloadFailureReason =
  | 'UNAVAILABLE'
  | 'PRIVATE'
  | 'AGE_RESTRICTED'
  | 'UNSUPPORTED_URL'
  | 'NO_AUDIO_OUTPUT'
  | 'INVALID_CONTAINER'
  | 'DOWNLOAD_FAILED';

/**
 * Error thrown when a source URL cannot be turned into a playable audio file.
 * Examples: unreachable URL, removed video, private or age-restricted content.
 */
export class DownloadError extends PipelineError {
  readonly reason: DownloadFailureReason;

  constructor(
    message: string,
    options?: PipelineErrorOptions & { reason?: DownloadFailureReason },
  ) {
    super(message, 'DownloadError', { step: 'downloading', ...options });
    this.reason = options?.reason ?? 'DOWNLOAD_FAILED';
  }
}

/**
 * Error thrown when a cover image cannot be fetched.
 * Never fails an item; the resolver degrades to "no cover".
 */
export class FetchError extends PipelineError {
  /** HTTP status code (if applicable) */
  readonly statusCode: number | null;

  constructor(message: string, options?: PipelineErrorOptions & { statusCode?: number }) {
    super(message, 'FetchError', { step: 'fetching_cover', ...options });
    this.statusCode = options?.statusCode ?? null;
  }
}

/**
 * Error thrown when tags cannot be written into the audio container.
 * Examples: unsupported container, corrupt file, disk full.
 */
export class TagWriteError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'TagWriteError', { step: 'tagging', ...options });
  }
}

/**
 * Error thrown when a finished file cannot be moved to its destination.
 * Examples: local copy failure, scp exit status other than zero.
 */
export class PlacementError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'PlacementError', { step: 'placing', ...options });
  }
}

/**
 * Error raised before a batch starts: bad batch file, no work items,
 * missing external tools or settings. Fatal for the process.
 */
export class ConfigurationError extends PipelineError {
  constructor(message: string, options?: PipelineErrorOptions) {
    super(message, 'ConfigurationError', { step: 'configuration', ...options });
  }
}

/**
 * Type guard to check if an error is a PipelineError.
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Extracts a message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wraps a generic error in the appropriate PipelineError category.
 * If the error is already a PipelineError, it is returned as-is.
 *
 * @param error - The error to wrap
 * @param category - The error category to use
 * @param options - Additional context
 * @returns A PipelineError instance
 */
export function wrapError(
  error: unknown,
  category: ErrorCategory,
  options?: Omit<PipelineErrorOptions, 'cause'>,
): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  const message = cause.message || 'Unknown error';

  switch (category) {
    case 'DownloadError':
      return new DownloadError(message, { ...options, cause });
    case 'FetchError':
      return new FetchError(message, { ...options, cause });
    case 'TagWriteError':
      return new TagWriteError(message, { ...options, cause });
    case 'PlacementError':
      return new PlacementError(message, { ...options, cause });
    case 'ConfigurationError':
      return new ConfigurationError(message, { ...options, cause });
  }
}
