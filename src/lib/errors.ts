/**
 * Newsdesk — Error Types
 *
 * FetchError is collected per feed and never thrown past the aggregator.
 * ConfigurationError and ValidationError abort before any fetch starts.
 */

import type { FeedSource, FetchErrorKind } from '../types';

/**
 * One feed failed to download or parse.
 */
export class FetchError extends Error {
  readonly source: FeedSource;
  readonly kind: FetchErrorKind;
  override readonly cause: unknown;

  constructor(source: FeedSource, kind: FetchErrorKind, cause: unknown) {
    super(`${source.name}: ${describeCause(kind, cause)}`);
    this.name = 'FetchError';
    this.source = source;
    this.kind = kind;
    this.cause = cause;
  }
}

/**
 * The configuration file is missing, unreadable or invalid.
 */
export class ConfigurationError extends Error {
  readonly configKey?: string;

  constructor(message: string, configKey?: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.configKey = configKey;
  }
}

/**
 * Structurally invalid input handed to the pipeline.
 */
export class ValidationError extends Error {
  readonly field: string;

  constructor(message: string, field: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function describeCause(kind: FetchErrorKind, cause: unknown): string {
  switch (kind) {
    case 'timeout':
      return `timed out (${errorMessage(cause)})`;
    case 'cancelled':
      return 'cancelled before completion';
    default:
      return errorMessage(cause);
  }
}
