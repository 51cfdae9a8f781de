/**
 * Shared pieces of the data source adapters.
 */

export interface SourceOptions {
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  /** Clock used for "yesterday" windows */
  now?: () => Date;
  timeZone?: string;
}

/**
 * A known condition that prevents a source from producing its summary,
 * e.g. an expired token or a rejected login.
 */
export class SourceFetchError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(message);
    this.name = 'SourceFetchError';
    this.source = source;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Round to one decimal place.
 */
export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}
