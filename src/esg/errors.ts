/**
 * Error taxonomy for the ESG fetch pipeline.
 *
 * Input, write and config errors are fatal and propagate to the CLI.
 * Rate limit, network and missing-data errors are per ticker: the client
 * returns them as values and the runner turns them into log lines.
 */

export type EsgErrorKind =
  | 'InputNotFound'
  | 'EmptyInput'
  | 'RateLimited'
  | 'NetworkError'
  | 'NoEsgData'
  | 'WriteError'
  | 'ConfigError';

export abstract class EsgError extends Error {
  abstract readonly kind: EsgErrorKind;

  constructor(message: string, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = new.target.name;
  }
}

export class InputNotFoundError extends EsgError {
  readonly kind = 'InputNotFound' as const;

  constructor(public path: string) {
    super(`Ticker input file not found: ${path}`);
  }
}

export class EmptyInputError extends EsgError {
  readonly kind = 'EmptyInput' as const;

  constructor(public path: string) {
    super(`Ticker input file contains no tickers: ${path}`);
  }
}

export class RateLimitedError extends EsgError {
  readonly kind = 'RateLimited' as const;

  constructor(
    public ticker: string,
    public attempts: number
  ) {
    super(`Rate limited for ${ticker} after ${attempts} attempts`);
  }
}

export class NetworkError extends EsgError {
  readonly kind = 'NetworkError' as const;

  constructor(
    message: string,
    public ticker: string,
    public status: number | null = null,
    cause?: Error
  ) {
    super(message, cause);
  }
}

export class NoEsgDataError extends EsgError {
  readonly kind = 'NoEsgData' as const;

  constructor(public ticker: string) {
    super(`No ESG data available for ${ticker}`);
  }
}

export class WriteError extends EsgError {
  readonly kind = 'WriteError' as const;

  constructor(
    public path: string,
    cause?: Error
  ) {
    super(`Failed to write ESG output to ${path}${cause ? `: ${cause.message}` : ''}`, cause);
  }
}

export class ConfigError extends EsgError {
  readonly kind = 'ConfigError' as const;
}

/** Failures that skip a single ticker without stopping the run. */
export type EsgFetchError = RateLimitedError | NetworkError | NoEsgDataError;

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
