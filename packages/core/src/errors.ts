export class AirQualityError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AirQualityError';
  }
}

export class SchemaMismatchError extends AirQualityError {
  readonly code = 'SCHEMA_MISMATCH';
  readonly field: string | null;

  constructor(message: string, field: string | null = null) {
    super(message);
    this.name = 'SchemaMismatchError';
    this.field = field;
  }
}

export class BreakpointTableMissingError extends AirQualityError {
  readonly code = 'BREAKPOINT_TABLE_MISSING';
  readonly pollutantCode: string;

  constructor(pollutantCode: string) {
    super(`No breakpoint table is configured for pollutant ${pollutantCode}`);
    this.name = 'BreakpointTableMissingError';
    this.pollutantCode = pollutantCode;
  }
}

export class StoreUnavailableError extends AirQualityError {
  readonly code = 'STORE_UNAVAILABLE';

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'StoreUnavailableError';
  }
}

export class TimeoutError extends AirQualityError {
  readonly code = 'TIMEOUT';
  readonly phase: 'extraction' | 'store';
  readonly timeoutMs: number;

  constructor(phase: 'extraction' | 'store', timeoutMs: number) {
    super(`${phase === 'store' ? 'Store' : 'Extraction'} I/O exceeded ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.phase = phase;
    this.timeoutMs = timeoutMs;
  }
}

export class RunLockUnavailableError extends AirQualityError {
  readonly code = 'RUN_LOCK_UNAVAILABLE';
  readonly holder: string;

  constructor(lockName: string, holder: string, expiresAt: string) {
    super(`Run lock ${lockName} is held by ${holder} until ${expiresAt}`);
    this.name = 'RunLockUnavailableError';
    this.holder = holder;
  }
}

export class RunCancelledError extends AirQualityError {
  readonly code = 'RUN_CANCELLED';

  constructor(stage: string) {
    super(`Run cancelled during ${stage}`);
    this.name = 'RunCancelledError';
  }
}

export class ConfigurationError extends AirQualityError {
  readonly code = 'INVALID_CONFIGURATION';
  readonly issues: unknown;

  constructor(message: string, issues: unknown = null) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
