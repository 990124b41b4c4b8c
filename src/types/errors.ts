export abstract class AppError extends Error {
  abstract readonly exitCode: number;
  abstract readonly fatal: boolean;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends AppError {
  readonly exitCode = 1;
  readonly fatal = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Configuration Error: ${message}`, context);
  }
}

export class InputError extends AppError {
  readonly exitCode = 1;
  readonly fatal = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Input Error: ${message}`, context);
  }
}

/** A single saved page could not be read or decoded; the run carries on without it. */
export class PageLoadError extends AppError {
  readonly exitCode = 0;
  readonly fatal = false;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Page Load Error: ${message}`, context);
  }
}

export class ExtractionError extends AppError {
  readonly exitCode = 0;
  readonly fatal = false;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Extraction Error: ${message}`, context);
  }
}

export class SnapshotError extends AppError {
  readonly exitCode = 1;
  readonly fatal = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Snapshot Error: ${message}`, context);
  }
}

export class ReportError extends AppError {
  readonly exitCode = 1;
  readonly fatal = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Report Error: ${message}`, context);
  }
}
