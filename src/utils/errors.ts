// Error names are matched by the express error handler; keep them stable.

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class DeadlineExceededError extends Error {
  constructor(message = 'Run deadline exceeded') {
    super(message);
    this.name = 'DeadlineExceededError';
  }
}

export class TransportError extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.status = options.status;
  }
}

export class MalformedOutputError extends Error {
  readonly raw: string;

  constructor(message: string, raw = '') {
    super(message);
    this.name = 'MalformedOutputError';
    this.raw = raw;
  }
}

export class FetchError extends Error {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'FetchError';
    this.statusCode = statusCode;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
