/** Ledger layout could not be located (anchor or header missing). */
export class LayoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LayoutError';
  }
}

/** A message, date, number or cell value could not be read. */
export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

/** A remote call (sheets, exchange, chat) failed. */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/** A remote service refused the request; sending it again will not help. */
export class RemoteRejectedError extends Error {
  constructor(message: string, readonly status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RemoteRejectedError';
  }
}

/** 5xx, 408 and 429 are outages or throttling; other 4xx are final. */
export function isRetryableStatus(status: number): boolean {
  return status >= 500 || status === 408 || status === 429;
}

export function httpError(message: string, status: number, options?: { cause?: unknown }): TransportError | RemoteRejectedError {
  return isRetryableStatus(status) ? new TransportError(message, options) : new RemoteRejectedError(message, status, options);
}

/** Inputs to a zone decision are out of range. */
export class ClassificationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ClassificationError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Failures that only concern the event being handled. */
export function isEventLocal(err: unknown): boolean {
  return err instanceof LayoutError || err instanceof ParseError || err instanceof ClassificationError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
