export interface UpstreamErrorOptions {
  cause?: unknown;
  timedOut?: boolean;
}

export class UpstreamServiceError extends Error {
  readonly service: string;
  readonly timedOut: boolean;

  constructor(service: string, message: string, options: UpstreamErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'UpstreamServiceError';
    this.service = service;
    this.timedOut = options.timedOut ?? false;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidInputError extends Error {
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = 'InvalidInputError';
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
