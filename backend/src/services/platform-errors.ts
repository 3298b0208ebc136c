/**
 * Per-request failures raised by the consent and aggregate services.
 * None of them are retryable and none leave partial state behind.
 */
export abstract class PlatformError extends Error {
  constructor(
    message: string,
    public readonly code: "NOT_FOUND" | "INVALID_ARGUMENT",
    public readonly httpStatus: number,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends PlatformError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "NOT_FOUND", 404, context);
  }
}

export class InvalidArgumentError extends PlatformError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "INVALID_ARGUMENT", 400, context);
  }
}

export function isPlatformError(error: unknown): error is PlatformError {
  return error instanceof PlatformError;
}
