export class AppError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransportError extends AppError {
  readonly status?: number;
  readonly attempts: number;

  constructor(message: string, options: { status?: number; attempts: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.status = options.status;
    this.attempts = options.attempts;
  }
}

export class ConfigError extends AppError {}

/** Upstream payload did not match any known shape. Callers fall back to empty results. */
export class UpstreamSchemaError extends AppError {}

export class RenderError extends AppError {}

/** Non-success status inside an upstream response envelope. */
export class ApplicationError extends AppError {
  readonly code?: string;

  constructor(message: string, code?: string) {
    super(message);
    this.code = code;
  }
}

export class NotFoundError extends AppError {}

/** Caller-supplied value that cannot be used as given. */
export class InvalidInputError extends AppError {}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "unknown error";
}
