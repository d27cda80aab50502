export interface AppErrorOptions {
  message: string;
  statusCode: number;
  code: string;
  isOperational?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/** What a caller may see of an error: no stack, no cause. */
export interface SerializedError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Base for every error that carries its own HTTP status and machine code.
 * 4xx means the request was at fault; 5xx means an upstream dependency was.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  /** False for programmer errors that should never reach a caller verbatim. */
  readonly isOperational: boolean;
  readonly details?: Record<string, unknown>;

  constructor(options: AppErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.statusCode = options.statusCode;
    this.code = options.code;
    this.isOperational = options.isOperational ?? true;
    this.details = options.details;

    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, new.target);
  }

  get isUpstream(): boolean {
    return this.statusCode >= 500;
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined ? { details: this.details } : {}),
    };
  }

  static isAppError(err: unknown): err is AppError {
    return err instanceof AppError;
  }
}
