export enum ErrorCode {
  INTERNAL = 'INTERNAL',
  NOT_FOUND = 'NOT_FOUND',
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  VALIDATION = 'VALIDATION',
  RATE_LIMITED = 'RATE_LIMITED',
  BAD_REQUEST = 'BAD_REQUEST',
}

const HTTP_STATUS: Record<ErrorCode, number> = {
  [ErrorCode.INTERNAL]: 500,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.FORBIDDEN]: 403,
  [ErrorCode.VALIDATION]: 422,
  [ErrorCode.RATE_LIMITED]: 429,
  [ErrorCode.BAD_REQUEST]: 400,
};

export interface AppErrorBody {
  code: ErrorCode;
  message: string;
  [field: string]: unknown;
}

/**
 * An error whose message and `safeMeta` may be shown to the caller.
 * Anything else that reaches the edge is reported as INTERNAL.
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly httpStatus: number;
  public readonly safeMeta: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, safeMeta: Record<string, unknown> = {}) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.httpStatus = HTTP_STATUS[code];
    this.safeMeta = safeMeta;
  }

  /** Whether the failure is the server's fault rather than the caller's. */
  get isServerError(): boolean {
    return this.httpStatus >= 500;
  }

  toJSON(): AppErrorBody {
    return {
      ...this.safeMeta,
      code: this.code,
      message: this.message,
    };
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
