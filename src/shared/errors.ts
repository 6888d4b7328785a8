export type ErrorCode =
  | 'INVALID_PARAMS'
  | 'NOT_FOUND'
  | 'IO_ERROR'
  | 'INTERNAL_ERROR';

const RETRYABLE_BY_CODE: Record<ErrorCode, boolean> = {
  IO_ERROR: true,
  INVALID_PARAMS: false,
  NOT_FOUND: false,
  INTERNAL_ERROR: false,
};

export class StaError extends Error {
  readonly retryable: boolean;

  constructor(
    public code: ErrorCode,
    message: string,
    public data?: unknown
  ) {
    super(message);
    this.name = 'StaError';
    this.retryable = RETRYABLE_BY_CODE[code];
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      data: this.data,
    };
  }
}

export function invalidParams(message: string, data?: unknown): StaError {
  return new StaError('INVALID_PARAMS', message, data);
}

export function notFound(message: string, data?: unknown): StaError {
  return new StaError('NOT_FOUND', message, data);
}

export function ioError(message: string, data?: unknown): StaError {
  return new StaError('IO_ERROR', message, data);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
