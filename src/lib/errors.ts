export type AppErrorCode =
  | 'MISSING_EXERCISE_NAME'
  | 'BOX_COUNT_MISMATCH'
  | 'INVALID_ROW'
  | 'INVALID_DATE'
  | 'INVALID_ENTRY'
  | 'CONFIG_MISSING'
  | 'STORE_ERROR';

export class AppError extends Error {
  code: AppErrorCode;
  constructor(code: AppErrorCode, message: string) {
    super(message);
    this.name = 'AppError';
    this.code = code;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
