export type ErrorCode =
  | 'CONFIG_INVALID'
  | 'BOOTSTRAP_FAILED'
  | 'INVALID_TOOL_CALL'
  | 'RATE_LIMIT_EXCEEDED'
  | 'PROVIDER_ERROR'
  | 'UNKNOWN_TOOL'
  | 'OUT_OF_RANGE_RESULT'
  | 'MODEL_OUTPUT_INVALID'
  | 'INCOMPLETE_INPUT'
  | 'COMPOUND_NOT_FOUND'
  | 'PARTIAL_AGENT_FAILURE'
  | 'TRAJECTORY_CLOSED'
  | 'TIMEOUT';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly cause?: unknown,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export function toErrorWithCode(error: unknown, fallbackCode: ErrorCode): AppError {
  if (error instanceof AppError) return error;
  if (error instanceof Error) return new AppError(fallbackCode, error.message, error);
  return new AppError(fallbackCode, String(error));
}

export function isAppErrorCode(error: unknown, ...codes: ErrorCode[]): error is AppError {
  return error instanceof AppError && codes.includes(error.code);
}
