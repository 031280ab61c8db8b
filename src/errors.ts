export type ErrorCode =
  | 'CONFIG_ERROR'
  | 'API_NOT_FOUND'
  | 'PROFILE_NOT_FOUND'
  | 'SPEC_ERROR'
  | 'LINK_ERROR';

export class ApiWalkError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'ApiWalkError';
    this.code = code;
    this.details = details;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function asErrorResponse(error: unknown): {
  code: ErrorCode | 'INTERNAL_ERROR';
  message: string;
  details?: unknown;
} {
  if (error instanceof ApiWalkError) {
    return {
      code: error.code,
      message: error.message,
      details: error.details,
    };
  }

  if (error instanceof Error) {
    return {
      code: 'INTERNAL_ERROR',
      message: error.message,
    };
  }

  return {
    code: 'INTERNAL_ERROR',
    message: 'Unknown error',
    details: error,
  };
}
