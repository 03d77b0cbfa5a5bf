// ============= Error Types =============

export enum ErrorCodes {
  MISSING_API_KEY = 'MISSING_API_KEY',
  INVALID_CONFIG = 'INVALID_CONFIG',
  INVALID_PROFILE = 'INVALID_PROFILE',
  INVALID_REQUEST = 'INVALID_REQUEST',
  EMPTY_MESSAGE = 'EMPTY_MESSAGE',
  TURN_IN_PROGRESS = 'TURN_IN_PROGRESS',
  MALFORMED_OUTPUT = 'MALFORMED_OUTPUT',
  PROVIDER_UNAVAILABLE = 'PROVIDER_UNAVAILABLE',
}

export class TravelAgentError extends Error {
  constructor(
    message: string,
    public code: ErrorCodes,
    public details?: unknown,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TravelAgentError';
  }
}

export type ProviderErrorCode = ErrorCodes.MALFORMED_OUTPUT | ErrorCodes.PROVIDER_UNAVAILABLE;

/**
 * Raised when the model provider cannot produce a usable reply: the call failed,
 * or the structured output did not match the expected schema.
 */
export class ProviderError extends TravelAgentError {
  declare code: ProviderErrorCode;

  constructor(
    message: string,
    code: ProviderErrorCode,
    options?: { cause?: unknown; details?: unknown },
  ) {
    super(message, code, options?.details, { cause: options?.cause });
    this.name = 'ProviderError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
