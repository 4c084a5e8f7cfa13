export interface AppError extends Error {
  code: string;
  isOperational: boolean;
  details?: Record<string, unknown>;
}

export const ErrorCodes = {
  UNRECOGNIZED_FILE: "UNRECOGNIZED_FILE",
  FILE_READ_FAILED: "FILE_READ_FAILED",
  MISSING_COLUMNS: "MISSING_COLUMNS",

  STORE_READ_FAILED: "STORE_READ_FAILED",
  STORE_CORRUPT: "STORE_CORRUPT",
  STORE_WRITE_FAILED: "STORE_WRITE_FAILED",

  CATEGORIZER_NOT_CONFIGURED: "CATEGORIZER_NOT_CONFIGURED",
  CATEGORIZER_UNAVAILABLE: "CATEGORIZER_UNAVAILABLE",
  CATEGORIZER_TIMEOUT: "CATEGORIZER_TIMEOUT",

  CONFIG_INVALID: "CONFIG_INVALID",
} as const;

export type ErrorCode = keyof typeof ErrorCodes;

export const DefaultMessages: Record<ErrorCode, string> = {
  UNRECOGNIZED_FILE: "File name does not match any known statement format.",
  FILE_READ_FAILED: "Statement file could not be read.",
  MISSING_COLUMNS: "Statement file is missing required columns.",

  STORE_READ_FAILED: "The ledger could not be read.",
  STORE_CORRUPT: "The ledger contains rows that do not match the canonical schema.",
  STORE_WRITE_FAILED: "The ledger could not be written. The previous version was kept.",

  CATEGORIZER_NOT_CONFIGURED: "The categorization service is not configured (missing API key).",
  CATEGORIZER_UNAVAILABLE: "The categorization service failed to answer.",
  CATEGORIZER_TIMEOUT: "The categorization service did not answer in time.",

  CONFIG_INVALID: "Invalid configuration.",
};

export class LedgerError extends Error implements AppError {
  code: ErrorCode;
  isOperational: boolean;
  details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "LedgerError";
    this.code = code;
    this.isOperational = true;
    this.details = details;
  }
}

export function createError(
  code: ErrorCode,
  details?: Record<string, unknown>,
  customMessage?: string,
  cause?: unknown
): LedgerError {
  const message = customMessage || DefaultMessages[code];
  return new LedgerError(message, code, details, cause === undefined ? undefined : { cause });
}

export function isLedgerError(error: unknown, code?: ErrorCode): error is LedgerError {
  return error instanceof LedgerError && (code === undefined || error.code === code);
}

export function describeError(error: unknown): {
  message: string;
  code: string;
  details?: Record<string, unknown>;
} {
  if (error instanceof LedgerError) {
    return {
      message: error.message,
      code: error.code,
      details: error.details,
    };
  }

  if (error instanceof Error) {
    return {
      message: error.message,
      code: "UNKNOWN_ERROR",
    };
  }

  return {
    message: "An unexpected error occurred.",
    code: "UNKNOWN_ERROR",
  };
}

export function logError(error: unknown, context: string): void {
  const timestamp = new Date().toISOString();

  if (error instanceof LedgerError) {
    console.error(`[${timestamp}] [${context}] ${error.code}: ${error.message}`, {
      details: error.details,
      cause: error.cause instanceof Error ? error.cause.message : error.cause,
    });
  } else if (error instanceof Error) {
    console.error(`[${timestamp}] [${context}] Error: ${error.message}`, {
      stack: error.stack,
    });
  } else {
    console.error(`[${timestamp}] [${context}] Unknown error:`, error);
  }
}
