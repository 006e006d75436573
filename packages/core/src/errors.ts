/**
 * Monitor Error Classes
 *
 * Error taxonomy for provider polling and startup configuration.
 */

// ============================================
// Base Error
// ============================================

export const ERROR_CODES = {
  NETWORK: "network_error",
  AUTH: "auth_error",
  DECODE: "decode_error",
  CONFIG: "config_error",
  UNKNOWN: "unknown_error",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Base error class for all monitor errors.
 */
export class MonitorError extends Error {
  readonly code: ErrorCode;
  readonly provider?: string;
  readonly model?: string;

  constructor(
    message: string,
    options: {
      code: ErrorCode;
      provider?: string;
      model?: string;
      cause?: unknown;
    }
  ) {
    super(message);
    this.name = "MonitorError";
    this.code = options.code;
    this.provider = options.provider;
    this.model = options.model;
    this.cause = options.cause;
  }
}

// ============================================
// Specific Error Types
// ============================================

/**
 * Transport failure, timeout or upstream 5xx.
 */
export class NetworkError extends MonitorError {
  constructor(provider: string, detail: string, cause?: unknown) {
    super(`Network error for ${provider}: ${detail}`, {
      code: ERROR_CODES.NETWORK,
      provider,
      cause,
    });
    this.name = "NetworkError";
  }
}

/**
 * Credential or token rejected by the provider.
 */
export class AuthError extends MonitorError {
  constructor(provider: string, cause?: unknown) {
    super(`Authentication failed for provider: ${provider}`, {
      code: ERROR_CODES.AUTH,
      provider,
      cause,
    });
    this.name = "AuthError";
  }
}

/**
 * Response did not match the expected shape.
 */
export class DecodeError extends MonitorError {
  readonly validationErrors: string[];

  constructor(provider: string, validationErrors: string[], cause?: unknown) {
    super(`Unexpected response from ${provider}: ${validationErrors.join(", ")}`, {
      code: ERROR_CODES.DECODE,
      provider,
      cause,
    });
    this.name = "DecodeError";
    this.validationErrors = validationErrors;
  }
}

/**
 * Missing/invalid configuration or a failed credential exchange.
 */
export class ConfigError extends MonitorError {
  constructor(message: string, options: { provider?: string; cause?: unknown } = {}) {
    super(message, {
      code: ERROR_CODES.CONFIG,
      provider: options.provider,
      cause: options.cause,
    });
    this.name = "ConfigError";
  }
}

// ============================================
// Error Utilities
// ============================================

/**
 * Extract error code from error.
 */
export function getErrorCode(error: unknown): ErrorCode {
  if (error instanceof MonitorError) {
    return error.code;
  }
  return ERROR_CODES.UNKNOWN;
}

/**
 * Human-readable message for any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
