import { HttpStatus } from '@nestjs/common'

/**
 * @summary Error codes for token verification and configuration.
 * @remarks
 * `INVALID_TOKEN` is caused by the presented token, `MISSING_CREDENTIALS` and
 * `UNSUPPORTED_ALG` by the trust source, `CONFIG_ERROR` only at construction time.
 */
export enum AuthErrorCode {
  INVALID_TOKEN = 'INVALID_TOKEN',
  MISSING_CREDENTIALS = 'MISSING_CREDENTIALS',
  UNSUPPORTED_ALG = 'UNSUPPORTED_ALG',
  CONFIG_ERROR = 'CONFIG_ERROR',
}

/** Human-readable prefix for each code. */
export const AuthErrorTitle: Record<AuthErrorCode, string> = {
  [AuthErrorCode.INVALID_TOKEN]: 'Invalid token',
  [AuthErrorCode.MISSING_CREDENTIALS]: 'Missing credentials',
  [AuthErrorCode.UNSUPPORTED_ALG]: 'Unsupported algorithm',
  [AuthErrorCode.CONFIG_ERROR]: 'Invalid configuration',
}

/** HTTP status for each code. */
export const AuthErrorHttpStatus: Record<AuthErrorCode, HttpStatus> = {
  [AuthErrorCode.INVALID_TOKEN]: HttpStatus.UNAUTHORIZED,
  [AuthErrorCode.MISSING_CREDENTIALS]: HttpStatus.INTERNAL_SERVER_ERROR,
  [AuthErrorCode.UNSUPPORTED_ALG]: HttpStatus.INTERNAL_SERVER_ERROR,
  [AuthErrorCode.CONFIG_ERROR]: HttpStatus.INTERNAL_SERVER_ERROR,
}

/**
 * @summary Custom error carrying an {@link AuthErrorCode}, a reason and optional details.
 */
export class AuthError extends Error {
  readonly code: AuthErrorCode
  readonly reason?: string
  readonly details?: Record<string, unknown>

  /**
   * @summary Construct an AuthError.
   * @param code Machine-readable error code.
   * @param reason Optional underlying reason, appended to the code's title.
   * @param details Optional structured details for diagnostics.
   */
  constructor(code: AuthErrorCode, reason?: string, details?: Record<string, unknown>) {
    super(reason ? `${AuthErrorTitle[code]}: ${reason}` : AuthErrorTitle[code])
    this.name = 'AuthError'
    this.code = code
    this.reason = reason
    this.details = details
  }

  get httpStatus(): HttpStatus {
    return AuthErrorHttpStatus[this.code]
  }

  static invalidToken(reason: string, details?: Record<string, unknown>): AuthError {
    return new AuthError(AuthErrorCode.INVALID_TOKEN, reason, details)
  }

  static missingCredentials(reason: string, details?: Record<string, unknown>): AuthError {
    return new AuthError(AuthErrorCode.MISSING_CREDENTIALS, reason, details)
  }

  static unsupportedAlgorithm(details?: Record<string, unknown>): AuthError {
    return new AuthError(AuthErrorCode.UNSUPPORTED_ALG, undefined, details)
  }

  static config(reason: string, details?: Record<string, unknown>): AuthError {
    return new AuthError(AuthErrorCode.CONFIG_ERROR, reason, details)
  }
}

/**
 * @summary Render an unknown thrown value as a message string.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
