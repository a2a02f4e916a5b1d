import { HttpException, HttpStatus } from '@nestjs/common'

import { AuthError, AuthErrorTitle } from './auth.error'

/** Response body produced for every rejected request. */
export interface ErrorBody {
  error: string
}

/**
 * @summary Map a verification failure to the HTTP exception sent to the client.
 * @remarks
 * `INVALID_TOKEN` becomes 401 with the full message. Every other failure is a 500; with
 * `redactServerErrors` its body names only the error kind, not the underlying reason.
 * @param error Whatever the verification pipeline threw.
 * @param redactServerErrors Hide low-level reasons of server-side failures.
 */
export function toHttpException(error: unknown, redactServerErrors: boolean): HttpException {
  if (!(error instanceof AuthError)) {
    const message =
      redactServerErrors || !(error instanceof Error) ? 'Internal error' : error.message
    return new HttpException({ error: message } satisfies ErrorBody, HttpStatus.INTERNAL_SERVER_ERROR)
  }

  const status = error.httpStatus
  const message =
    redactServerErrors && status >= HttpStatus.INTERNAL_SERVER_ERROR
      ? AuthErrorTitle[error.code]
      : error.message
  return new HttpException({ error: message } satisfies ErrorBody, status)
}
