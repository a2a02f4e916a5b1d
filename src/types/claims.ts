/**
 * @summary Claims of a verified token.
 * @remarks
 * `sub` and `exp` are guaranteed; issuer-defined claims are carried opaquely.
 */
export interface Claims {
  sub: string
  /** Expiry, seconds since the epoch. */
  exp: number
  [claim: string]: unknown
}
