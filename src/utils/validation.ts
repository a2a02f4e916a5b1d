import { AuthError } from '../errors/auth.error'

import { isBase64Url } from './encoding'

import type { Jwk, JwkSet } from '../types/jwk'

/**
 * @summary Assert that a JWK member is present and base64url-encoded.
 * @param name Member name for error messages (e.g. `n`).
 * @param value Member value as published.
 * @returns The validated string.
 * @throws {@link AuthError} with code `INVALID_TOKEN` if absent or malformed.
 */
export function assertBase64Url(name: string, value: unknown): string {
  if (typeof value !== 'string' || !value) {
    throw AuthError.invalidToken(`JWK member "${name}" is missing`)
  }
  if (!isBase64Url(value)) {
    throw AuthError.invalidToken(`JWK member "${name}" must be base64url`)
  }
  return value
}

/**
 * @summary Type guard for a single JWK record.
 */
export function isJwk(value: unknown): value is Jwk {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return false
  const obj = value as Record<string, unknown>
  return (
    typeof obj.kty === 'string' &&
    (obj.kid === undefined || typeof obj.kid === 'string') &&
    (obj.alg === undefined || typeof obj.alg === 'string')
  )
}

/**
 * @summary Type guard for a JWK Set document.
 * @example
 * ```ts
 * const data = JSON.parse(body)
 * if (isJwkSet(data)) {
 *   const key = data.keys.find(k => k.kid === kid)
 * }
 * ```
 */
export function isJwkSet(value: unknown): value is JwkSet {
  if (!value || typeof value !== 'object') return false
  const obj = value as Record<string, unknown>
  return Array.isArray(obj.keys) && obj.keys.every(isJwk)
}
