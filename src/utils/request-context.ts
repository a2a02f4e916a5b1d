import { InternalServerErrorException } from '@nestjs/common'

import type { Claims } from '../types/claims'

const verifiedClaims = new WeakMap<object, Claims>()

/**
 * Minimal view of an incoming HTTP request used by the guard.
 */
export interface BearerRequest {
  headers: Record<string, string | string[] | undefined>
}

/**
 * @summary Extract the credential from an `Authorization: Bearer <token>` header.
 * @returns The token, or `undefined` when the header is absent, repeated, uses another
 * scheme or carries an empty credential.
 */
export function extractBearerToken(request: BearerRequest): string | undefined {
  const header = request.headers.authorization
  if (typeof header !== 'string') return undefined
  const match = /^Bearer\s+(\S+)\s*$/i.exec(header)
  return match?.[1]
}

/**
 * @summary Attach verified claims to the request for downstream handlers.
 */
export function attachVerifiedClaims(request: object, claims: Claims): void {
  verifiedClaims.set(request, claims)
}

/**
 * @summary Read the claims attached by {@link JwtAuthGuard}.
 * @throws InternalServerErrorException when called on a request the guard did not
 * authenticate, which means the route is missing the guard.
 */
export function getVerifiedClaims(request: object): Claims {
  const claims = verifiedClaims.get(request)
  if (!claims) {
    throw new InternalServerErrorException({
      error: 'Verified claims are only available on routes protected by JwtAuthGuard',
    })
  }
  return claims
}
