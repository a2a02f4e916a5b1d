import { Inject, Injectable, Optional } from '@nestjs/common'
import * as jose from 'jose'

import { AuthError, describeError } from '../errors/auth.error'
import { AUTH_PROVIDER } from '../module/jwks-auth.constants'

import { resolveKeyMaterial } from './key-material.resolver'
import { defaultValidationPolicy, toJwtVerifyOptions } from './validation-policy'

import type { AuthProvider } from '../providers/auth-provider'
import type { Claims } from '../types/claims'
import type { Logger } from '@nestjs/common'

/** JWS algorithms a token header may name. */
export const JWS_ALGORITHMS: ReadonlySet<string> = new Set([
  'HS256',
  'HS384',
  'HS512',
  'RS256',
  'RS384',
  'RS512',
  'PS256',
  'PS384',
  'PS512',
  'ES256',
  'ES384',
  'EdDSA',
])

function toClaims(payload: jose.JWTPayload): Claims {
  const { sub, exp } = payload
  if (typeof sub !== 'string') {
    throw AuthError.invalidToken('missing or invalid "sub" claim')
  }
  if (typeof exp !== 'number' || !Number.isInteger(exp)) {
    throw AuthError.invalidToken('missing or invalid "exp" claim')
  }
  return Object.freeze({ ...payload, sub, exp })
}

/**
 * @summary Verify a compact JWT against the keys of a trust source.
 * @remarks
 * Runs once without retries: header, key set, key lookup by `kid`, key material,
 * validation policy (default then provider hook), signature and claims.
 * @param provider Trust source supplying keys and the validation hook.
 * @param token Compact JWS string, without the `Bearer ` prefix.
 * @returns Frozen claims of the verified token.
 * @throws {@link AuthError} with code `INVALID_TOKEN` for any defect of the token,
 * or the provider's and key resolver's errors unchanged.
 */
export async function verifyToken(provider: AuthProvider, token: string): Promise<Claims> {
  if (token.split('.').length < 2) {
    throw AuthError.invalidToken('invalid format')
  }

  let header: jose.ProtectedHeaderParameters
  try {
    header = jose.decodeProtectedHeader(token)
  } catch (error) {
    throw AuthError.invalidToken(describeError(error))
  }
  const alg = header.alg
  if (typeof alg !== 'string' || !alg) {
    throw AuthError.invalidToken('missing alg header field')
  }
  if (!JWS_ALGORITHMS.has(alg)) {
    throw AuthError.invalidToken('unknown alg header value', { alg })
  }

  const keySet = await provider.getKeySet()

  const kid = header.kid
  if (!kid) {
    throw AuthError.invalidToken('missing kid header field')
  }

  const jwk = keySet.keys.find(key => key.kid === kid)
  if (!jwk) {
    throw AuthError.invalidToken('no matching key for the given kid', { kid })
  }

  const key = await resolveKeyMaterial(jwk, alg)
  const policy = provider.adjustValidation(defaultValidationPolicy(alg))

  let verified: jose.JWTVerifyResult
  try {
    verified = await jose.jwtVerify(token, key, toJwtVerifyOptions(policy))
  } catch (error) {
    throw AuthError.invalidToken(describeError(error), { kid })
  }

  return toClaims(verified.payload)
}

/**
 * @summary Injectable entry point to the verification pipeline.
 * @remarks
 * Bound to the {@link AuthProvider} registered under {@link AUTH_PROVIDER}. Rejections
 * are logged at debug level and rethrown unchanged.
 */
@Injectable()
export class TokenVerificationService {
  constructor(
    @Inject(AUTH_PROVIDER) private readonly provider: AuthProvider,
    @Optional() private readonly logger?: Logger,
  ) {}

  async verify(token: string): Promise<Claims> {
    try {
      return await verifyToken(this.provider, token)
    } catch (error) {
      this.logger?.debug('Token rejected', {
        code: error instanceof AuthError ? error.code : undefined,
        error: describeError(error),
      })
      throw error
    }
  }
}
