import * as jose from 'jose'

import { AuthError, describeError } from '../errors/auth.error'
import { assertBase64Url } from '../utils/validation'

import type { Jwk } from '../types/jwk'

/** Key material accepted by `jose.jwtVerify`. */
export type KeyMaterial = jose.KeyLike | Uint8Array

/**
 * @summary Build verification key material from a published JWK.
 * @remarks
 * RSA keys are built from `n`/`e`, EC keys from `crv`/`x`/`y`. Other members of the
 * record are ignored.
 * @param jwk The key record matched by `kid`.
 * @param alg The token's declared algorithm.
 * @throws {@link AuthError} with code `UNSUPPORTED_ALG` for any other key type, or
 * `INVALID_TOKEN` when a component is missing or cannot be imported.
 */
export async function resolveKeyMaterial(jwk: Jwk, alg: string): Promise<KeyMaterial> {
  switch (jwk.kty) {
    case 'RSA': {
      const n = assertBase64Url('n', jwk.n)
      const e = assertBase64Url('e', jwk.e)
      return importComponents({ kty: 'RSA', n, e }, alg, jwk.kid)
    }
    case 'EC': {
      if (typeof jwk.crv !== 'string' || !jwk.crv) {
        throw AuthError.invalidToken('JWK member "crv" is missing', { kid: jwk.kid })
      }
      const x = assertBase64Url('x', jwk.x)
      const y = assertBase64Url('y', jwk.y)
      return importComponents({ kty: 'EC', crv: jwk.crv, x, y }, alg, jwk.kid)
    }
    default:
      throw AuthError.unsupportedAlgorithm({ kid: jwk.kid, kty: jwk.kty })
  }
}

async function importComponents(
  components: jose.JWK,
  alg: string,
  kid: string | undefined,
): Promise<KeyMaterial> {
  try {
    return await jose.importJWK(components, alg)
  } catch (error) {
    throw AuthError.invalidToken(describeError(error), { kid })
  }
}
