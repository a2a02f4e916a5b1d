import { identityValidation } from '../services/validation-policy'

import type { AuthProvider } from './auth-provider'
import type { Jwk, JwkSet } from '../types/jwk'
import type { ValidationPolicy, ValidationPolicyHook } from '../types/validation'

/**
 * @summary Trust source holding a fixed key set in process memory.
 * @remarks
 * Suited to unit tests and local fixtures; mirrors the {@link AuthProvider} contract
 * used by {@link CachedJwkSet} without any network access.
 */
export class StaticJwkSet implements AuthProvider {
  private keySet: JwkSet

  constructor(
    keySet: JwkSet = { keys: [] },
    private readonly hook: ValidationPolicyHook = identityValidation,
  ) {
    this.keySet = structuredClone(keySet)
  }

  /**
   * @summary Append a key to the set.
   */
  addKey(jwk: Jwk): this {
    this.keySet.keys.push(structuredClone(jwk))
    return this
  }

  /**
   * @summary Replace the whole key set, e.g. to simulate a rotation.
   */
  setKeySet(keySet: JwkSet): void {
    this.keySet = structuredClone(keySet)
  }

  async getKeySet(): Promise<JwkSet> {
    return structuredClone(this.keySet)
  }

  adjustValidation(policy: ValidationPolicy): ValidationPolicy {
    return this.hook(policy)
  }
}
