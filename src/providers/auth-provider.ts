import type { JwkSet } from '../types/jwk'
import type { ValidationPolicy } from '../types/validation'

/**
 * @summary Trust source consulted by the verification pipeline.
 * @remarks
 * Supplies the currently trusted key set and may tighten or relax the default
 * validation policy. Implementations should reject with {@link AuthError} code
 * `MISSING_CREDENTIALS` when keys cannot be obtained.
 */
export interface AuthProvider {
  /**
   * @summary Return the trusted key set. The caller owns the returned object.
   */
  getKeySet: () => Promise<JwkSet>
  /**
   * @summary Map the default policy to the effective one. Must be pure.
   */
  adjustValidation: (policy: ValidationPolicy) => ValidationPolicy
}
