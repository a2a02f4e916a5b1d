import type { ValidationPolicy, ValidationPolicyHook } from '../types/validation'
import type { JWTVerifyOptions } from 'jose'

/** Clock skew tolerated for `exp`/`nbf` unless a hook changes it. */
export const DEFAULT_LEEWAY_SECONDS = 60

/**
 * @summary Build the policy applied before any hook runs.
 * @remarks
 * Accepts only the algorithm declared in the token header and requires an unexpired
 * `exp`. No issuer, audience or subject check is made; attach a hook for those.
 * @param alg The `alg` header parameter of the token being verified.
 */
export function defaultValidationPolicy(alg: string): ValidationPolicy {
  return {
    algorithms: [alg],
    leewaySeconds: DEFAULT_LEEWAY_SECONDS,
    requiredClaims: ['exp'],
  }
}

/** Hook that leaves the default policy unchanged. */
export const identityValidation: ValidationPolicyHook = policy => policy

/**
 * @summary Translate a policy into `jose.jwtVerify` options.
 */
export function toJwtVerifyOptions(policy: ValidationPolicy): JWTVerifyOptions {
  return {
    algorithms: policy.algorithms,
    issuer: policy.issuer,
    audience: policy.audience,
    subject: policy.subject,
    clockTolerance: policy.leewaySeconds,
    requiredClaims: policy.requiredClaims,
    maxTokenAge: policy.maxTokenAgeSeconds,
  }
}

export interface ValidationHookOptions {
  issuer?: string | string[]
  audience?: string | string[]
  subject?: string
  leewaySeconds?: number
  /** Added to the claims the default policy already requires. */
  requiredClaims?: string[]
  maxTokenAgeSeconds?: number
}

/**
 * @summary Create a pure hook that layers issuer/audience/leeway rules over the default.
 * @example
 * ```ts
 * const hook = createValidationHook({
 *   issuer: 'https://issuer.example',
 *   audience: 'orders-api',
 *   leewaySeconds: 5,
 * })
 * ```
 */
export function createValidationHook(options: ValidationHookOptions): ValidationPolicyHook {
  return policy => ({
    ...policy,
    issuer: options.issuer ?? policy.issuer,
    audience: options.audience ?? policy.audience,
    subject: options.subject ?? policy.subject,
    leewaySeconds: options.leewaySeconds ?? policy.leewaySeconds,
    requiredClaims: [...new Set([...policy.requiredClaims, ...(options.requiredClaims ?? [])])],
    maxTokenAgeSeconds: options.maxTokenAgeSeconds ?? policy.maxTokenAgeSeconds,
  })
}
