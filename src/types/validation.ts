/**
 * @summary Rules applied when decoding a token after its key has been resolved.
 */
export interface ValidationPolicy {
  /** Accepted JWS `alg` values. An empty list rejects every token. */
  algorithms: string[]
  issuer?: string | string[]
  audience?: string | string[]
  subject?: string
  /** Clock skew tolerated for `exp` and `nbf`, in seconds. */
  leewaySeconds: number
  /** Claims that must be present in the payload. */
  requiredClaims: string[]
  /** Reject tokens whose `iat` is older than this many seconds. */
  maxTokenAgeSeconds?: number
}

/** Pure transform from the default policy to the effective one. */
export type ValidationPolicyHook = (policy: ValidationPolicy) => ValidationPolicy
