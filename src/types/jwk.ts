/**
 * @summary A public JSON Web Key as published in a JWK Set.
 * @remarks
 * Only the members read by the verifier are named; anything else the issuer
 * publishes is carried through untouched.
 */
export interface Jwk {
  kty: string
  kid?: string
  alg?: string
  use?: string
  /** RSA modulus (base64url). */
  n?: string
  /** RSA public exponent (base64url). */
  e?: string
  /** EC curve name, e.g. `P-256`. */
  crv?: string
  /** EC x coordinate (base64url). */
  x?: string
  /** EC y coordinate (base64url). */
  y?: string
  [member: string]: unknown
}

/** A JWK Set document: `{ "keys": [...] }`. */
export interface JwkSet {
  keys: Jwk[]
}
