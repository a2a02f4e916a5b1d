/** Injection token for the {@link AuthProvider} used by the verification pipeline. */
export const AUTH_PROVIDER = Symbol('AUTH_PROVIDER')
/** Injection token for the resolved {@link JwksAuthModuleOptions}. */
export const JWKS_AUTH_OPTIONS = Symbol('JWKS_AUTH_OPTIONS')
