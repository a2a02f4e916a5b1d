import 'reflect-metadata'

export * from './cache/single-slot-cache'
export * from './config/jwks-auth.options'
export * from './decorators/verified-claims.decorator'
export * from './errors/auth.error'
export * from './errors/http-error'
export * from './guards/jwt-auth.guard'
export * from './http/http-client'
export * from './module/jwks-auth.constants'
export * from './module/jwks-auth.module'
export * from './providers/auth-provider'
export * from './providers/cached-jwk-set'
export * from './providers/static-jwk-set'
export * from './services/key-material.resolver'
export * from './services/token-verification.service'
export * from './services/validation-policy'
export * from './types/claims'
export * from './types/jwk'
export * from './types/validation'
export * from './utils/async-lock'
export * from './utils/encoding'
export * from './utils/request-context'
export * from './utils/validation'
