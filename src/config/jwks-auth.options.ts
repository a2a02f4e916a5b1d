import { AuthError } from '../errors/auth.error'
import { createValidationHook, identityValidation } from '../services/validation-policy'

import type { HttpClient } from '../http/http-client'
import type { ValidationPolicyHook } from '../types/validation'
import type { InjectionToken, ModuleMetadata, OptionalFactoryDependency } from '@nestjs/common'

export interface JwksAuthModuleOptions {
  /** Where the issuer publishes its JWK Set. */
  jwksUri: string
  /** Freshness of a fetched key set (default: 300). */
  cacheTtlSeconds?: number
  /** Timeout applied by the default HTTP client (default: 5000). */
  fetchTimeoutMs?: number
  /** Validation policy hook (default: identity). */
  adjustValidation?: ValidationPolicyHook
  /** Transport for the key set; defaults to an undici client. */
  httpClient?: HttpClient
  /** Hide low-level reasons of 500 responses (default: true). */
  redactServerErrors?: boolean
}

export type ResolvedJwksAuthOptions = Required<Omit<JwksAuthModuleOptions, 'httpClient'>> &
  Pick<JwksAuthModuleOptions, 'httpClient'>

export type JwksAuthModuleAsyncOptions = Pick<ModuleMetadata, 'imports'> & {
  useFactory(...args: unknown[]): Promise<JwksAuthModuleOptions> | JwksAuthModuleOptions
  inject?: ReadonlyArray<InjectionToken | OptionalFactoryDependency>
}

export const defaultJwksAuthOptions: Omit<ResolvedJwksAuthOptions, 'jwksUri'> = {
  cacheTtlSeconds: 300,
  fetchTimeoutMs: 5000,
  adjustValidation: identityValidation,
  redactServerErrors: true,
}

/**
 * @summary Merge options with defaults and check the required URI.
 * @throws {@link AuthError} with code `CONFIG_ERROR` when `jwksUri` is missing.
 */
export function resolveJwksAuthOptions(options: JwksAuthModuleOptions): ResolvedJwksAuthOptions {
  if (typeof options.jwksUri !== 'string' || !options.jwksUri.trim()) {
    throw AuthError.config('jwksUri is required')
  }
  return {
    jwksUri: options.jwksUri,
    cacheTtlSeconds: options.cacheTtlSeconds ?? defaultJwksAuthOptions.cacheTtlSeconds,
    fetchTimeoutMs: options.fetchTimeoutMs ?? defaultJwksAuthOptions.fetchTimeoutMs,
    adjustValidation: options.adjustValidation ?? defaultJwksAuthOptions.adjustValidation,
    redactServerErrors: options.redactServerErrors ?? defaultJwksAuthOptions.redactServerErrors,
    httpClient: options.httpClient,
  }
}

function numberFromEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key]?.trim()
  if (!raw) return undefined
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw AuthError.config(`${key} must be a number`, { value: raw })
  }
  return value
}

function listFromEnv(env: NodeJS.ProcessEnv, key: string): string | string[] | undefined {
  const items = (env[key] ?? '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean)
  if (items.length === 0) return undefined
  return items.length === 1 ? items[0] : items
}

/**
 * @summary Read module options from environment variables.
 * @remarks
 * `JWKS_AUTH_URI` is required. `JWKS_AUTH_CACHE_TTL_SECONDS`, `JWKS_AUTH_FETCH_TIMEOUT_MS`
 * and `JWKS_AUTH_LEEWAY_SECONDS` are numbers; `JWKS_AUTH_ISSUER` and `JWKS_AUTH_AUDIENCE`
 * are comma-separated lists. Issuer, audience or leeway install a validation hook.
 * @throws {@link AuthError} with code `CONFIG_ERROR` when a variable is missing or invalid.
 */
export function jwksAuthOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): JwksAuthModuleOptions {
  const jwksUri = env.JWKS_AUTH_URI?.trim()
  if (!jwksUri) throw AuthError.config('Missing env JWKS_AUTH_URI')

  const options: JwksAuthModuleOptions = {
    jwksUri,
    cacheTtlSeconds: numberFromEnv(env, 'JWKS_AUTH_CACHE_TTL_SECONDS'),
    fetchTimeoutMs: numberFromEnv(env, 'JWKS_AUTH_FETCH_TIMEOUT_MS'),
  }

  const issuer = listFromEnv(env, 'JWKS_AUTH_ISSUER')
  const audience = listFromEnv(env, 'JWKS_AUTH_AUDIENCE')
  const leewaySeconds = numberFromEnv(env, 'JWKS_AUTH_LEEWAY_SECONDS')
  if (issuer !== undefined || audience !== undefined || leewaySeconds !== undefined) {
    options.adjustValidation = createValidationHook({ issuer, audience, leewaySeconds })
  }
  return options
}
