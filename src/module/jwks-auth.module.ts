import { Global, Logger, Module } from '@nestjs/common'

import { resolveJwksAuthOptions } from '../config/jwks-auth.options'
import { JwtAuthGuard } from '../guards/jwt-auth.guard'
import { UndiciHttpClient } from '../http/http-client'
import { CachedJwkSet } from '../providers/cached-jwk-set'
import { TokenVerificationService } from '../services/token-verification.service'

import { AUTH_PROVIDER, JWKS_AUTH_OPTIONS } from './jwks-auth.constants'

import type {
  JwksAuthModuleAsyncOptions,
  JwksAuthModuleOptions,
  ResolvedJwksAuthOptions,
} from '../config/jwks-auth.options'
import type { AuthProvider } from '../providers/auth-provider'
import type { DynamicModule, Provider } from '@nestjs/common'

/**
 * @summary Build the process-wide key set cache from resolved options.
 */
export function createCachedJwkSet(options: ResolvedJwksAuthOptions): CachedJwkSet {
  return CachedJwkSet.builder()
    .jwkSetUri(options.jwksUri)
    .ttl(options.cacheTtlSeconds * 1000)
    .validator(options.adjustValidation)
    .httpClient(options.httpClient ?? new UndiciHttpClient({ timeoutMs: options.fetchTimeoutMs }))
    .logger(new Logger(CachedJwkSet.name))
    .build()
}

const featureProviders: Provider[] = [
  {
    provide: AUTH_PROVIDER,
    useFactory: (opts: ResolvedJwksAuthOptions) => createCachedJwkSet(opts),
    inject: [JWKS_AUTH_OPTIONS],
  },
  {
    provide: TokenVerificationService,
    useFactory: (provider: AuthProvider) =>
      new TokenVerificationService(provider, new Logger(TokenVerificationService.name)),
    inject: [AUTH_PROVIDER],
  },
  JwtAuthGuard,
]

@Global()
@Module({})
export class JwksAuthModule {
  /**
   * @summary Register the module with synchronous options.
   * @throws {@link AuthError} with code `CONFIG_ERROR` when `jwksUri` is missing.
   */
  static register(options: JwksAuthModuleOptions): DynamicModule {
    const providers: Provider[] = [
      { provide: JWKS_AUTH_OPTIONS, useValue: resolveJwksAuthOptions(options) },
      ...featureProviders,
    ]
    return { module: JwksAuthModule, providers, exports: providers }
  }

  /**
   * @summary Register the module with an async options factory.
   * @example
   * ```ts
   * JwksAuthModule.registerAsync({
   *   useFactory: () => jwksAuthOptionsFromEnv(),
   * })
   * ```
   */
  static registerAsync(options: JwksAuthModuleAsyncOptions): DynamicModule {
    const providers: Provider[] = [
      {
        provide: JWKS_AUTH_OPTIONS,
        useFactory: async (...args: unknown[]) =>
          resolveJwksAuthOptions(await options.useFactory(...args)),
        inject: [...(options.inject ?? [])],
      },
      ...featureProviders,
    ]
    return {
      module: JwksAuthModule,
      imports: options.imports ?? [],
      providers,
      exports: providers,
    }
  }
}
