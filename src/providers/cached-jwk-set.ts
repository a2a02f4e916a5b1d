import { SingleSlotCache } from '../cache/single-slot-cache'
import { AuthError, describeError } from '../errors/auth.error'
import { AsyncLock } from '../utils/async-lock'
import { fromUtf8BytesStrict } from '../utils/encoding'
import { isJwkSet } from '../utils/validation'

import type { AuthProvider } from './auth-provider'
import type { HttpClient } from '../http/http-client'
import type { JwkSet } from '../types/jwk'
import type { ValidationPolicy, ValidationPolicyHook } from '../types/validation'
import type { Logger } from '@nestjs/common'

/**
 * @summary Construction parameters for {@link CachedJwkSet}.
 * @remarks The first four members are required; construction fails without them.
 */
export interface CachedJwkSetConfig {
  /** Where the JWK Set is published. */
  jwkSetUri: string
  /** How long a fetched set stays fresh. Zero or negative refetches on every call. */
  ttlMs: number
  /** Validation policy hook applied to every verification. */
  adjustValidation: ValidationPolicyHook
  /** Transport used for the GET. */
  httpClient: HttpClient
  logger?: Logger
  /** Clock in epoch milliseconds (default `Date.now`). */
  now?: () => number
}

/**
 * @summary Assert that every required configuration member is present.
 * @throws {@link AuthError} with code `CONFIG_ERROR` naming the first missing member.
 */
export function assertCachedJwkSetConfig(
  config: Partial<CachedJwkSetConfig>,
): asserts config is CachedJwkSetConfig {
  if (typeof config.jwkSetUri !== 'string' || !config.jwkSetUri.trim())
    throw AuthError.config('jwkSetUri is required')
  if (config.ttlMs === undefined) throw AuthError.config('ttlMs is required')
  if (typeof config.ttlMs !== 'number' || Number.isNaN(config.ttlMs))
    throw AuthError.config('ttlMs must be a number', { ttlMs: config.ttlMs })
  if (typeof config.adjustValidation !== 'function')
    throw AuthError.config('adjustValidation is required')
  if (!config.httpClient || typeof config.httpClient.get !== 'function')
    throw AuthError.config('httpClient is required')
}

/**
 * @summary Trust source backed by a remotely published JWK Set with a TTL cache.
 * @remarks
 * Holds the most recent set in a single slot. Refreshes run under an {@link AsyncLock}
 * that stays held across the network fetch, so concurrent callers that find the slot
 * empty or expired trigger exactly one fetch and then read the freshly stored set.
 * A failed refresh leaves the previous entry in place and the next call tries again.
 */
export class CachedJwkSet implements AuthProvider {
  private readonly jwkSetUri: string

  private readonly ttlMs: number

  private readonly hook: ValidationPolicyHook

  private readonly httpClient: HttpClient

  private readonly logger?: Logger

  private readonly now: () => number

  private readonly cache = new SingleSlotCache<JwkSet>()

  private readonly lock = new AsyncLock()

  /**
   * @throws {@link AuthError} with code `CONFIG_ERROR` when a required member is missing.
   */
  constructor(config: CachedJwkSetConfig) {
    assertCachedJwkSetConfig(config)
    this.jwkSetUri = config.jwkSetUri
    this.ttlMs = config.ttlMs
    this.hook = config.adjustValidation
    this.httpClient = config.httpClient
    this.logger = config.logger
    this.now = config.now ?? Date.now
  }

  static builder(): CachedJwkSetBuilder {
    return new CachedJwkSetBuilder()
  }

  get uri(): string {
    return this.jwkSetUri
  }

  /**
   * @summary Return a copy of the cached set, fetching it first when empty or expired.
   * @throws {@link AuthError} with code `MISSING_CREDENTIALS` when the fetch fails or
   * the payload is not a JWK Set.
   */
  async getKeySet(): Promise<JwkSet> {
    return this.lock.runExclusive(async () => {
      const cached = this.cache.peek(this.now())
      if (cached) return structuredClone(cached)

      const keySet = await this.fetchKeySet()
      this.cache.fill(keySet, this.ttlMs, this.now())
      return structuredClone(keySet)
    })
  }

  adjustValidation(policy: ValidationPolicy): ValidationPolicy {
    return this.hook(policy)
  }

  private async fetchKeySet(): Promise<JwkSet> {
    this.logger?.debug(`Refreshing JWK set from ${this.jwkSetUri}`)

    let payload: Uint8Array
    try {
      payload = await this.httpClient.get(this.jwkSetUri)
    } catch (error) {
      throw this.refreshFailed(describeError(error))
    }

    let data: unknown
    try {
      data = JSON.parse(fromUtf8BytesStrict(payload))
    } catch (error) {
      throw this.refreshFailed(`invalid JWK set payload: ${describeError(error)}`)
    }

    if (!isJwkSet(data)) {
      throw this.refreshFailed('payload is not a JWK set')
    }
    return data
  }

  private refreshFailed(reason: string): AuthError {
    this.logger?.warn('JWK set refresh failed', { jwkSetUri: this.jwkSetUri, reason })
    return AuthError.missingCredentials(reason, { jwkSetUri: this.jwkSetUri })
  }
}

/**
 * @summary Fluent builder for {@link CachedJwkSet}.
 * @example
 * ```ts
 * const provider = CachedJwkSet.builder()
 *   .jwkSetUri('https://issuer.example/jwks')
 *   .ttl(300_000)
 *   .validator(policy => ({ ...policy, issuer: 'https://issuer.example' }))
 *   .httpClient(new UndiciHttpClient())
 *   .build()
 * ```
 */
export class CachedJwkSetBuilder {
  private readonly config: Partial<CachedJwkSetConfig> = {}

  jwkSetUri(uri: string): this {
    this.config.jwkSetUri = uri
    return this
  }

  ttl(ms: number): this {
    this.config.ttlMs = ms
    return this
  }

  validator(hook: ValidationPolicyHook): this {
    this.config.adjustValidation = hook
    return this
  }

  httpClient(client: HttpClient): this {
    this.config.httpClient = client
    return this
  }

  logger(logger: Logger): this {
    this.config.logger = logger
    return this
  }

  clock(now: () => number): this {
    this.config.now = now
    return this
  }

  /**
   * @throws {@link AuthError} with code `CONFIG_ERROR` when a required member was not set.
   */
  build(): CachedJwkSet {
    const config = { ...this.config }
    assertCachedJwkSetConfig(config)
    return new CachedJwkSet(config)
  }
}
