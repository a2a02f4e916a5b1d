import { request } from 'undici'

import type { Dispatcher } from 'undici'

const DEFAULT_TIMEOUT_MS = 5000

/**
 * @summary Transport used to download a JWK Set.
 * @remarks
 * Implementations issue a single GET without a body and resolve with the raw
 * response payload, or reject on transport failure, timeout, or non-2xx status.
 */
export interface HttpClient {
  get: (uri: string) => Promise<Uint8Array>
}

export interface UndiciHttpClientOptions {
  /** Applied to both response headers and body (default 5000). */
  timeoutMs?: number
  /** Custom undici dispatcher, e.g. a proxy agent or a `MockAgent` in tests. */
  dispatcher?: Dispatcher
  userAgent?: string
}

/**
 * @summary {@link HttpClient} backed by `undici.request`.
 */
export class UndiciHttpClient implements HttpClient {
  constructor(private readonly options: UndiciHttpClientOptions = {}) {}

  async get(uri: string): Promise<Uint8Array> {
    const timeoutMs = this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    const headers: Record<string, string> = { accept: 'application/json' }
    if (this.options.userAgent) headers['user-agent'] = this.options.userAgent

    const { statusCode, body } = await request(uri, {
      method: 'GET',
      headers,
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
      dispatcher: this.options.dispatcher,
    })

    if (statusCode < 200 || statusCode >= 300) {
      await body.dump()
      throw new Error(`GET ${uri} responded with HTTP ${statusCode}`)
    }

    return new Uint8Array(await body.arrayBuffer())
  }
}
