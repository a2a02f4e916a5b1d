/**
 * @summary Convert a UTF-8 string to bytes.
 * @example
 * ```ts
 * const bytes = toUtf8Bytes('{"keys":[]}')
 * ```
 */
export function toUtf8Bytes(input: string): Uint8Array {
  return new TextEncoder().encode(input)
}

/**
 * @summary Convert bytes to a UTF-8 string (strict mode).
 * @throws TypeError when bytes contain invalid UTF-8 sequences.
 * @example
 * ```ts
 * const text = fromUtf8BytesStrict(bytes)
 * ```
 */
export function fromUtf8BytesStrict(bytes: Uint8Array): string {
  return new TextDecoder('utf8', { fatal: true }).decode(bytes)
}

/**
 * @summary Check that a string only uses the base64url alphabet (no padding).
 */
export function isBase64Url(value: string): boolean {
  return /^[\w-]+$/.test(value)
}
