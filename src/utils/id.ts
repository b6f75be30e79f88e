/**
 * Short unique IDs
 *
 * URL-safe identifiers drawn from a pre-filled entropy pool. Rejection
 * sampling keeps the distribution uniform for any alphabet size.
 */

import { randomFillSync } from 'node:crypto'

export const URL_SAFE = 'useandom-26T198340PX75pxJACKVERYMINDBUSHWOLF_GQZbfghjklqvwyzrict'
export const HEX_LOWER = '0123456789abcdef'

const DEFAULT_SIZE = 21
const POOL_SIZE = 2048

let pool = new Uint8Array(0)
let poolOffset = 0

function nextByte(): number {
  if (poolOffset >= pool.length) {
    if (pool.length === 0) pool = new Uint8Array(POOL_SIZE)
    randomFillSync(pool)
    poolOffset = 0
  }
  const byte = pool[poolOffset] ?? 0
  poolOffset += 1
  return byte
}

/**
 * Generate a string of `length` characters from `alphabet`
 */
export function randomString(alphabet: string, length: number): string {
  if (alphabet.length === 0 || alphabet.length > 256) {
    throw new Error(`Invalid alphabet size: ${alphabet.length}. Must be 1-256.`)
  }

  const threshold = 256 - (256 % alphabet.length)
  let result = ''

  while (result.length < length) {
    const byte = nextByte()
    if (byte < threshold) {
      result += alphabet[byte % alphabet.length]
    }
  }

  return result
}

/**
 * Generate a short unique ID.
 * Default: 21 characters using URL-safe alphabet (126 bits of entropy).
 *
 * @example
 * ```typescript
 * const id = sid()        // 'V1StGXR8_Z5jdHi6B-myT'
 * const short = sid(10)   // 'IRFa-VaY2b'
 * ```
 */
export function sid(size: number = DEFAULT_SIZE): string {
  return randomString(URL_SAFE, size)
}

/**
 * Prefixed identifier for domain objects, e.g. `pay_3f9a0c...`
 */
export function prefixedId(prefix: string, size = 16): string {
  return `${prefix}_${randomString(HEX_LOWER, size)}`
}
