/**
 * Hashing utilities
 *
 * SHA-256 helpers for record keys and deterministic dry-run labels.
 */

import { createHash } from 'crypto'

/**
 * Computes SHA-256 hash of a string and returns hex-encoded result.
 *
 * @returns 64-character lowercase hex string
 */
export function sha256(input: string): string {
  return createHash('sha256').update(input, 'utf8').digest('hex')
}

/**
 * Extracts first 4 bytes of a hex hash as a uint32.
 */
export function hashToUint32(hexHash: string): number {
  // First 8 hex characters (4 bytes), big-endian
  const firstBytes = hexHash.slice(0, 8)
  return parseInt(firstBytes, 16) >>> 0 // >>> 0 ensures unsigned
}
