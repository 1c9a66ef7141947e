/**
 * SHA-256 helpers. The synchronous digest seeds the fallback keystream,
 * which cannot await.
 */
import { createHash, webcrypto } from 'crypto';
import { bytesToHex, stringToBytes } from '../utils/helpers';

export function sha256Sync(data: Uint8Array): Uint8Array {
  return new Uint8Array(createHash('sha256').update(data).digest());
}

/**
 * Calculate SHA-256 hash of data
 * @returns 32-byte digest
 */
export async function sha256(data: Uint8Array): Promise<Uint8Array> {
  const hashBuffer = await webcrypto.subtle.digest('SHA-256', data);
  return new Uint8Array(hashBuffer);
}

/**
 * Calculate SHA-256 hash and return as hex string
 */
export async function sha256Hex(data: Uint8Array): Promise<string> {
  return bytesToHex(await sha256(data));
}

/**
 * SHA-256 of a UTF-8 string
 */
export async function sha256String(str: string): Promise<Uint8Array> {
  return sha256(stringToBytes(str));
}
