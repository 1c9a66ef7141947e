/**
 * Secret key material
 *
 * The scrambler only ever sees the final key bytes. A passphrase is turned
 * into a 32-byte key with SHA-256.
 */
import { bytesToHex, hexToBytes } from '../utils/helpers';
import { sha256String, sha256Sync } from './sha256';

export interface KeyOptions {
  /** Hex-encoded key; takes precedence over the passphrase */
  key?: string;
  password?: string;
}

export async function deriveKeyFromPassphrase(passphrase: string): Promise<Uint8Array> {
  if (passphrase.length === 0) {
    throw new Error('Password must not be empty');
  }
  return sha256String(passphrase);
}

export function parseHexKey(hex: string): Uint8Array {
  let key: Uint8Array;
  try {
    key = hexToBytes(hex);
  } catch (error) {
    throw new Error('Invalid hex key: expected an even number of hex digits', { cause: error });
  }
  if (key.length === 0) {
    throw new Error('Invalid hex key: empty');
  }
  return key;
}

export async function resolveKey(options: KeyOptions): Promise<Uint8Array> {
  if (options.key !== undefined) {
    return parseHexKey(options.key);
  }
  if (options.password !== undefined) {
    return deriveKeyFromPassphrase(options.password);
  }
  throw new Error('A key (--key) or password (-p) is required');
}

/**
 * Short identifier for logs; the key itself is never printed
 */
export function keyFingerprint(key: Uint8Array): string {
  return bytesToHex(sha256Sync(key).subarray(0, 4));
}
