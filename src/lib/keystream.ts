/**
 * Keystream for the scrambler
 *
 * Two interchangeable backends behind one interface:
 * - CipherKeystream: ChaCha20 keyed by the 32-byte secret, frame index as nonce
 * - FallbackKeystream: seeded PRNG keyed by SHA-256(secret) mixed with the frame index
 *
 * The backend is picked once when the generator is built. Callers only rely
 * on the stream being a pure function of (secret, frame index).
 */
import { chacha20 } from '@noble/ciphers/chacha.js';
import { KEY_SIZE } from '../utils/constants';
import { readUint32LE, writeUint32LE } from '../utils/helpers';
import { silentLogger, type Logger } from '../utils/logger';
import { SeededRandom } from './prng';
import { sha256Sync } from './sha256';

const NONCE_SIZE = 12;

// Seed offsets per derived artifact
const PERMUTATION_OFFSET = 0;
const INVERSION_OFFSET = 1;
const SHIFT_OFFSET = 2;

export type KeystreamBackend = 'auto' | 'cipher' | 'fallback';

export interface KeystreamSource {
  readonly name: 'chacha20' | 'prng';
  generate(length: number, frameIndex: number): Uint8Array;
}

function assertFrameIndex(frameIndex: number): void {
  if (!Number.isSafeInteger(frameIndex) || frameIndex < 0) {
    throw new RangeError(`Frame index must be a non-negative integer, got ${frameIndex}`);
  }
}

function assertCount(n: number, what: string): void {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`${what} must be a non-negative integer, got ${n}`);
  }
}

/**
 * ChaCha20 (RFC 8439) keystream. Nonce = frame index as u64 LE + 4 zero bytes.
 */
export class CipherKeystream implements KeystreamSource {
  readonly name = 'chacha20';
  private readonly key: Uint8Array;

  constructor(key: Uint8Array) {
    if (key.length !== KEY_SIZE) {
      throw new RangeError(`ChaCha20 keystream needs a ${KEY_SIZE}-byte key, got ${key.length}`);
    }
    this.key = key.slice();
  }

  generate(length: number, frameIndex: number): Uint8Array {
    assertCount(length, 'Keystream length');
    assertFrameIndex(frameIndex);
    const nonce = new Uint8Array(NONCE_SIZE);
    writeUint32LE(nonce, 0, frameIndex >>> 0);
    writeUint32LE(nonce, 4, Math.floor(frameIndex / 0x100000000));
    return chacha20(this.key, nonce, new Uint8Array(length));
  }
}

/**
 * Deterministic PRNG keystream, used when the cipher cannot be keyed
 */
export class FallbackKeystream implements KeystreamSource {
  readonly name = 'prng';
  private readonly baseSeed: number;

  constructor(key: Uint8Array) {
    if (key.length === 0) {
      throw new RangeError('Keystream key must not be empty');
    }
    this.baseSeed = readUint32LE(sha256Sync(key), 0);
  }

  generate(length: number, frameIndex: number): Uint8Array {
    assertCount(length, 'Keystream length');
    assertFrameIndex(frameIndex);
    const high = Math.floor(frameIndex / 0x100000000);
    const seed = (this.baseSeed ^ (frameIndex >>> 0) ^ Math.imul(high, 0x9E3779B1)) >>> 0;
    return new SeededRandom(seed).fillBytes(new Uint8Array(length));
  }
}

/**
 * Pick a backend. 'auto' uses the cipher whenever the key fits it.
 */
export function createKeystreamSource(key: Uint8Array, backend: KeystreamBackend = 'auto'): KeystreamSource {
  switch (backend) {
    case 'cipher':
      return new CipherKeystream(key);
    case 'fallback':
      return new FallbackKeystream(key);
    case 'auto':
      return key.length === KEY_SIZE ? new CipherKeystream(key) : new FallbackKeystream(key);
  }
}

/**
 * Inverse of a permutation: inv[perm[i]] = i
 */
export function invertPermutation(perm: readonly number[]): number[] {
  const inv = new Array<number>(perm.length);
  for (let i = 0; i < perm.length; i++) {
    inv[perm[i]] = i;
  }
  return inv;
}

export class KeystreamGenerator {
  readonly source: KeystreamSource;

  constructor(source: KeystreamSource) {
    this.source = source;
  }

  static fromKey(key: Uint8Array, backend: KeystreamBackend = 'auto', logger: Logger = silentLogger): KeystreamGenerator {
    const source = createKeystreamSource(key, backend);
    if (source.name === 'chacha20') {
      logger.info('Using ChaCha20 keystream');
    } else {
      logger.info('Using PRNG keystream (fallback)');
    }
    return new KeystreamGenerator(source);
  }

  get backend(): KeystreamSource['name'] {
    return this.source.name;
  }

  generate(length: number, frameIndex: number): Uint8Array {
    return this.source.generate(length, frameIndex);
  }

  /**
   * 32-bit seed for one (frame, line, artifact):
   * u32le(frame + offset) || u32le(line), XOR the frame's keystream,
   * then fold the two halves together.
   */
  private lineSeed(frameIndex: number, lineIndex: number, offset: number): number {
    assertFrameIndex(frameIndex);
    assertCount(lineIndex, 'Line index');

    const seedData = new Uint8Array(8);
    writeUint32LE(seedData, 0, (frameIndex + offset) >>> 0);
    writeUint32LE(seedData, 4, lineIndex >>> 0);

    const keystream = this.source.generate(seedData.length, frameIndex);
    for (let i = 0; i < seedData.length; i++) {
      seedData[i] ^= keystream[i];
    }

    return (readUint32LE(seedData, 0) ^ readUint32LE(seedData, 4)) >>> 0;
  }

  /**
   * Shuffled permutation of [0, n)
   */
  getPermutation(n: number, frameIndex: number, lineIndex: number): number[] {
    assertCount(n, 'Segment count');
    const rng = new SeededRandom(this.lineSeed(frameIndex, lineIndex, PERMUTATION_OFFSET));
    return rng.shuffle(Array.from({ length: n }, (_, i) => i));
  }

  /**
   * n independent invert / keep decisions
   */
  getInversions(n: number, frameIndex: number, lineIndex: number): boolean[] {
    assertCount(n, 'Segment count');
    const rng = new SeededRandom(this.lineSeed(frameIndex, lineIndex, INVERSION_OFFSET));
    return Array.from({ length: n }, () => rng.nextInt(2) === 1);
  }

  /**
   * n independent shift amounts in [0, maxShift); all zero when maxShift < 1
   */
  getShifts(n: number, maxShift: number, frameIndex: number, lineIndex: number): number[] {
    assertCount(n, 'Segment count');
    if (maxShift < 1) {
      return new Array<number>(n).fill(0);
    }
    const rng = new SeededRandom(this.lineSeed(frameIndex, lineIndex, SHIFT_OFFSET));
    return Array.from({ length: n }, () => rng.nextInt(maxShift));
  }
}
