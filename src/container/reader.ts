/**
 * Analog container reader (Node.js fs)
 */
import { closeSync, fstatSync, openSync, readSync } from 'fs';
import { CONTAINER } from '../utils/constants';
import { silentLogger, type Logger } from '../utils/logger';
import { ContainerFormatError, ContainerIOError } from './errors';
import { decodeFrameSamples, decodeHeaderPrefix, decodeMetadata, frameByteLength } from './format';
import type { SignalMetadata } from './metadata';

/**
 * Read up to buffer.length bytes at a position, looping over short reads.
 * Returns the number of bytes actually read (less only at end of file).
 */
function readFully(fd: number, buffer: Uint8Array, position: number, path: string): number {
  let total = 0;
  while (total < buffer.length) {
    let n: number;
    try {
      n = readSync(fd, buffer, total, buffer.length - total, position + total);
    } catch (error) {
      throw new ContainerIOError('Failed to read', path, error);
    }
    if (n === 0) break;
    total += n;
  }
  return total;
}

export class AnalogFileReader {
  readonly path: string;
  private fd: number | null = null;
  private meta: SignalMetadata | null = null;
  private dataOffset = 0;
  private position = 0;
  private logger: Logger;
  framesRead = 0;

  constructor(path: string, logger: Logger = silentLogger) {
    this.path = path;
    this.logger = logger;
  }

  get metadata(): SignalMetadata {
    if (!this.meta) {
      throw new Error('Reader is not open');
    }
    return this.meta;
  }

  get isOpen(): boolean {
    return this.fd !== null;
  }

  /**
   * Open the file and validate its header
   */
  open(): SignalMetadata {
    if (this.fd !== null) return this.metadata;

    let fd: number;
    try {
      fd = openSync(this.path, 'r');
    } catch (error) {
      throw new ContainerIOError('Cannot open analog file', this.path, error);
    }

    try {
      const prefix = new Uint8Array(CONTAINER.HEADER_PREFIX_SIZE);
      const got = readFully(fd, prefix, 0, this.path);
      const { metadataLength } = decodeHeaderPrefix(prefix.subarray(0, got));

      const metadataBytes = new Uint8Array(metadataLength);
      const gotMeta = readFully(fd, metadataBytes, CONTAINER.HEADER_PREFIX_SIZE, this.path);
      if (gotMeta < metadataLength) {
        throw new ContainerFormatError(`Truncated metadata: ${gotMeta} of ${metadataLength} bytes`);
      }

      this.meta = decodeMetadata(metadataBytes);
      this.dataOffset = CONTAINER.HEADER_PREFIX_SIZE + metadataLength;
      this.position = this.dataOffset;
      this.fd = fd;
    } catch (error) {
      closeSync(fd);
      throw error;
    }

    const m = this.meta;
    this.logger.info(
      `Opened ${this.path}: ${m.standard}, ${m.resolution[0]}x${m.resolution[1]}, ` +
      `${m.fps.toFixed(2)} fps, ${(m.sampleRate / 1e6).toFixed(1)} MHz`
    );
    return m;
  }

  /**
   * Read the next frame, or null at end of stream.
   * A trailing partial frame counts as end of stream.
   */
  readFrame(): Float32Array | null {
    if (this.fd === null) return null;

    const bytes = new Uint8Array(frameByteLength(this.metadata));
    const got = readFully(this.fd, bytes, this.position, this.path);
    if (got < bytes.length) {
      if (got > 0) {
        this.logger.warn(`Ignoring ${got} trailing bytes (partial frame)`);
      }
      return null;
    }

    this.position += bytes.length;
    this.framesRead++;
    return decodeFrameSamples(bytes);
  }

  /**
   * Position the reader so the next readFrame() returns frame `index`
   */
  seekFrame(index: number): void {
    if (!Number.isInteger(index) || index < 0) {
      throw new RangeError(`Frame index must be a non-negative integer, got ${index}`);
    }
    this.position = this.dataOffset + index * frameByteLength(this.metadata);
  }

  /**
   * Whole frames stored in the file
   */
  frameCount(): number {
    if (this.fd === null) {
      throw new Error('Reader is not open');
    }
    let size: number;
    try {
      size = fstatSync(this.fd).size;
    } catch (error) {
      throw new ContainerIOError('Failed to stat', this.path, error);
    }
    return Math.max(0, Math.floor((size - this.dataOffset) / frameByteLength(this.metadata)));
  }

  *frames(): Generator<Float32Array> {
    let frame = this.readFrame();
    while (frame !== null) {
      yield frame;
      frame = this.readFrame();
    }
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    try {
      closeSync(fd);
    } catch (error) {
      throw new ContainerIOError('Failed to close', this.path, error);
    }
    this.logger.debug(`Read ${this.framesRead} frames`);
  }
}

/**
 * Open a reader for the duration of `fn`; the file is closed on every path
 */
export async function withReader<T>(
  path: string,
  fn: (reader: AnalogFileReader) => Promise<T> | T,
  logger?: Logger
): Promise<T> {
  const reader = new AnalogFileReader(path, logger);
  reader.open();
  try {
    return await fn(reader);
  } finally {
    reader.close();
  }
}
