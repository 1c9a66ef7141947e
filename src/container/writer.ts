/**
 * Analog container writer (Node.js fs)
 *
 * The header is written once, in a single write, when the file is opened.
 * Each frame is one contiguous write, so a stopped pipeline leaves a valid
 * header followed by whole frames only.
 */
import { closeSync, openSync, writeSync } from 'fs';
import { silentLogger, type Logger } from '../utils/logger';
import { ContainerFormatError, ContainerIOError } from './errors';
import { encodeFrameSamples, encodeHeader } from './format';
import type { SignalMetadata } from './metadata';

function writeFully(fd: number, bytes: Uint8Array, path: string): void {
  let written = 0;
  while (written < bytes.length) {
    try {
      written += writeSync(fd, bytes, written, bytes.length - written);
    } catch (error) {
      throw new ContainerIOError('Failed to write', path, error);
    }
  }
}

export class AnalogFileWriter {
  readonly path: string;
  readonly metadata: SignalMetadata;
  private fd: number | null = null;
  private logger: Logger;
  framesWritten = 0;

  constructor(path: string, metadata: SignalMetadata, logger: Logger = silentLogger) {
    this.path = path;
    this.metadata = metadata;
    this.logger = logger;
  }

  get isOpen(): boolean {
    return this.fd !== null;
  }

  /**
   * Create the file and write the header
   */
  open(): void {
    if (this.fd !== null) return;

    const header = encodeHeader(this.metadata);
    let fd: number;
    try {
      fd = openSync(this.path, 'w');
    } catch (error) {
      throw new ContainerIOError('Cannot create analog file', this.path, error);
    }

    try {
      writeFully(fd, header, this.path);
    } catch (error) {
      closeSync(fd);
      throw error;
    }

    this.fd = fd;
    this.logger.info(`Created analog signal file: ${this.path}`);
    this.logger.debug(`Wrote header: ${header.length} bytes`);
  }

  writeFrame(samples: Float32Array): void {
    if (this.fd === null) {
      throw new Error('Writer is not open');
    }
    if (samples.length !== this.metadata.samplesPerFrame) {
      throw new ContainerFormatError(
        `Frame has ${samples.length} samples, expected ${this.metadata.samplesPerFrame}`
      );
    }
    writeFully(this.fd, encodeFrameSamples(samples), this.path);
    this.framesWritten++;
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
    this.logger.info(`Wrote ${this.framesWritten} frames`);
  }
}

/**
 * Open a writer for the duration of `fn`; the file is closed on every path
 */
export async function withWriter<T>(
  path: string,
  metadata: SignalMetadata,
  fn: (writer: AnalogFileWriter) => Promise<T> | T,
  logger?: Logger
): Promise<T> {
  const writer = new AnalogFileWriter(path, metadata, logger);
  writer.open();
  try {
    return await fn(writer);
  } finally {
    writer.close();
  }
}
