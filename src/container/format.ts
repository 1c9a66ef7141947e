/**
 * Analog container format - header codec
 *
 * Layout:
 *   [0-3]    Magic "ANLG"
 *   [4-7]    Version (uint32 LE, = 1)
 *   [8-11]   Metadata length N (uint32 LE)
 *   [12..]   Metadata (N bytes, UTF-8 JSON)
 *   [12+N..] Frames: samples_per_frame x float32 LE each, no padding
 *
 * There is no trailer; a short read on the next frame ends the stream.
 */
import { CONTAINER } from '../utils/constants';
import { bytesToString, concatBytes, readUint32LE, stringToBytes, writeUint32LE } from '../utils/helpers';
import { ContainerFormatError } from './errors';
import { fromDocument, metadataDocumentSchema, toDocument, type SignalMetadata } from './metadata';

export interface HeaderPrefix {
  version: number;
  metadataLength: number;
}

/**
 * Serialize the full header (prefix + metadata block)
 */
export function encodeHeader(metadata: SignalMetadata): Uint8Array {
  const metadataBytes = stringToBytes(JSON.stringify(toDocument(metadata), null, 2));
  const prefix = new Uint8Array(CONTAINER.HEADER_PREFIX_SIZE);

  prefix.set(stringToBytes(CONTAINER.MAGIC), 0);
  writeUint32LE(prefix, 4, CONTAINER.VERSION);
  writeUint32LE(prefix, 8, metadataBytes.length);

  return concatBytes(prefix, metadataBytes);
}

/**
 * Parse and check the fixed 12-byte prefix
 */
export function decodeHeaderPrefix(bytes: Uint8Array): HeaderPrefix {
  if (bytes.length < CONTAINER.HEADER_PREFIX_SIZE) {
    throw new ContainerFormatError(
      `Truncated header: ${bytes.length} of ${CONTAINER.HEADER_PREFIX_SIZE} bytes`
    );
  }

  const magic = String.fromCharCode(bytes[0], bytes[1], bytes[2], bytes[3]);
  if (magic !== CONTAINER.MAGIC) {
    throw new ContainerFormatError(`Invalid file format (magic: ${JSON.stringify(magic)})`);
  }

  const version = readUint32LE(bytes, 4);
  if (version !== CONTAINER.VERSION) {
    throw new ContainerFormatError(`Unsupported version: ${version}`);
  }

  const metadataLength = readUint32LE(bytes, 8);
  if (metadataLength === 0 || metadataLength > CONTAINER.MAX_METADATA_BYTES) {
    throw new ContainerFormatError(`Invalid metadata length: ${metadataLength}`);
  }

  return { version, metadataLength };
}

/**
 * Parse and validate the metadata block
 */
export function decodeMetadata(bytes: Uint8Array): SignalMetadata {
  let json: unknown;
  try {
    json = JSON.parse(bytesToString(bytes));
  } catch (error) {
    throw new ContainerFormatError('Metadata is not valid UTF-8 JSON', { cause: error });
  }

  const result = metadataDocumentSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ContainerFormatError(`Invalid metadata: ${issues}`, { cause: result.error });
  }

  return fromDocument(result.data);
}

/**
 * Decode a complete in-memory header
 * @returns metadata and the byte offset of the first frame
 */
export function decodeHeader(bytes: Uint8Array): { metadata: SignalMetadata; dataOffset: number } {
  const { metadataLength } = decodeHeaderPrefix(bytes);
  const end = CONTAINER.HEADER_PREFIX_SIZE + metadataLength;
  if (bytes.length < end) {
    throw new ContainerFormatError(
      `Truncated metadata: ${bytes.length - CONTAINER.HEADER_PREFIX_SIZE} of ${metadataLength} bytes`
    );
  }
  return {
    metadata: decodeMetadata(bytes.subarray(CONTAINER.HEADER_PREFIX_SIZE, end)),
    dataOffset: end,
  };
}

/**
 * Float32 samples → little-endian bytes
 */
export function encodeFrameSamples(samples: Float32Array): Uint8Array {
  const bytes = new Uint8Array(samples.length * CONTAINER.BYTES_PER_SAMPLE);
  const view = new DataView(bytes.buffer);
  for (let i = 0; i < samples.length; i++) {
    view.setFloat32(i * 4, samples[i], true);
  }
  return bytes;
}

/**
 * Little-endian bytes → Float32 samples
 */
export function decodeFrameSamples(bytes: Uint8Array): Float32Array {
  if (bytes.length % CONTAINER.BYTES_PER_SAMPLE !== 0) {
    throw new ContainerFormatError(`Frame block of ${bytes.length} bytes is not a whole number of samples`);
  }
  const samples = new Float32Array(bytes.length / CONTAINER.BYTES_PER_SAMPLE);
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = view.getFloat32(i * 4, true);
  }
  return samples;
}

export function frameByteLength(metadata: SignalMetadata): number {
  return metadata.samplesPerFrame * CONTAINER.BYTES_PER_SAMPLE;
}
