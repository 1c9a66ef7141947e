/**
 * File pipelines: encode, scramble, descramble, decode
 *
 * Frames move one at a time: read, transform, write. The pipeline yields
 * to the event loop between frames so an AbortSignal can stop it; the
 * output then holds its header and every whole frame written so far.
 */
import { resolve } from 'path';
import { AnalogFileReader, AnalogFileWriter, MetadataBuilder, type ScrambleOperations, type SignalMetadata } from './container';
import { CompositeDecoder, timingForMetadata } from './decode';
import { Descrambler } from './decode/descramble';
import { CompositeEncoder, type EncoderOptions } from './encode';
import { Scrambler } from './encode/scramble';
import type { FrameSource, PixelFrame } from './frames/types';
import { keyFingerprint } from './lib/key';
import { KeystreamGenerator, type KeystreamBackend } from './lib/keystream';
import { checkCompatibility, geometryFromMetadata, isSegmentable, resolveOperations, type GeometryOverrides, type ScrambleGeometry } from './lib/segments';
import type { SignalConfig } from './signal/config';
import { SCRAMBLE } from './utils/constants';
import { silentLogger, type Logger } from './utils/logger';

export interface PipelineOptions {
  signal?: AbortSignal;
  maxFrames?: number;
  onProgress?: (framesDone: number) => void;
  logger?: Logger;
}

export interface PipelineResult {
  frames: number;
  aborted: boolean;
  metadata: SignalMetadata;
}

export type FrameTransform = (signal: Float32Array, frameIndex: number) => Float32Array;

export interface PreparedTransform {
  transform: FrameTransform;
  metadata: SignalMetadata;
}

export type FrameSink = (frame: PixelFrame, frameIndex: number, signal: Float32Array) => void | Promise<void>;

function yieldToEventLoop(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

function frameLimit(maxFrames: number | undefined): number {
  if (maxFrames === undefined) return Infinity;
  if (!Number.isInteger(maxFrames) || maxFrames < 0) {
    throw new RangeError(`Max frames must be a non-negative integer, got ${maxFrames}`);
  }
  return maxFrames;
}

/**
 * Drive frames from `next` through `handle` until the source ends,
 * the limit is reached or the signal aborts.
 */
async function runFrames<T>(
  next: () => T | null,
  handle: (item: T, frameIndex: number) => void | Promise<void>,
  options: PipelineOptions
): Promise<{ frames: number; aborted: boolean }> {
  const limit = frameLimit(options.maxFrames);
  let frames = 0;

  while (frames < limit) {
    if (options.signal?.aborted) {
      return { frames, aborted: true };
    }
    const item = next();
    if (item === null) break;

    await handle(item, frames);
    frames++;
    options.onProgress?.(frames);
    await yieldToEventLoop();
  }

  return { frames, aborted: false };
}

/**
 * Encode frames from a source into a new analog file
 */
export async function encodeToFile(
  source: FrameSource<PixelFrame>,
  outputPath: string,
  config: SignalConfig,
  options: PipelineOptions & { encoder?: EncoderOptions; now?: Date } = {}
): Promise<PipelineResult> {
  const logger = options.logger ?? silentLogger;
  const encoder = new CompositeEncoder(config, { logger, ...options.encoder });
  const metadata = MetadataBuilder.fromConfig(config, options.now).build();

  const writer = new AnalogFileWriter(outputPath, metadata, logger);
  writer.open();
  try {
    const result = await runFrames(
      () => source.next(),
      (frame) => writer.writeFrame(encoder.encodeFrame(frame)),
      options
    );
    return { ...result, metadata };
  } finally {
    writer.close();
  }
}

/**
 * Read an analog file, transform every frame and write a new file.
 * `prepare` sees the input metadata and returns the transform and the
 * output metadata.
 */
export async function transformFile(
  inputPath: string,
  outputPath: string,
  prepare: (input: SignalMetadata) => PreparedTransform,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  if (resolve(inputPath) === resolve(outputPath)) {
    throw new Error('Input and output must be different files');
  }

  const logger = options.logger ?? silentLogger;
  const reader = new AnalogFileReader(inputPath, logger);
  const input = reader.open();
  try {
    const { transform, metadata } = prepare(input);
    if (metadata.samplesPerFrame !== input.samplesPerFrame) {
      throw new RangeError('Transform must not change the frame size');
    }

    const writer = new AnalogFileWriter(outputPath, metadata, logger);
    writer.open();
    try {
      const result = await runFrames(
        () => reader.readFrame(),
        (signal, index) => writer.writeFrame(transform(signal, index)),
        options
      );
      return { ...result, metadata };
    } finally {
      writer.close();
    }
  } finally {
    reader.close();
  }
}

export interface ScrambleFileOptions extends PipelineOptions {
  key: Uint8Array;
  backend?: KeystreamBackend;
  operations?: Partial<ScrambleOperations>;
  geometry?: GeometryOverrides;
  now?: Date;
}

function describeOperations(ops: ScrambleOperations): string {
  const names = [ops.permutation && 'permutation', ops.inversion && 'inversion', ops.shift && 'shift'];
  const enabled = names.filter((name): name is string => typeof name === 'string');
  return enabled.length > 0 ? enabled.join(', ') : 'none';
}

function warnIncompatible(geometry: ScrambleGeometry, metadata: SignalMetadata, logger: Logger): void {
  const report = checkCompatibility(geometry, timingForMetadata(metadata));
  for (const warning of report.warnings) {
    logger.warn(warning);
  }
  if (report.suggestedFrontPorchReserve !== undefined) {
    logger.warn(`Try a front porch reserve of ${report.suggestedFrontPorchReserve}`);
  }
}

export async function scrambleFile(
  inputPath: string,
  outputPath: string,
  options: ScrambleFileOptions
): Promise<PipelineResult> {
  const logger = options.logger ?? silentLogger;

  return transformFile(inputPath, outputPath, (input) => {
    if (input.scrambled === true) {
      logger.warn('Input is already scrambled; scrambling it again');
    }

    const geometry = geometryFromMetadata(input, options.geometry);
    const operations = resolveOperations(options.operations);
    warnIncompatible(geometry, input, logger);

    const keystream = KeystreamGenerator.fromKey(options.key, options.backend, logger);
    const scrambler = new Scrambler(geometry, keystream, logger);
    logger.info(`Key fingerprint: ${keyFingerprint(options.key)}`);
    logger.info(`Operations: ${describeOperations(operations)}`);

    const builder = MetadataBuilder.from(input)
      .withScrambling({
        method: keystream.backend === 'chacha20' ? SCRAMBLE.METHOD : SCRAMBLE.METHOD_FALLBACK,
        segmentsPerLine: geometry.segmentsPerLine,
        operations,
        syncEnd: geometry.syncEnd,
        frontPorchReserve: geometry.frontPorchReserve,
      })
      .withTimestamp(options.now ?? new Date());
    // Every active line passes through, so the output is the input
    if (isSegmentable(geometry)) {
      builder.markScrambled();
    } else {
      logger.warn('No line can be segmented; the output is NOT scrambled');
    }
    const metadata = builder.build();

    return {
      metadata,
      transform: (signal, frameIndex) => scrambler.scrambleFrame(signal, frameIndex, operations),
    };
  }, options);
}

/**
 * Backend for descrambling: explicit choice, else whatever the file records
 */
export function backendForMetadata(metadata: SignalMetadata, override?: KeystreamBackend): KeystreamBackend {
  if (override !== undefined) return override;
  if (metadata.scramblingMethod === SCRAMBLE.METHOD_FALLBACK) return 'fallback';
  return 'auto';
}

export async function descrambleFile(
  inputPath: string,
  outputPath: string,
  options: ScrambleFileOptions
): Promise<PipelineResult> {
  const logger = options.logger ?? silentLogger;

  return transformFile(inputPath, outputPath, (input) => {
    if (input.scrambled !== true) {
      logger.warn('Input is not marked as scrambled');
    }

    const geometry = geometryFromMetadata(input, options.geometry);
    const operations = resolveOperations(options.operations, input);
    warnIncompatible(geometry, input, logger);

    const keystream = KeystreamGenerator.fromKey(options.key, backendForMetadata(input, options.backend), logger);
    const descrambler = new Descrambler(geometry, keystream, logger);
    logger.info(`Key fingerprint: ${keyFingerprint(options.key)}`);
    logger.info(`Operations: ${describeOperations(operations)}`);

    const metadata = MetadataBuilder.from(input)
      .markDescrambled()
      .withTimestamp(options.now ?? new Date())
      .build();

    return {
      metadata,
      transform: (signal, frameIndex) => descrambler.descrambleFrame(signal, frameIndex, operations),
    };
  }, options);
}

export interface DecodeFileOptions extends PipelineOptions {
  /** Log sync statistics every N frames (0 = never) */
  analyzeEvery?: number;
}

/**
 * Decode every frame of an analog file into a sink
 */
export async function decodeFile(
  inputPath: string,
  sink: FrameSink,
  options: DecodeFileOptions = {}
): Promise<PipelineResult> {
  const logger = options.logger ?? silentLogger;
  const analyzeEvery = options.analyzeEvery ?? 0;

  const reader = new AnalogFileReader(inputPath, logger);
  const metadata = reader.open();
  try {
    if (metadata.scrambled === true) {
      logger.warn('Input is scrambled; decoded frames will look scrambled');
    }
    const decoder = new CompositeDecoder(metadata);

    const result = await runFrames(
      () => reader.readFrame(),
      async (signal, index) => {
        if (analyzeEvery > 0 && index % analyzeEvery === 0) {
          const stats = decoder.analyzeSync(signal);
          logger.info(
            `Frame ${index}: ${stats.syncPulses} sync pulses (expected ${stats.expectedLines}), ` +
            `sync level min ${stats.syncLevelMin.toFixed(3)} mean ${stats.syncLevelMean.toFixed(3)} V`
          );
        }
        await sink(decoder.decodeFrame(signal), index, signal);
      },
      options
    );
    return { ...result, metadata };
  } finally {
    reader.close();
  }
}
