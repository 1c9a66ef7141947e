/**
 * CLI Encode Command
 */

import { createSignalConfig } from '../src/signal/config.js';
import { encodeToFile } from '../src/pipeline.js';
import { TestPatternSource } from '../src/frames/test-pattern.js';
import type { FrameSource, PixelFrame } from '../src/frames/types.js';
import { CONTAINER, NTSC, type AnalogStandard } from '../src/utils/constants.js';
import { formatBytes } from '../src/utils/helpers.js';
import { RawVideoReader, parsePixelFormat } from './frame-io.js';
import { commandLogger, progressReporter, withInterrupt } from './options.js';

export interface EncodeOptions {
  output: string;
  pattern?: boolean;
  frames?: number;
  standard?: AnalogStandard;
  sampleRate?: number;
  width?: number;
  height?: number;
  pixelFormat: string;
  inputWidth?: number;
  inputHeight?: number;
  bandwidth?: number;
  maxFrames?: number;
  addNoise?: boolean;
  noiseLevel?: number;
  quiet?: boolean;
  verbose?: boolean;
}

export function withAnalogExtension(path: string): string {
  return path.endsWith(CONTAINER.FILE_EXTENSION) ? path : path + CONTAINER.FILE_EXTENSION;
}

export async function encodeCommand(
  input: string | undefined,
  options: EncodeOptions
): Promise<void> {
  const log = options.quiet ? () => {} : console.error.bind(console);
  let reader: RawVideoReader | null = null;

  try {
    const config = createSignalConfig({
      standard: options.standard ?? NTSC,
      sampleRate: options.sampleRate,
      width: options.width,
      height: options.height,
      bandwidthMhz: options.bandwidth,
      addNoise: options.addNoise,
      noiseAmplitude: options.noiseLevel,
    });

    let source: FrameSource<PixelFrame>;
    if (options.pattern) {
      source = new TestPatternSource({
        width: config.width,
        height: config.activeLines,
        frameCount: options.frames ?? 90,
      });
      log('Input: test pattern');
    } else if (input) {
      const format = parsePixelFormat(options.pixelFormat);
      const inputWidth = options.inputWidth ?? config.width;
      const inputHeight = options.inputHeight ?? config.activeLines;
      reader = new RawVideoReader(input, inputWidth, inputHeight, format);
      source = reader;
      log(`Input: ${input} (${inputWidth}x${inputHeight} ${format})`);
    } else {
      console.error('Error: No input provided. Give a raw video file or use --pattern.');
      process.exit(1);
    }

    const output = withAnalogExtension(options.output);
    if (output !== options.output) {
      log(`Warning: output renamed to ${output}`);
    }

    log(`Standard: ${config.standard.name}, ${config.width}x${config.activeLines}`);
    log(`Sample rate: ${(config.sampleRate / 1e6).toFixed(1)} MHz, ${config.samplesPerLine} samples/line`);
    log(`Frame size: ${formatBytes(config.samplesPerFrame * CONTAINER.BYTES_PER_SAMPLE)}`);

    const result = await withInterrupt((signal) => encodeToFile(source, output, config, {
      signal,
      maxFrames: options.maxFrames,
      onProgress: progressReporter(options.quiet),
      logger: commandLogger('Encoder', options),
    }));

    if (reader && reader.trailingBytes > 0) {
      log(`\nWarning: ignored ${reader.trailingBytes} bytes of a partial input frame`);
    }

    console.error('');
    console.error(`Frames:  ${result.frames}${result.aborted ? ' (interrupted)' : ''}`);
    console.error(`Output:  ${output}`);

  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  } finally {
    reader?.close();
  }
}
