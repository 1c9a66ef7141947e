/**
 * CLI Decode Command
 */

import { decodeFile } from '../src/pipeline.js';
import { RawVideoWriter, writeFramePgm } from './frame-io.js';
import { commandLogger, progressReporter, withInterrupt } from './options.js';

export interface DecodeOptions {
  output?: string;
  rgb?: boolean;
  framesDir?: string;
  maxFrames?: number;
  analyze?: number | boolean;
  quiet?: boolean;
  verbose?: boolean;
}

/**
 * --analyze alone means every 30 frames
 */
export function analyzeInterval(analyze: number | boolean | undefined): number {
  if (analyze === undefined || analyze === false) return 0;
  if (analyze === true) return 30;
  return analyze;
}

export async function decodeCommand(
  input: string,
  options: DecodeOptions
): Promise<void> {
  const log = options.quiet ? () => {} : console.error.bind(console);
  let writer: RawVideoWriter | null = null;

  try {
    if (!options.output && !options.framesDir && !options.analyze) {
      log('Warning: no --output or --frames-dir given; frames are decoded and discarded');
    }

    writer = options.output ? new RawVideoWriter(options.output, options.rgb) : null;
    const raw = writer;
    log(`Reading ${input}...`);

    const result = await withInterrupt((signal) => decodeFile(input, (frame, index) => {
      raw?.write(frame);
      if (options.framesDir) {
        writeFramePgm(options.framesDir, index, frame);
      }
    }, {
      signal,
      maxFrames: options.maxFrames,
      analyzeEvery: analyzeInterval(options.analyze),
      onProgress: progressReporter(options.quiet),
      logger: commandLogger('Decoder', options),
    }));

    const [width, height] = result.metadata.resolution;
    console.error('');
    console.error(`Frames:  ${result.frames}${result.aborted ? ' (interrupted)' : ''}`);
    console.error(`Size:    ${width}x${height} ${options.rgb ? 'rgb24' : 'gray'}`);
    if (options.output) {
      console.error(`Output:  ${options.output}`);
    }
    if (options.framesDir) {
      console.error(`Frames:  ${options.framesDir}`);
    }

  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  } finally {
    writer?.close();
  }
}
