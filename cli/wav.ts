/**
 * CLI WAV Export Command
 */

import { AnalogFileReader } from '../src/container/index.js';
import { writeWavFile } from './wav-io.js';

interface WavOptions {
  start: number;
  frames: number;
  quiet?: boolean;
}

export async function wavCommand(input: string, output: string, options: WavOptions): Promise<void> {
  const log = options.quiet ? () => {} : console.error.bind(console);
  const reader = new AnalogFileReader(input);

  try {
    const meta = reader.open();
    reader.seekFrame(options.start);

    const frames: Float32Array[] = [];
    for (let i = 0; i < options.frames; i++) {
      const frame = reader.readFrame();
      if (frame === null) break;
      frames.push(frame);
    }

    if (frames.length === 0) {
      console.error(`Error: No frames at index ${options.start}`);
      process.exit(1);
    }

    const samples = new Float32Array(frames.length * meta.samplesPerFrame);
    frames.forEach((frame, i) => samples.set(frame, i * meta.samplesPerFrame));
    writeWavFile(output, samples, meta.sampleRate);

    log(`Frames:  ${frames.length} (from ${options.start})`);
    log(`Samples: ${samples.length}`);
    log(`Output:  ${output}`);

  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  } finally {
    reader.close();
  }
}
