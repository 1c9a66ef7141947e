/**
 * Composite decoder: analog waveform → grayscale frame
 *
 * Best-effort: bandwidth limiting and resampling make this lossy, it does
 * not invert the encoder exactly.
 */
import type { SignalMetadata } from '../container/metadata';
import { ContainerFormatError } from '../container/errors';
import { createFrame, type PixelFrame } from '../frames/types';
import { resampleLinear } from '../lib/resample';
import { computeTiming, timingFromCounts, verticalBlanking, type LineTiming } from '../signal/timing';
import { getStandard, type VoltageLevels } from '../utils/constants';
import { analyzeSync, type SyncStats } from './sync';

/**
 * Line timing for a file: stored counts when present, otherwise derived
 * from the named standard and sample rate.
 */
export function timingForMetadata(metadata: SignalMetadata): LineTiming {
  const timing = metadata.timing
    ? timingFromCounts(
        metadata.timing.syncSamples,
        metadata.timing.backPorchSamples,
        metadata.timing.activeSamples,
        metadata.timing.frontPorchSamples
      )
    : computeTiming(getStandard(metadata.standard), metadata.sampleRate);

  if (timing.samplesPerLine !== metadata.samplesPerLine) {
    throw new ContainerFormatError(
      `Line timing covers ${timing.samplesPerLine} samples, file declares ${metadata.samplesPerLine}`
    );
  }
  return timing;
}

export class CompositeDecoder {
  readonly width: number;
  readonly height: number;
  readonly timing: LineTiming;
  private readonly levels: VoltageLevels;
  private readonly samplesPerLine: number;
  private readonly linesPerFrame: number;
  private readonly activeLines: number;
  private readonly topBlanking: number;

  constructor(metadata: SignalMetadata) {
    this.width = metadata.resolution[0];
    this.height = metadata.resolution[1];
    this.timing = timingForMetadata(metadata);
    this.levels = metadata.levels;
    this.samplesPerLine = metadata.samplesPerLine;
    this.linesPerFrame = metadata.linesPerFrame;
    this.activeLines = metadata.activeLines;
    this.topBlanking = verticalBlanking(metadata.linesPerFrame, metadata.activeLines).top;
  }

  /**
   * Extract one line's active span as 0-255 values (not yet rounded).
   * Returns null when the signal ends before the line does.
   */
  extractLine(signal: Float32Array, lineNum: number): Float32Array | null {
    const start = lineNum * this.samplesPerLine;
    if (start + this.samplesPerLine > signal.length) {
      return null;
    }

    const { activeStart, activeSamples } = this.timing;
    const { black, white } = this.levels;
    const range = white - black;
    const out = new Float32Array(activeSamples);

    for (let i = 0; i < activeSamples; i++) {
      let v = signal[start + activeStart + i];
      if (v < black) v = black;
      else if (v > white) v = white;
      out[i] = ((v - black) / range) * 255;
    }
    return out;
  }

  decodeFrame(signal: Float32Array): PixelFrame {
    const frame = createFrame(this.width, this.height, 1);
    const rows = Math.min(this.activeLines, this.height);

    for (let row = 0; row < rows; row++) {
      let line = this.extractLine(signal, this.topBlanking + row);
      if (line === null) break;

      if (line.length !== this.width) {
        line = resampleLinear(line, this.width);
      }

      const offset = row * this.width;
      for (let x = 0; x < this.width; x++) {
        frame.data[offset + x] = Math.min(255, Math.max(0, Math.round(line[x])));
      }
    }

    return frame;
  }

  analyzeSync(signal: Float32Array): SyncStats {
    return analyzeSync(signal, this.levels, this.linesPerFrame);
  }
}

export { analyzeSync, type SyncStats } from './sync';
