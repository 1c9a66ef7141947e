/**
 * Composite encoder: video frame → analog waveform
 *
 * Flow: Frame → Luminance → [black, white] → Lines (sync/porch/active)
 *       → Vertical blanking → Low-pass filter → Noise? → Clip
 */
import type { PixelFrame } from '../frames/types';
import type { SignalConfig } from '../signal/config';
import { resampleLinear } from '../lib/resample';
import { clamp } from '../utils/helpers';
import { silentLogger, type Logger } from '../utils/logger';
import { createLowpassKernel, convolveSame } from './filter';
import { frameToLuminance } from './luminance';

export interface EncoderOptions {
  /** Uniform [0, 1) source for the noise generator */
  random?: () => number;
  logger?: Logger;
}

/**
 * Draw a standard normal value (Box-Muller)
 */
function gaussian(random: () => number): number {
  let u = 0;
  while (u === 0) u = random();
  const v = random();
  return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

export class CompositeEncoder {
  readonly config: SignalConfig;
  private readonly lineTemplate: Float32Array;
  private readonly kernel: Float64Array;
  private readonly random: () => number;

  constructor(config: SignalConfig, options: EncoderOptions = {}) {
    this.config = config;
    this.random = options.random ?? Math.random;
    this.lineTemplate = this.createLineTemplate();
    this.kernel = createLowpassKernel(config.bandwidthMhz * 1e6, config.sampleRate);

    const log = options.logger ?? silentLogger;
    const t = config.timing;
    log.debug(
      `Line timing: sync=${t.syncSamples}, back=${t.backPorchSamples}, ` +
      `active=${t.activeSamples}, front=${t.frontPorchSamples}`
    );
  }

  /**
   * One blank line: sync tip over the sync pulse, blanking elsewhere
   */
  private createLineTemplate(): Float32Array {
    const { timing, standard } = this.config;
    const line = new Float32Array(timing.samplesPerLine).fill(standard.levels.blanking);
    line.fill(standard.levels.syncTip, timing.syncStart, timing.backPorchStart);
    return line;
  }

  /**
   * Encode one line. Pass null for a blanking line.
   * @param pixels Row voltages (already mapped to [black, white])
   */
  encodeLine(pixels: ArrayLike<number> | null): Float32Array {
    const line = this.lineTemplate.slice();
    if (pixels !== null) {
      const { activeStart, activeSamples } = this.config.timing;
      const active = pixels.length === activeSamples
        ? Float32Array.from(pixels)
        : resampleLinear(pixels, activeSamples);
      line.set(active, activeStart);
    }
    return line;
  }

  /**
   * Map a frame to per-row voltages in [black, white]
   */
  frameToVoltages(frame: PixelFrame): Float32Array {
    const { width, activeLines, standard } = this.config;
    const { black, white } = standard.levels;
    const luma = frameToLuminance(frame, width, activeLines);
    const out = new Float32Array(luma.data.length);
    for (let i = 0; i < out.length; i++) {
      out[i] = black + luma.data[i] * (white - black);
    }
    return out;
  }

  /**
   * Encode a full frame with vertical blanking and bandwidth limiting
   */
  encodeFrame(frame: PixelFrame): Float32Array {
    const { samplesPerLine, samplesPerFrame, activeLines, width, blanking, standard, noise } = this.config;
    const voltages = this.frameToVoltages(frame);
    const raw = new Float32Array(samplesPerFrame);

    let lineIdx = 0;
    const blankLine = this.encodeLine(null);

    for (let i = 0; i < blanking.top; i++) {
      raw.set(blankLine, lineIdx++ * samplesPerLine);
    }

    for (let row = 0; row < activeLines; row++) {
      const rowPixels = voltages.subarray(row * width, (row + 1) * width);
      raw.set(this.encodeLine(rowPixels), lineIdx++ * samplesPerLine);
    }

    for (let i = 0; i < blanking.bottom; i++) {
      raw.set(blankLine, lineIdx++ * samplesPerLine);
    }

    const output = this.applyBandwidthLimiting(raw);

    if (noise.enabled) {
      for (let i = 0; i < output.length; i++) {
        output[i] += gaussian(this.random) * noise.amplitude;
      }
    }

    const { syncTip, white } = standard.levels;
    for (let i = 0; i < output.length; i++) {
      output[i] = clamp(output[i], syncTip, white);
    }

    return output;
  }

  applyBandwidthLimiting(signal: Float32Array): Float32Array {
    return convolveSame(signal, this.kernel);
  }
}

export { createLowpassKernel, convolveSame, hammingWindow } from './filter';
export { frameToLuminance, frameToLuma, resizeBilinear } from './luminance';
