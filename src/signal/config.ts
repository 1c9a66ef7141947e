/**
 * Immutable signal configuration shared by encoder, decoder and container
 */
import { NTSC, SIGNAL, type AnalogStandard } from '../utils/constants';
import { computeTiming, samplesPerLine, verticalBlanking, type LineTiming, type VerticalBlanking } from './timing';

export interface NoiseSettings {
  enabled: boolean;
  amplitude: number;
}

export interface SignalConfig {
  readonly standard: AnalogStandard;
  readonly sampleRate: number;
  readonly width: number;
  readonly activeLines: number;
  readonly bandwidthMhz: number;
  readonly noise: Readonly<NoiseSettings>;
  readonly samplesPerLine: number;
  readonly samplesPerFrame: number;
  readonly timing: Readonly<LineTiming>;
  readonly blanking: Readonly<VerticalBlanking>;
}

export interface SignalConfigOptions {
  standard?: AnalogStandard;
  sampleRate?: number;
  width?: number;
  /** Active lines; also the height frames are resized to */
  height?: number;
  bandwidthMhz?: number;
  addNoise?: boolean;
  noiseAmplitude?: number;
}

export function createSignalConfig(options: SignalConfigOptions = {}): SignalConfig {
  const standard = options.standard ?? NTSC;
  const sampleRate = options.sampleRate ?? SIGNAL.SAMPLE_RATE;
  const width = options.width ?? SIGNAL.WIDTH;
  const activeLines = options.height ?? SIGNAL.HEIGHT;
  const bandwidthMhz = options.bandwidthMhz ?? SIGNAL.BANDWIDTH_MHZ;

  if (!Number.isInteger(width) || width < 1) {
    throw new RangeError(`Width must be a positive integer, got ${width}`);
  }
  if (!Number.isInteger(activeLines) || activeLines < 1) {
    throw new RangeError(`Height must be a positive integer, got ${activeLines}`);
  }
  if (!(bandwidthMhz > 0)) {
    throw new RangeError(`Bandwidth must be positive, got ${bandwidthMhz}`);
  }

  const timing = computeTiming(standard, sampleRate);
  const blanking = verticalBlanking(standard.linesPerFrame, activeLines);
  const lineSamples = samplesPerLine(standard.lineDurationUs, sampleRate);

  return Object.freeze({
    standard,
    sampleRate,
    width,
    activeLines,
    bandwidthMhz,
    noise: Object.freeze({
      enabled: options.addNoise ?? false,
      amplitude: options.noiseAmplitude ?? SIGNAL.NOISE_AMPLITUDE,
    }),
    samplesPerLine: lineSamples,
    samplesPerFrame: lineSamples * standard.linesPerFrame,
    timing: Object.freeze(timing),
    blanking: Object.freeze(blanking),
  });
}
