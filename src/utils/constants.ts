export interface VoltageLevels {
  readonly syncTip: number;
  readonly blanking: number;
  readonly black: number;
  readonly white: number;
}

export interface AnalogStandard {
  readonly name: string;
  readonly linesPerFrame: number;
  readonly fps: number;
  readonly lineDurationUs: number;
  readonly hSyncDurationUs: number;
  readonly backPorchUs: number;
  readonly frontPorchUs: number;
  readonly activeVideoUs: number;
  readonly levels: VoltageLevels;
}

// Normalized levels relative to blanking (0.0)
const COMPOSITE_LEVELS: VoltageLevels = Object.freeze({
  syncTip: -0.3,
  blanking: 0.0,
  black: 0.05,
  white: 0.7,
});

// NTSC: 525 lines, 63.556 us per line
export const NTSC: AnalogStandard = Object.freeze({
  name: 'NTSC',
  linesPerFrame: 525,
  fps: 29.97,
  lineDurationUs: 63.556,
  hSyncDurationUs: 4.7,
  backPorchUs: 4.7,
  frontPorchUs: 1.5,
  activeVideoUs: 52.656,
  levels: COMPOSITE_LEVELS,
});

// PAL: 625 lines, 64 us per line
export const PAL: AnalogStandard = Object.freeze({
  name: 'PAL',
  linesPerFrame: 625,
  fps: 25.0,
  lineDurationUs: 64.0,
  hSyncDurationUs: 4.7,
  backPorchUs: 5.7,
  frontPorchUs: 1.65,
  activeVideoUs: 51.95,
  levels: COMPOSITE_LEVELS,
});

export const STANDARDS: Readonly<Record<'NTSC' | 'PAL', AnalogStandard>> = Object.freeze({
  NTSC,
  PAL,
});

/**
 * Look up a built-in standard by name (case-insensitive)
 */
export function getStandard(name: string): AnalogStandard {
  const key = name.trim().toUpperCase();
  if (key === 'NTSC' || key === 'PAL') {
    return STANDARDS[key];
  }
  throw new Error(`Unknown analog standard: "${name}" (expected NTSC or PAL)`);
}

// Signal generation defaults
export const SIGNAL = {
  SAMPLE_RATE: 10_000_000,      // 10 MHz sampling
  WIDTH: 640,
  HEIGHT: 480,                  // Also the number of active lines
  BANDWIDTH_MHZ: 4.2,           // NTSC luminance bandwidth
  NOISE_AMPLITUDE: 0.02,
  FILTER_TAPS: 31,              // Must be odd
} as const;

// Scrambler line layout defaults
// SYNC_END covers sync + back porch at 10 MHz NTSC (47 + 47 samples)
export const SCRAMBLE = {
  SYNC_END: 94,
  FRONT_PORCH_RESERVE: 15,
  SEGMENTS_PER_LINE: 16,
  METHOD: 'crypto',
  // Recorded when the PRNG keystream was used, so descrambling picks it again
  METHOD_FALLBACK: 'crypto-prng',
} as const;

// Container file format
export const CONTAINER = {
  MAGIC: 'ANLG',
  VERSION: 1,
  HEADER_PREFIX_SIZE: 12,       // magic + version + metadata length
  BYTES_PER_SAMPLE: 4,          // float32 LE
  MAX_METADATA_BYTES: 1024 * 1024,
  FILE_EXTENSION: '.analog',
} as const;

export const KEY_SIZE = 32;
