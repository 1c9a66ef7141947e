/**
 * Line timing model
 *
 * Converts a standard's microsecond timing into integer sample counts:
 *
 *   [sync][back porch][active video][front porch]
 *
 * The front porch absorbs the rounding remainder so the four regions
 * always add up to exactly one line.
 */
import type { AnalogStandard } from '../utils/constants';

export interface LineTiming {
  samplesPerLine: number;
  syncSamples: number;
  backPorchSamples: number;
  activeSamples: number;
  frontPorchSamples: number;
  syncStart: number;
  backPorchStart: number;
  activeStart: number;
  frontPorchStart: number;
}

export interface VerticalBlanking {
  top: number;
  bottom: number;
}

/**
 * Samples per line, truncated. A small epsilon keeps values such as
 * 635.9999999 from losing a sample to float error.
 */
export function samplesPerLine(lineDurationUs: number, sampleRate: number): number {
  return Math.floor((lineDurationUs * sampleRate) / 1e6 + 1e-6);
}

/**
 * Convert a duration to a sample count, rounded and clamped to at least 1
 */
export function usToSamples(durationUs: number, sampleRate: number): number {
  return Math.max(1, Math.round((durationUs * sampleRate) / 1e6));
}

/**
 * Build a LineTiming from explicit region sizes
 */
export function timingFromCounts(
  syncSamples: number,
  backPorchSamples: number,
  activeSamples: number,
  frontPorchSamples: number
): LineTiming {
  const backPorchStart = syncSamples;
  const activeStart = backPorchStart + backPorchSamples;
  const frontPorchStart = activeStart + activeSamples;
  return {
    samplesPerLine: frontPorchStart + frontPorchSamples,
    syncSamples,
    backPorchSamples,
    activeSamples,
    frontPorchSamples,
    syncStart: 0,
    backPorchStart,
    activeStart,
    frontPorchStart,
  };
}

export function computeTiming(standard: AnalogStandard, sampleRate: number): LineTiming {
  if (!(sampleRate > 0)) {
    throw new RangeError(`Sample rate must be positive, got ${sampleRate}`);
  }

  const lineSamples = samplesPerLine(standard.lineDurationUs, sampleRate);
  const sync = usToSamples(standard.hSyncDurationUs, sampleRate);
  const backPorch = usToSamples(standard.backPorchUs, sampleRate);
  let active = usToSamples(standard.activeVideoUs, sampleRate);
  let frontPorch = lineSamples - sync - backPorch - active;

  // Rounded regions overflow the line: shrink active, keep one porch sample
  if (frontPorch < 1) {
    active = lineSamples - sync - backPorch - 1;
    frontPorch = 1;
  }

  if (active < 1) {
    throw new RangeError(
      `Line of ${lineSamples} samples is too short for ${standard.name} timing at ${sampleRate} Hz`
    );
  }

  return timingFromCounts(sync, backPorch, active, frontPorch);
}

/**
 * Split the non-active lines of a frame into top and bottom blanking.
 * The bottom gets the odd line.
 */
export function verticalBlanking(linesPerFrame: number, activeLines: number): VerticalBlanking {
  if (activeLines > linesPerFrame) {
    throw new RangeError(`Active lines (${activeLines}) exceed lines per frame (${linesPerFrame})`);
  }
  const blank = linesPerFrame - activeLines;
  const top = Math.floor(blank / 2);
  return { top, bottom: blank - top };
}
