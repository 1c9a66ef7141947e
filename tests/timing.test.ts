import { describe, it, expect } from 'vitest';
import { computeTiming, samplesPerLine, timingFromCounts, usToSamples, verticalBlanking } from '../src/signal/timing';
import { createSignalConfig } from '../src/signal/config';
import { NTSC, PAL, getStandard } from '../src/utils/constants';

describe('Line timing', () => {
  it('should derive NTSC sample counts at 10 MHz', () => {
    const t = computeTiming(NTSC, 10_000_000);

    expect(t.samplesPerLine).toBe(635);
    expect(t.syncSamples).toBe(47);
    expect(t.backPorchSamples).toBe(47);
    expect(t.activeSamples).toBe(527);
    expect(t.frontPorchSamples).toBe(14);
    expect(t.activeStart).toBe(94);
    expect(t.frontPorchStart).toBe(621);
  });

  it('should sum regions to the line length for every standard and rate', () => {
    for (const standard of [NTSC, PAL]) {
      for (const rate of [1_000_000, 2_000_000, 10_000_000, 13_500_000, 27_000_000]) {
        const t = computeTiming(standard, rate);
        expect(t.syncSamples + t.backPorchSamples + t.activeSamples + t.frontPorchSamples)
          .toBe(samplesPerLine(standard.lineDurationUs, rate));
        expect(t.frontPorchSamples).toBeGreaterThanOrEqual(1);
      }
    }
  });

  it('should keep region offsets contiguous', () => {
    const t = computeTiming(PAL, 10_000_000);
    expect(t.syncStart).toBe(0);
    expect(t.backPorchStart).toBe(t.syncSamples);
    expect(t.activeStart).toBe(t.syncSamples + t.backPorchSamples);
    expect(t.frontPorchStart).toBe(t.activeStart + t.activeSamples);
  });

  it('should shrink active video when rounded regions overflow a short line', () => {
    const t = computeTiming(NTSC, 100_000);
    expect(t.samplesPerLine).toBe(6);
    expect(t.syncSamples).toBe(1);
    expect(t.backPorchSamples).toBe(1);
    expect(t.activeSamples).toBe(3);
    expect(t.frontPorchSamples).toBe(1);
  });

  it('should reject non-positive sample rates', () => {
    expect(() => computeTiming(NTSC, 0)).toThrow(RangeError);
    expect(() => computeTiming(NTSC, -5)).toThrow(RangeError);
  });

  it('should never round a duration below one sample', () => {
    expect(usToSamples(0.01, 1_000_000)).toBe(1);
    expect(usToSamples(4.7, 10_000_000)).toBe(47);
  });

  it('should build timing from explicit counts', () => {
    const t = timingFromCounts(10, 20, 300, 5);
    expect(t.samplesPerLine).toBe(335);
    expect(t.activeStart).toBe(30);
    expect(t.frontPorchStart).toBe(330);
  });
});

describe('Vertical blanking', () => {
  it('should put the odd blank line at the bottom', () => {
    expect(verticalBlanking(525, 480)).toEqual({ top: 22, bottom: 23 });
    expect(verticalBlanking(625, 576)).toEqual({ top: 24, bottom: 25 });
  });

  it('should allow a frame with no blanking', () => {
    expect(verticalBlanking(4, 4)).toEqual({ top: 0, bottom: 0 });
  });

  it('should reject more active lines than the frame has', () => {
    expect(() => verticalBlanking(10, 11)).toThrow(RangeError);
  });
});

describe('Signal config', () => {
  it('should use NTSC defaults', () => {
    const config = createSignalConfig();
    expect(config.standard.name).toBe('NTSC');
    expect(config.samplesPerLine).toBe(635);
    expect(config.samplesPerFrame).toBe(635 * 525);
    expect(config.width).toBe(640);
    expect(config.activeLines).toBe(480);
    expect(config.blanking).toEqual({ top: 22, bottom: 23 });
    expect(config.noise.enabled).toBe(false);
  });

  it('should be frozen', () => {
    const config = createSignalConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.timing)).toBe(true);
  });

  it('should validate dimensions and bandwidth', () => {
    expect(() => createSignalConfig({ width: 0 })).toThrow(RangeError);
    expect(() => createSignalConfig({ height: 600 })).toThrow(RangeError);
    expect(() => createSignalConfig({ bandwidthMhz: 0 })).toThrow(RangeError);
  });

  it('should look up standards by name', () => {
    expect(getStandard('pal')).toBe(PAL);
    expect(getStandard(' NTSC ')).toBe(NTSC);
    expect(() => getStandard('SECAM')).toThrow('Unknown analog standard');
  });
});
