import { describe, it, expect } from 'vitest';
import { CompositeEncoder, convolveSame, createLowpassKernel, hammingWindow, frameToLuma, resizeBilinear } from '../src/encode';
import { createSignalConfig } from '../src/signal/config';
import { createFrame } from '../src/frames/types';
import { resampleLinear } from '../src/lib/resample';

function flatFrame(width: number, height: number, value: number) {
  const frame = createFrame(width, height);
  frame.data.fill(value);
  return frame;
}

describe('Low-pass filter', () => {
  it('should build a symmetric kernel with unit DC gain', () => {
    const kernel = createLowpassKernel(4.2e6, 10e6);
    expect(kernel.length).toBe(31);

    const sum = kernel.reduce((a, b) => a + b, 0);
    expect(sum).toBeCloseTo(1, 12);

    for (let i = 0; i < kernel.length; i++) {
      expect(kernel[i]).toBeCloseTo(kernel[kernel.length - 1 - i], 12);
    }
  });

  it('should reject even kernel lengths', () => {
    expect(() => createLowpassKernel(4.2e6, 10e6, 30)).toThrow(RangeError);
  });

  it('should produce the classic Hamming end points', () => {
    const w = hammingWindow(31);
    expect(w[0]).toBeCloseTo(0.08, 12);
    expect(w[15]).toBeCloseTo(1, 12);
    expect(hammingWindow(1)[0]).toBe(1);
  });

  it('should keep the signal length and pass DC in the interior', () => {
    const kernel = createLowpassKernel(4.2e6, 10e6);
    const signal = new Float32Array(200).fill(0.5);
    const out = convolveSame(signal, kernel);

    expect(out.length).toBe(200);
    expect(out[100]).toBeCloseTo(0.5, 6);
    // Zero padding pulls the edges down
    expect(out[0]).toBeLessThan(0.5);
  });

  it('should be the identity with a single unit tap', () => {
    const signal = Float32Array.from([1, 2, 3, 4]);
    expect(convolveSame(signal, Float64Array.from([1]))).toEqual(signal);
  });

  it('should centre a three-tap kernel', () => {
    const out = convolveSame(Float32Array.from([0, 0, 1, 0, 0]), Float64Array.from([0.25, 0.5, 0.25]));
    expect(Array.from(out)).toEqual([0, 0.25, 0.5, 0.25, 0]);
  });
});

describe('Luminance', () => {
  it('should weight RGB with Rec. 601 coefficients', () => {
    const frame = createFrame(1, 1, 3);
    frame.data.set([255, 0, 0]);
    expect(frameToLuma(frame).data[0]).toBeCloseTo(0.299, 6);
  });

  it('should leave a plane of the requested size untouched', () => {
    const plane = frameToLuma(flatFrame(4, 2, 51));
    expect(resizeBilinear(plane, 4, 2)).toBe(plane);
  });

  it('should keep flat planes flat when resizing', () => {
    const plane = frameToLuma(flatFrame(7, 5, 102));
    const out = resizeBilinear(plane, 16, 9);
    expect(out.data.length).toBe(144);
    for (const v of out.data) {
      expect(v).toBeCloseTo(0.4, 6);
    }
  });

  it('should reject frames whose buffer does not match the shape', () => {
    expect(() => frameToLuma({ width: 2, height: 2, channels: 1, data: new Uint8Array(3) })).toThrow(RangeError);
  });
});

describe('Linear resampling', () => {
  it('should map end points onto each other', () => {
    const out = resampleLinear([0, 10], 5);
    expect(Array.from(out)).toEqual([0, 2.5, 5, 7.5, 10]);
  });

  it('should return a copy for equal lengths', () => {
    expect(Array.from(resampleLinear([1, 2, 3], 3))).toEqual([1, 2, 3]);
  });
});

describe('Composite encoder', () => {
  const config = createSignalConfig({ width: 64, height: 48 });
  const encoder = new CompositeEncoder(config);
  const { samplesPerLine, timing, blanking } = config;

  it('should build blank lines from sync tip and blanking', () => {
    const line = encoder.encodeLine(null);
    expect(line.length).toBe(samplesPerLine);
    expect(line[0]).toBeCloseTo(-0.3, 6);
    expect(line[timing.syncSamples - 1]).toBeCloseTo(-0.3, 6);
    expect(line[timing.syncSamples]).toBe(0);
    expect(line[samplesPerLine - 1]).toBe(0);
  });

  it('should splice active pixels at the active start', () => {
    const pixels = new Float32Array(timing.activeSamples).fill(0.5);
    const line = encoder.encodeLine(pixels);
    expect(line[timing.activeStart - 1]).toBe(0);
    expect(line[timing.activeStart]).toBe(0.5);
    expect(line[timing.frontPorchStart - 1]).toBe(0.5);
    expect(line[timing.frontPorchStart]).toBe(0);
  });

  it('should emit exactly one frame of samples', () => {
    const out = encoder.encodeFrame(flatFrame(64, 48, 128));
    expect(out.length).toBe(config.samplesPerFrame);
  });

  it('should clip to [sync tip, white]', () => {
    const out = encoder.encodeFrame(flatFrame(64, 48, 255));
    let min = Infinity;
    let max = -Infinity;
    for (const v of out) {
      if (v < min) min = v;
      if (v > max) max = v;
    }
    expect(min).toBeGreaterThanOrEqual(Math.fround(-0.3));
    expect(max).toBeLessThanOrEqual(Math.fround(0.7));
  });

  it('should keep sync and blanking levels away from transitions', () => {
    const out = encoder.encodeFrame(flatFrame(64, 48, 255));
    const line = 5 * samplesPerLine;
    expect(out[line + 20]).toBeCloseTo(-0.3, 5);
    expect(out[line + 300]).toBeCloseTo(0, 5);
  });

  it('should map white pixels to the white level', () => {
    const out = encoder.encodeFrame(flatFrame(64, 48, 255));
    const row = (blanking.top + 10) * samplesPerLine;
    expect(out[row + timing.activeStart + 200]).toBeCloseTo(0.7, 5);
  });

  it('should map black pixels to the black level', () => {
    const out = encoder.encodeFrame(flatFrame(64, 48, 0));
    const row = (blanking.top + 10) * samplesPerLine;
    expect(out[row + timing.activeStart + 200]).toBeCloseTo(0.05, 5);
  });

  it('should be deterministic without noise', () => {
    const frame = flatFrame(64, 48, 77);
    expect(encoder.encodeFrame(frame)).toEqual(encoder.encodeFrame(frame));
  });

  it('should add noise only when enabled', () => {
    const noisy = new CompositeEncoder(
      createSignalConfig({ width: 64, height: 48, addNoise: true, noiseAmplitude: 0.05 }),
      { random: () => 0.3 }
    );
    const clean = encoder.encodeFrame(flatFrame(64, 48, 128));
    const withNoise = noisy.encodeFrame(flatFrame(64, 48, 128));
    const row = (blanking.top + 10) * samplesPerLine + timing.activeStart + 200;

    // Box-Muller with u = v = 0.3: sqrt(-2 ln 0.3) * cos(0.6 pi)
    const z = Math.sqrt(-2 * Math.log(0.3)) * Math.cos(2 * Math.PI * 0.3);
    expect(withNoise[row]).toBeCloseTo(clean[row] + z * 0.05, 5);
  });

  it('should accept RGB frames of another size', () => {
    const frame = createFrame(32, 24, 3);
    frame.data.fill(200);
    const out = encoder.encodeFrame(frame);
    expect(out.length).toBe(config.samplesPerFrame);
  });
});
