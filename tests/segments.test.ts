import { describe, it, expect } from 'vitest';
import {
  checkCompatibility,
  createGeometry,
  geometryFromMetadata,
  isActiveLine,
  joinLine,
  reflectSegment,
  resolveOperations,
  rotateSegment,
  splitLine,
} from '../src/lib/segments';
import { MetadataBuilder } from '../src/container/metadata';
import { computeTiming } from '../src/signal/timing';
import { createSignalConfig } from '../src/signal/config';
import { NTSC } from '../src/utils/constants';

const metadata = MetadataBuilder.fromConfig(createSignalConfig(), new Date('2024-01-01T00:00:00Z')).build();

function smallGeometry(activeLength = 40, segmentsPerLine = 4) {
  return createGeometry({
    samplesPerLine: 5 + activeLength + 3,
    linesPerFrame: 4,
    activeLines: 2,
    syncEnd: 5,
    frontPorchReserve: 3,
    segmentsPerLine,
    levels: NTSC.levels,
  });
}

describe('Scramble geometry', () => {
  it('should derive the default NTSC layout', () => {
    const g = geometryFromMetadata(metadata);
    expect(g.syncEnd).toBe(94);
    expect(g.frontPorchReserve).toBe(15);
    expect(g.activeLength).toBe(526);
    expect(g.segmentsPerLine).toBe(16);
    expect(g.segmentSize).toBe(32);
    expect(g.maxShift).toBe(8);
    expect(g.blanking).toEqual({ top: 22, bottom: 23 });
  });

  it('should prefer overrides, then metadata, then defaults', () => {
    const scrambled = MetadataBuilder.from(metadata)
      .withScrambling({
        method: 'crypto',
        segmentsPerLine: 8,
        operations: { permutation: true, inversion: true, shift: true },
        syncEnd: 100,
        frontPorchReserve: 20,
      })
      .build();

    const fromFile = geometryFromMetadata(scrambled);
    expect(fromFile.segmentsPerLine).toBe(8);
    expect(fromFile.syncEnd).toBe(100);

    const overridden = geometryFromMetadata(scrambled, { segmentsPerLine: 2 });
    expect(overridden.segmentsPerLine).toBe(2);
    expect(overridden.syncEnd).toBe(100);
    expect(overridden.frontPorchReserve).toBe(20);
  });

  it('should reject invalid parameters', () => {
    expect(() => smallGeometry(40, 0)).toThrow(RangeError);
    expect(() => createGeometry({ ...smallGeometry(), syncEnd: -1 })).toThrow(RangeError);
  });

  it('should mark only the centred lines as active', () => {
    const g = smallGeometry();
    expect([0, 1, 2, 3].map(i => isActiveLine(g, i))).toEqual([false, true, true, false]);
  });
});

describe('Operation flags', () => {
  it('should enable everything by default', () => {
    expect(resolveOperations()).toEqual({ permutation: true, inversion: true, shift: true });
  });

  it('should take stored flags unless overridden', () => {
    const scrambled = MetadataBuilder.from(metadata)
      .withScrambling({
        method: 'crypto',
        segmentsPerLine: 16,
        operations: { permutation: false, inversion: true, shift: false },
        syncEnd: 94,
        frontPorchReserve: 15,
      })
      .build();

    expect(resolveOperations({}, scrambled)).toEqual({ permutation: false, inversion: true, shift: false });
    expect(resolveOperations({ shift: true }, scrambled)).toEqual({ permutation: false, inversion: true, shift: true });
  });
});

describe('Line split and join', () => {
  it('should split into sync, equal segments and tail', () => {
    const g = smallGeometry();
    const line = Float32Array.from({ length: g.samplesPerLine }, (_, i) => i);
    const split = splitLine(line, g);

    expect(split.kind).toBe('transformed');
    if (split.kind !== 'transformed') return;
    expect(Array.from(split.sync)).toEqual([0, 1, 2, 3, 4]);
    expect(split.segments).toHaveLength(4);
    expect(Array.from(split.segments[1])).toEqual([15, 16, 17, 18, 19, 20, 21, 22, 23, 24]);
    expect(Array.from(split.tail)).toEqual([45, 46, 47]);
    expect(joinLine(split, g)).toEqual(line);
  });

  it('should pass through when the active length does not divide evenly', () => {
    const g = smallGeometry(41);
    const line = new Float32Array(g.samplesPerLine).fill(0.2);
    const split = splitLine(line, g);
    expect(split.kind).toBe('pass-through');
    expect(joinLine(split, g)).toEqual(line);
  });

  it('should pass through when segments would be empty', () => {
    const g = smallGeometry(3, 4);
    expect(g.segmentSize).toBe(0);
    expect(splitLine(new Float32Array(g.samplesPerLine), g).kind).toBe('pass-through');
  });

  it('should pass through when the sync region covers the line', () => {
    const g = createGeometry({ ...smallGeometry(), syncEnd: 60 });
    expect(g.activeLength).toBeLessThan(0);
    expect(splitLine(new Float32Array(g.samplesPerLine), g).kind).toBe('pass-through');
  });

  it('should pad a short active region with its last sample', () => {
    const g = smallGeometry(8, 2);
    const joined = joinLine({
      kind: 'transformed',
      sync: new Float32Array(5).fill(-0.3),
      segments: [Float32Array.from([1, 2, 3]), Float32Array.from([4, 5, 6])],
      tail: new Float32Array(3),
    }, g);
    expect(Array.from(joined.subarray(5, 13))).toEqual([1, 2, 3, 4, 5, 6, 6, 6]);
    expect(joined.length).toBe(g.samplesPerLine);
  });

  it('should pad a short line with blanking', () => {
    const g = smallGeometry(8, 2);
    const joined = joinLine({
      kind: 'transformed',
      sync: new Float32Array(5).fill(-0.3),
      segments: [new Float32Array(4).fill(0.5), new Float32Array(4).fill(0.5)],
      tail: new Float32Array(0),
    }, g);
    expect(Array.from(joined.subarray(13))).toEqual([0, 0, 0]);
  });
});

describe('Segment rotation', () => {
  it('should rotate right for positive amounts', () => {
    expect(Array.from(rotateSegment(Float32Array.from([1, 2, 3, 4, 5]), 2))).toEqual([4, 5, 1, 2, 3]);
  });

  it('should rotate left for negative amounts', () => {
    expect(Array.from(rotateSegment(Float32Array.from([1, 2, 3, 4, 5]), -2))).toEqual([3, 4, 5, 1, 2]);
  });

  it('should wrap amounts larger than the segment', () => {
    expect(Array.from(rotateSegment(Float32Array.from([1, 2, 3]), 4))).toEqual([3, 1, 2]);
  });
});

describe('Segment reflection', () => {
  const MID = (0.05 + 0.7) / 2;

  it('should mirror samples about the mid level', () => {
    const segment = Float32Array.from([0.375, 0.125, 0.625]);
    reflectSegment(segment, MID);
    expect(Array.from(segment)).toEqual([0.375, 0.625, 0.125]);
  });

  it('should come back within float32 rounding near black', () => {
    const original = Float32Array.from([0.05, 0.0612345, 0.1, 0.2]);
    const segment = original.slice();
    reflectSegment(segment, MID);
    reflectSegment(segment, MID);
    for (let i = 0; i < original.length; i++) {
      expect(Math.abs(segment[i] - original[i])).toBeLessThanOrEqual(2 ** -24);
    }
  });

  it('should be exact on dyadic levels', () => {
    const original = Float32Array.from([0.25, 0.5, 0.75, 0]);
    const segment = original.slice();
    reflectSegment(segment, MID);
    reflectSegment(segment, MID);
    expect(segment).toEqual(original);
  });
});

describe('Compatibility check', () => {
  const timing = computeTiming(NTSC, 10_000_000);

  it('should flag the default NTSC layout as not evenly divisible', () => {
    const report = checkCompatibility(geometryFromMetadata(metadata), timing);
    expect(report.insideActiveVideo).toBe(true);
    expect(report.evenlyDivisible).toBe(false);
    expect(report.suggestedFrontPorchReserve).toBe(29);
    expect(report.warnings).toEqual([
      'Active length 526 is not a multiple of 16 segments; lines will pass through unscrambled',
    ]);
  });

  it('should accept the suggested reserve', () => {
    const report = checkCompatibility(geometryFromMetadata(metadata, { frontPorchReserve: 29 }), timing);
    expect(report.evenlyDivisible).toBe(true);
    expect(report.insideActiveVideo).toBe(true);
    expect(report.warnings).toEqual([]);
  });

  it('should flag a region that starts inside the back porch', () => {
    const report = checkCompatibility(geometryFromMetadata(metadata, { syncEnd: 50, frontPorchReserve: 73 }), timing);
    expect(report.evenlyDivisible).toBe(true);
    expect(report.insideActiveVideo).toBe(false);
    expect(report.warnings[0]).toBe('Scrambled region [50, 562) is not inside active video [94, 621)');
  });
});
