/**
 * Tests for the keyed line scrambler and descrambler
 */

import { describe, it, expect } from 'vitest';
import { Scrambler } from '../src/encode/scramble';
import { Descrambler } from '../src/decode/descramble';
import { KeystreamGenerator } from '../src/lib/keystream';
import { createGeometry, type ScrambleGeometry } from '../src/lib/segments';
import type { ScrambleOperations } from '../src/container/metadata';
import { NTSC } from '../src/utils/constants';

// Fixed 32-byte test key: 00 01 02 ... 1f
const KEY = Uint8Array.from({ length: 32 }, (_, i) => i);

const SYNC_END = 20;
const RESERVE = 10;

function geometry(activeLength: number, segmentsPerLine: number, linesPerFrame = 1, activeLines = 1): ScrambleGeometry {
  return createGeometry({
    samplesPerLine: SYNC_END + activeLength + RESERVE,
    linesPerFrame,
    activeLines,
    syncEnd: SYNC_END,
    frontPorchReserve: RESERVE,
    segmentsPerLine,
    levels: NTSC.levels,
  });
}

/**
 * One line: sync tip, then segment s holding s*100 + k, then blanking
 */
function rampLine(g: ScrambleGeometry): Float32Array {
  const line = new Float32Array(g.samplesPerLine);
  line.fill(-0.3, 0, g.syncEnd);
  for (let s = 0; s < g.segmentsPerLine; s++) {
    for (let k = 0; k < g.segmentSize; k++) {
      line[g.syncEnd + s * g.segmentSize + k] = s * 100 + k;
    }
  }
  return line;
}

function rampFrame(g: ScrambleGeometry): Float32Array {
  const frame = new Float32Array(g.samplesPerLine * g.linesPerFrame);
  const line = rampLine(g);
  for (let i = 0; i < g.linesPerFrame; i++) {
    // Offset each line so lines are distinguishable
    const shifted = line.map((v, j) => (j >= g.syncEnd ? v + i * 1000 : v));
    frame.set(shifted, i * g.samplesPerLine);
  }
  return frame;
}

function segmentOf(signal: Float32Array, g: ScrambleGeometry, line: number, index: number): number[] {
  const start = line * g.samplesPerLine + g.syncEnd + index * g.segmentSize;
  return Array.from(signal.subarray(start, start + g.segmentSize));
}

const ALL_OPERATIONS: ScrambleOperations[] = [];
for (const permutation of [false, true]) {
  for (const inversion of [false, true]) {
    for (const shift of [false, true]) {
      ALL_OPERATIONS.push({ permutation, inversion, shift });
    }
  }
}

const ALL_ON: ScrambleOperations = { permutation: true, inversion: true, shift: true };

describe('Scrambler', () => {
  const keystream = KeystreamGenerator.fromKey(KEY);

  describe('Ramp line with 4 segments of 100 samples', () => {
    const g = geometry(400, 4);
    const scrambler = new Scrambler(g, keystream);
    const descrambler = new Descrambler(g, keystream);
    const original = rampLine(g);

    it('should split the active region into 4 segments of 100', () => {
      expect(g.segmentSize).toBe(100);
      expect(g.maxShift).toBe(25);
    });

    it('should change the line', () => {
      const scrambled = scrambler.scrambleFrame(original, 0, ALL_ON);
      expect(scrambled).not.toEqual(original);
      expect(scrambler.lastFrameStats).toEqual({ transformed: 1, passThrough: 0, blanking: 0 });
    });

    it('should restore the exact ramp', () => {
      const scrambled = scrambler.scrambleFrame(original, 0, ALL_ON);
      expect(descrambler.descrambleFrame(scrambled, 0, ALL_ON)).toEqual(original);
    });

    it('should not restore the ramp for another frame index', () => {
      const scrambled = scrambler.scrambleFrame(original, 0, ALL_ON);
      expect(descrambler.descrambleFrame(scrambled, 1, ALL_ON)).not.toEqual(original);
    });

    it('should not restore the ramp with another key', () => {
      const other = new Descrambler(g, KeystreamGenerator.fromKey(Uint8Array.from({ length: 32 }, (_, i) => 31 - i)));
      const scrambled = scrambler.scrambleFrame(original, 0, ALL_ON);
      expect(other.descrambleFrame(scrambled, 0, ALL_ON)).not.toEqual(original);
    });

    it('should permute whole segments', () => {
      const scrambled = scrambler.scrambleFrame(original, 7, { permutation: true, inversion: false, shift: false });
      const perm = keystream.getPermutation(4, 7, 0);
      for (let i = 0; i < 4; i++) {
        expect(segmentOf(scrambled, g, 0, i)).toEqual(segmentOf(original, g, 0, perm[i]));
      }
    });

    it('should reflect flagged segments about the mid level', () => {
      const scrambled = scrambler.scrambleFrame(original, 3, { permutation: false, inversion: true, shift: false });
      const inversions = keystream.getInversions(4, 3, 0);
      for (let i = 0; i < 4; i++) {
        const expected = segmentOf(original, g, 0, i).map(v => (inversions[i] ? 0.75 - v : v));
        expect(segmentOf(scrambled, g, 0, i)).toEqual(expected);
      }
    });

    it('should rotate each segment right by its shift', () => {
      const scrambled = scrambler.scrambleFrame(original, 2, { permutation: false, inversion: false, shift: true });
      const shifts = keystream.getShifts(4, 25, 2, 0);
      for (let i = 0; i < 4; i++) {
        const source = segmentOf(original, g, 0, i);
        const out = segmentOf(scrambled, g, 0, i);
        for (let k = 0; k < 100; k++) {
          expect(out[(k + shifts[i]) % 100]).toBe(source[k]);
        }
      }
    });

    it('should leave the line alone with every operation disabled', () => {
      const none = { permutation: false, inversion: false, shift: false };
      expect(scrambler.scrambleFrame(original, 0, none)).toEqual(original);
    });
  });

  describe('Round trip for every operation subset', () => {
    const g = geometry(160, 8, 12, 8);
    const scrambler = new Scrambler(g, keystream);
    const descrambler = new Descrambler(g, keystream);
    const frame = rampFrame(g);

    for (const ops of ALL_OPERATIONS) {
      const name = `permutation=${ops.permutation} inversion=${ops.inversion} shift=${ops.shift}`;

      it(`should invert ${name}`, () => {
        for (const frameIndex of [0, 1, 29, 1000]) {
          const scrambled = scrambler.scrambleFrame(frame, frameIndex, ops);
          expect(scrambled.length).toBe(frame.length);
          expect(descrambler.descrambleFrame(scrambled, frameIndex, ops)).toEqual(frame);
        }
      });
    }
  });

  describe('Sync and blanking preservation', () => {
    const g = geometry(160, 8, 12, 8);
    const scrambler = new Scrambler(g, keystream);
    const frame = rampFrame(g);

    for (const ops of ALL_OPERATIONS) {
      it(`should keep sync, tail and blanking lines with ${JSON.stringify(ops)}`, () => {
        const scrambled = scrambler.scrambleFrame(frame, 5, ops);
        const spl = g.samplesPerLine;

        for (let line = 0; line < g.linesPerFrame; line++) {
          const start = line * spl;
          const active = line >= g.blanking.top && line < g.blanking.top + g.activeLines;
          if (!active) {
            expect(scrambled.subarray(start, start + spl)).toEqual(frame.subarray(start, start + spl));
            continue;
          }
          expect(scrambled.subarray(start, start + g.syncEnd)).toEqual(frame.subarray(start, start + g.syncEnd));
          const tail = start + g.syncEnd + g.activeLength;
          expect(scrambled.subarray(tail, start + spl)).toEqual(frame.subarray(tail, start + spl));
        }
      });
    }

    it('should count lines by kind', () => {
      scrambler.scrambleFrame(frame, 0, ALL_ON);
      expect(scrambler.lastFrameStats).toEqual({ transformed: 8, passThrough: 0, blanking: 4 });
    });
  });

  describe('Fallback on misaligned geometry', () => {
    const g = geometry(161, 8, 4, 2);
    const scrambler = new Scrambler(g, keystream);
    const descrambler = new Descrambler(g, keystream);
    const frame = Float32Array.from({ length: g.samplesPerLine * 4 }, (_, i) => (i % 97) / 200);

    it('should copy every line unchanged', () => {
      const scrambled = scrambler.scrambleFrame(frame, 0, ALL_ON);
      expect(scrambled).toEqual(frame);
      expect(scrambler.lastFrameStats).toEqual({ transformed: 0, passThrough: 2, blanking: 2 });
      expect(descrambler.descrambleFrame(scrambled, 0, ALL_ON)).toEqual(frame);
    });

    it('should not alias the input buffer', () => {
      const scrambled = scrambler.scrambleFrame(frame, 0, ALL_ON);
      expect(scrambled).not.toBe(frame);
    });
  });

  describe('Input validation', () => {
    const g = geometry(40, 4);
    const scrambler = new Scrambler(g, keystream);

    it('should reject frames that are not a whole number of lines', () => {
      expect(() => scrambler.scrambleFrame(new Float32Array(g.samplesPerLine + 1), 0, ALL_ON)).toThrow(RangeError);
    });

    it('should accept an empty frame', () => {
      expect(scrambler.scrambleFrame(new Float32Array(0), 0, ALL_ON)).toHaveLength(0);
    });
  });

  describe('Fallback keystream', () => {
    const g = geometry(160, 8, 12, 8);
    const prng = KeystreamGenerator.fromKey(KEY, 'fallback');
    const frame = rampFrame(g);

    it('should round-trip with the PRNG backend', () => {
      const scrambled = new Scrambler(g, prng).scrambleFrame(frame, 3, ALL_ON);
      expect(scrambled).not.toEqual(frame);
      expect(new Descrambler(g, prng).descrambleFrame(scrambled, 3, ALL_ON)).toEqual(frame);
    });

    it('should not be undone by the cipher backend', () => {
      const scrambled = new Scrambler(g, prng).scrambleFrame(frame, 3, ALL_ON);
      expect(new Descrambler(g, keystream).descrambleFrame(scrambled, 3, ALL_ON)).not.toEqual(frame);
    });
  });
});
