/**
 * Keyed line scrambler
 *
 * Each active line's active region is cut into equal segments, then:
 *   1. Permutation: out[i] = segments[perm[i]]
 *   2. Inversion: flagged segments reflected about (black + white) / 2
 *   3. Shift: each segment rotated right by its shift amount
 *
 * Sync, tail and vertical blanking lines are copied unchanged, as are
 * lines whose active length does not split into whole segments.
 */
import type { ScrambleOperations } from '../container/metadata';
import type { KeystreamGenerator } from '../lib/keystream';
import { reflectSegment, rotateSegment, transformLines, type LineStats, type ScrambleGeometry } from '../lib/segments';
import { silentLogger, type Logger } from '../utils/logger';

export class Scrambler {
  readonly geometry: ScrambleGeometry;
  private readonly keystream: KeystreamGenerator;
  private readonly logger: Logger;
  lastFrameStats: LineStats = { transformed: 0, passThrough: 0, blanking: 0 };

  constructor(geometry: ScrambleGeometry, keystream: KeystreamGenerator, logger: Logger = silentLogger) {
    this.geometry = geometry;
    this.keystream = keystream;
    this.logger = logger;

    logger.debug(
      `Segments: ${geometry.segmentsPerLine} x ${geometry.segmentSize} samples, ` +
      `region [${geometry.syncEnd}, ${geometry.syncEnd + geometry.activeLength}), max shift ${geometry.maxShift}`
    );
  }

  /**
   * Scramble one line's segments: permute, invert, shift
   */
  scrambleSegments(
    segments: Float32Array[],
    frameIndex: number,
    lineIndex: number,
    operations: ScrambleOperations
  ): Float32Array[] {
    const { segmentsPerLine, maxShift, levels } = this.geometry;
    let out = segments.map(s => s.slice());

    if (operations.permutation) {
      const perm = this.keystream.getPermutation(segmentsPerLine, frameIndex, lineIndex);
      out = perm.map(src => out[src]);
    }

    if (operations.inversion) {
      const inversions = this.keystream.getInversions(segmentsPerLine, frameIndex, lineIndex);
      const mid = (levels.black + levels.white) / 2;
      inversions.forEach((invert, i) => {
        if (invert) reflectSegment(out[i], mid);
      });
    }

    if (operations.shift) {
      const shifts = this.keystream.getShifts(segmentsPerLine, maxShift, frameIndex, lineIndex);
      out = out.map((segment, i) => rotateSegment(segment, shifts[i]));
    }

    return out;
  }

  /**
   * Scramble a frame. Returns a new buffer of the same length.
   */
  scrambleFrame(signal: Float32Array, frameIndex: number, operations: ScrambleOperations): Float32Array {
    const { output, stats } = transformLines(signal, this.geometry, (segments, lineIndex) =>
      this.scrambleSegments(segments, frameIndex, lineIndex, operations)
    );
    this.lastFrameStats = stats;
    if (stats.passThrough > 0 && stats.transformed === 0) {
      this.logger.debug(`Frame ${frameIndex}: all ${stats.passThrough} active lines passed through`);
    }
    return output;
  }
}
