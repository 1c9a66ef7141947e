/**
 * Inverse of the keyed line scrambler
 *
 * Same segment layout and keystream artifacts, applied in reverse:
 * rotate left, reflect again, then the inverse permutation.
 */
import type { ScrambleOperations } from '../container/metadata';
import { invertPermutation, type KeystreamGenerator } from '../lib/keystream';
import { reflectSegment, rotateSegment, transformLines, type LineStats, type ScrambleGeometry } from '../lib/segments';
import { silentLogger, type Logger } from '../utils/logger';

export class Descrambler {
  readonly geometry: ScrambleGeometry;
  private readonly keystream: KeystreamGenerator;
  private readonly logger: Logger;
  lastFrameStats: LineStats = { transformed: 0, passThrough: 0, blanking: 0 };

  constructor(geometry: ScrambleGeometry, keystream: KeystreamGenerator, logger: Logger = silentLogger) {
    this.geometry = geometry;
    this.keystream = keystream;
    this.logger = logger;
  }

  descrambleSegments(
    segments: Float32Array[],
    frameIndex: number,
    lineIndex: number,
    operations: ScrambleOperations
  ): Float32Array[] {
    const { segmentsPerLine, maxShift, levels } = this.geometry;
    let out = segments.map(s => s.slice());

    if (operations.shift) {
      const shifts = this.keystream.getShifts(segmentsPerLine, maxShift, frameIndex, lineIndex);
      out = out.map((segment, i) => rotateSegment(segment, -shifts[i]));
    }

    // Reflection is its own inverse
    if (operations.inversion) {
      const inversions = this.keystream.getInversions(segmentsPerLine, frameIndex, lineIndex);
      const mid = (levels.black + levels.white) / 2;
      inversions.forEach((invert, i) => {
        if (invert) reflectSegment(out[i], mid);
      });
    }

    if (operations.permutation) {
      const inverse = invertPermutation(this.keystream.getPermutation(segmentsPerLine, frameIndex, lineIndex));
      out = inverse.map(src => out[src]);
    }

    return out;
  }

  descrambleFrame(signal: Float32Array, frameIndex: number, operations: ScrambleOperations): Float32Array {
    const { output, stats } = transformLines(signal, this.geometry, (segments, lineIndex) =>
      this.descrambleSegments(segments, frameIndex, lineIndex, operations)
    );
    this.lastFrameStats = stats;
    if (stats.passThrough > 0 && stats.transformed === 0) {
      this.logger.debug(`Frame ${frameIndex}: all ${stats.passThrough} active lines passed through`);
    }
    return output;
  }
}
