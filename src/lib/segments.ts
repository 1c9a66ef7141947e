/**
 * Active-line segment layout shared by the scrambler and descrambler
 *
 *   [0, syncEnd)                      sync region, never touched
 *   [syncEnd, syncEnd + activeLength) active region, split into segments
 *   [syncEnd + activeLength, end)     tail region, never touched
 *
 * syncEnd and frontPorchReserve are independent of the codec's own line
 * timing. checkCompatibility() reports where the two disagree.
 */
import type { ScrambleOperations, SignalMetadata } from '../container/metadata';
import type { LineTiming, VerticalBlanking } from '../signal/timing';
import { verticalBlanking } from '../signal/timing';
import { SCRAMBLE, type VoltageLevels } from '../utils/constants';

export interface ScrambleGeometry {
  readonly samplesPerLine: number;
  readonly linesPerFrame: number;
  readonly activeLines: number;
  readonly syncEnd: number;
  readonly frontPorchReserve: number;
  readonly segmentsPerLine: number;
  readonly levels: VoltageLevels;
  readonly activeLength: number;
  readonly segmentSize: number;
  readonly maxShift: number;
  readonly blanking: VerticalBlanking;
}

export interface GeometryOverrides {
  segmentsPerLine?: number;
  syncEnd?: number;
  frontPorchReserve?: number;
}

export type LineSplit =
  | { kind: 'transformed'; sync: Float32Array; segments: Float32Array[]; tail: Float32Array }
  | { kind: 'pass-through'; samples: Float32Array };

export interface CompatibilityReport {
  /** Scrambled region lies inside the codec's active video */
  insideActiveVideo: boolean;
  /** Active length is a whole number of segments */
  evenlyDivisible: boolean;
  /** Human-readable findings, empty when both checks pass */
  warnings: string[];
  /** Reserve that makes the active length divide evenly, when it does not */
  suggestedFrontPorchReserve?: number;
}

function assertNonNegativeInt(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}

export function createGeometry(params: {
  samplesPerLine: number;
  linesPerFrame: number;
  activeLines: number;
  syncEnd: number;
  frontPorchReserve: number;
  segmentsPerLine: number;
  levels: VoltageLevels;
}): ScrambleGeometry {
  assertNonNegativeInt(params.syncEnd, 'Sync end');
  assertNonNegativeInt(params.frontPorchReserve, 'Front porch reserve');
  if (!Number.isInteger(params.segmentsPerLine) || params.segmentsPerLine < 1) {
    throw new RangeError(`Segments per line must be a positive integer, got ${params.segmentsPerLine}`);
  }

  const activeLength = params.samplesPerLine - params.syncEnd - params.frontPorchReserve;
  const segmentSize = activeLength > 0 ? Math.floor(activeLength / params.segmentsPerLine) : 0;

  return Object.freeze({
    ...params,
    levels: Object.freeze({ ...params.levels }),
    activeLength,
    segmentSize,
    maxShift: Math.floor(segmentSize / 4),
    blanking: Object.freeze(verticalBlanking(params.linesPerFrame, params.activeLines)),
  });
}

/**
 * Geometry for a file. Explicit overrides win over the file's metadata,
 * which wins over the defaults.
 */
export function geometryFromMetadata(metadata: SignalMetadata, overrides: GeometryOverrides = {}): ScrambleGeometry {
  return createGeometry({
    samplesPerLine: metadata.samplesPerLine,
    linesPerFrame: metadata.linesPerFrame,
    activeLines: metadata.activeLines,
    syncEnd: overrides.syncEnd ?? metadata.syncEnd ?? SCRAMBLE.SYNC_END,
    frontPorchReserve: overrides.frontPorchReserve ?? metadata.frontPorchReserve ?? SCRAMBLE.FRONT_PORCH_RESERVE,
    segmentsPerLine: overrides.segmentsPerLine ?? metadata.segmentsPerLine ?? SCRAMBLE.SEGMENTS_PER_LINE,
    levels: metadata.levels,
  });
}

/**
 * Operation flags, resolved per flag with the same precedence
 */
export function resolveOperations(
  overrides: Partial<ScrambleOperations> = {},
  metadata?: SignalMetadata
): ScrambleOperations {
  const stored = metadata?.operations;
  return {
    permutation: overrides.permutation ?? stored?.permutation ?? true,
    inversion: overrides.inversion ?? stored?.inversion ?? true,
    shift: overrides.shift ?? stored?.shift ?? true,
  };
}

/**
 * Whether a line of the frame carries picture (and so gets scrambled)
 */
export function isActiveLine(geometry: ScrambleGeometry, lineIndex: number): boolean {
  const { top } = geometry.blanking;
  return lineIndex >= top && lineIndex < top + geometry.activeLines;
}

/**
 * Whether lines of this geometry can be segmented at all
 */
export function isSegmentable(geometry: ScrambleGeometry): boolean {
  return geometry.activeLength > 0
    && geometry.segmentSize > 0
    && geometry.activeLength % geometry.segmentsPerLine === 0
    && geometry.syncEnd + geometry.activeLength <= geometry.samplesPerLine;
}

/**
 * Split one line into regions. Segments are copies; the input is not aliased.
 */
export function splitLine(line: Float32Array, geometry: ScrambleGeometry): LineSplit {
  if (line.length !== geometry.samplesPerLine || !isSegmentable(geometry)) {
    return { kind: 'pass-through', samples: line.slice() };
  }

  const { syncEnd, activeLength, segmentSize, segmentsPerLine } = geometry;
  const segments: Float32Array[] = [];
  for (let i = 0; i < segmentsPerLine; i++) {
    const start = syncEnd + i * segmentSize;
    segments.push(line.slice(start, start + segmentSize));
  }

  return {
    kind: 'transformed',
    sync: line.slice(0, syncEnd),
    segments,
    tail: line.slice(syncEnd + activeLength),
  };
}

/**
 * Reassemble a line. The active region is padded (with its last sample)
 * or truncated to activeLength, the line to samplesPerLine (with blanking).
 */
export function joinLine(split: LineSplit, geometry: ScrambleGeometry): Float32Array {
  if (split.kind === 'pass-through') {
    return split.samples.slice();
  }

  const line = new Float32Array(geometry.samplesPerLine).fill(geometry.levels.blanking);
  line.set(split.sync.subarray(0, geometry.samplesPerLine), 0);

  const active = new Float32Array(geometry.activeLength);
  let offset = 0;
  for (const segment of split.segments) {
    const take = Math.min(segment.length, active.length - offset);
    if (take <= 0) break;
    active.set(segment.subarray(0, take), offset);
    offset += take;
  }
  if (offset > 0 && offset < active.length) {
    active.fill(active[offset - 1], offset);
  }

  const activeEnd = Math.min(geometry.samplesPerLine, geometry.syncEnd + active.length);
  line.set(active.subarray(0, activeEnd - geometry.syncEnd), geometry.syncEnd);
  line.set(split.tail.subarray(0, geometry.samplesPerLine - activeEnd), activeEnd);
  return line;
}

/**
 * Compare the scrambler's layout with the codec's line timing
 */
export function checkCompatibility(geometry: ScrambleGeometry, timing: LineTiming): CompatibilityReport {
  const warnings: string[] = [];
  const regionEnd = geometry.syncEnd + geometry.activeLength;

  const insideActiveVideo = geometry.activeLength > 0
    && geometry.syncEnd >= timing.activeStart
    && regionEnd <= timing.frontPorchStart;
  if (!insideActiveVideo) {
    warnings.push(
      `Scrambled region [${geometry.syncEnd}, ${regionEnd}) is not inside active video ` +
      `[${timing.activeStart}, ${timing.frontPorchStart})`
    );
  }

  const evenlyDivisible = geometry.activeLength > 0
    && geometry.segmentSize > 0
    && geometry.activeLength % geometry.segmentsPerLine === 0;

  let suggestedFrontPorchReserve: number | undefined;
  if (!evenlyDivisible) {
    warnings.push(
      `Active length ${geometry.activeLength} is not a multiple of ${geometry.segmentsPerLine} segments; ` +
      'lines will pass through unscrambled'
    );
    const remainder = geometry.activeLength % geometry.segmentsPerLine;
    if (geometry.activeLength > geometry.segmentsPerLine && remainder > 0) {
      suggestedFrontPorchReserve = geometry.frontPorchReserve + remainder;
    }
  }

  return { insideActiveVideo, evenlyDivisible, warnings, suggestedFrontPorchReserve };
}

export interface LineStats {
  transformed: number;
  passThrough: number;
  blanking: number;
}

/**
 * Run a segment transform over every active line of a frame. Blanking
 * lines and lines that cannot be segmented are copied unchanged.
 */
export function transformLines(
  signal: Float32Array,
  geometry: ScrambleGeometry,
  transformSegments: (segments: Float32Array[], lineIndex: number) => Float32Array[]
): { output: Float32Array; stats: LineStats } {
  const { samplesPerLine } = geometry;
  if (samplesPerLine < 1 || signal.length % samplesPerLine !== 0) {
    throw new RangeError(
      `Frame of ${signal.length} samples is not a whole number of ${samplesPerLine}-sample lines`
    );
  }

  const output = new Float32Array(signal.length);
  const stats: LineStats = { transformed: 0, passThrough: 0, blanking: 0 };
  const lineCount = signal.length / samplesPerLine;

  for (let lineIndex = 0; lineIndex < lineCount; lineIndex++) {
    const start = lineIndex * samplesPerLine;
    const line = signal.subarray(start, start + samplesPerLine);

    if (!isActiveLine(geometry, lineIndex)) {
      output.set(line, start);
      stats.blanking++;
      continue;
    }

    const split = splitLine(line, geometry);
    if (split.kind === 'pass-through') {
      output.set(split.samples, start);
      stats.passThrough++;
      continue;
    }

    const segments = transformSegments(split.segments, lineIndex);
    output.set(joinLine({ ...split, segments }, geometry), start);
    stats.transformed++;
  }

  return { output, stats };
}

/**
 * Reflect every sample about mid, in place
 */
export function reflectSegment(segment: Float32Array, mid: number): void {
  for (let i = 0; i < segment.length; i++) {
    segment[i] = mid - (segment[i] - mid);
  }
}

/**
 * Circular rotation: positive amounts move samples right
 */
export function rotateSegment(segment: Float32Array, amount: number): Float32Array {
  const n = segment.length;
  if (n === 0) return segment.slice();
  const k = ((amount % n) + n) % n;
  const out = new Float32Array(n);
  out.set(segment.subarray(n - k), 0);
  out.set(segment.subarray(0, n - k), k);
  return out;
}
