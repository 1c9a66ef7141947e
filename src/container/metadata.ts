/**
 * Container metadata
 *
 * On disk the metadata block is a JSON document with snake_case keys.
 * In memory it is a frozen camelCase SignalMetadata record, assembled
 * once through MetadataBuilder before a writer is opened.
 */
import { z } from 'zod';
import type { SignalConfig } from '../signal/config';
import type { VoltageLevels } from '../utils/constants';

export interface ScrambleOperations {
  permutation: boolean;
  inversion: boolean;
  shift: boolean;
}

export interface TimingCounts {
  syncSamples: number;
  backPorchSamples: number;
  activeSamples: number;
  frontPorchSamples: number;
}

export interface SignalMetadata {
  readonly standard: string;
  readonly sampleRate: number;
  readonly resolution: readonly [number, number];
  readonly linesPerFrame: number;
  readonly fps: number;
  readonly samplesPerLine: number;
  readonly samplesPerFrame: number;
  readonly activeLines: number;
  readonly bandwidthMhz: number;
  readonly levels: VoltageLevels;
  readonly timestamp: string;
  readonly timing?: Readonly<TimingCounts>;
  readonly scramblingMethod?: string;
  readonly segmentsPerLine?: number;
  readonly operations?: Readonly<ScrambleOperations>;
  readonly syncEnd?: number;
  readonly frontPorchReserve?: number;
  readonly scrambled?: boolean;
  readonly descrambled?: boolean;
  /** Keys this version does not know about, kept verbatim */
  readonly extra: Readonly<Record<string, unknown>>;
}

// ============================================================================
// Document schema
// ============================================================================

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().min(0);

const voltageLevelsSchema = z.object({
  sync_tip: z.number(),
  blanking: z.number(),
  black: z.number(),
  white: z.number(),
}).refine((levels) => levels.white > levels.black, {
  message: 'white level must be above black level',
});

const operationsSchema = z.object({
  permutation: z.boolean(),
  inversion: z.boolean(),
  shift: z.boolean(),
});

const timingSchema = z.object({
  sync_samples: positiveInt,
  back_porch_samples: positiveInt,
  active_samples: positiveInt,
  front_porch_samples: positiveInt,
});

export const metadataDocumentSchema = z.object({
  standard: z.string().min(1),
  sample_rate: z.number().positive(),
  resolution: z.tuple([positiveInt, positiveInt]),
  lines_per_frame: positiveInt,
  fps: z.number().positive(),
  samples_per_line: positiveInt,
  samples_per_frame: positiveInt,
  active_lines: positiveInt.optional(),
  bandwidth_mhz: z.number().positive(),
  voltage_levels: voltageLevelsSchema,
  timestamp: z.string(),
  timing: timingSchema.optional(),
  scrambling_method: z.string().optional(),
  segments_per_line: positiveInt.optional(),
  operations: operationsSchema.optional(),
  sync_end: nonNegativeInt.optional(),
  front_porch_reserve: nonNegativeInt.optional(),
  scrambled: z.boolean().optional(),
  descrambled: z.boolean().optional(),
}).passthrough()
  .refine((doc) => doc.samples_per_frame === doc.samples_per_line * doc.lines_per_frame, {
    message: 'samples_per_frame must equal samples_per_line * lines_per_frame',
  })
  .refine((doc) => (doc.active_lines ?? doc.resolution[1]) <= doc.lines_per_frame, {
    message: 'active_lines exceeds lines_per_frame',
  });

export type MetadataDocument = z.infer<typeof metadataDocumentSchema>;

const KNOWN_KEYS = new Set([
  'standard', 'sample_rate', 'resolution', 'lines_per_frame', 'fps',
  'samples_per_line', 'samples_per_frame', 'active_lines', 'bandwidth_mhz',
  'voltage_levels', 'timestamp', 'timing', 'scrambling_method',
  'segments_per_line', 'operations', 'sync_end', 'front_porch_reserve',
  'scrambled', 'descrambled',
]);

// ============================================================================
// Mapping
// ============================================================================

function freezeMetadata(meta: SignalMetadata): SignalMetadata {
  Object.freeze(meta.resolution);
  Object.freeze(meta.levels);
  if (meta.timing) Object.freeze(meta.timing);
  if (meta.operations) Object.freeze(meta.operations);
  Object.freeze(meta.extra);
  return Object.freeze(meta);
}

/**
 * Map a validated document to SignalMetadata
 */
export function fromDocument(doc: MetadataDocument): SignalMetadata {
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(doc)) {
    if (!KNOWN_KEYS.has(key)) extra[key] = value;
  }

  return freezeMetadata({
    standard: doc.standard,
    sampleRate: doc.sample_rate,
    resolution: [doc.resolution[0], doc.resolution[1]],
    linesPerFrame: doc.lines_per_frame,
    fps: doc.fps,
    samplesPerLine: doc.samples_per_line,
    samplesPerFrame: doc.samples_per_frame,
    activeLines: doc.active_lines ?? doc.resolution[1],
    bandwidthMhz: doc.bandwidth_mhz,
    levels: {
      syncTip: doc.voltage_levels.sync_tip,
      blanking: doc.voltage_levels.blanking,
      black: doc.voltage_levels.black,
      white: doc.voltage_levels.white,
    },
    timestamp: doc.timestamp,
    timing: doc.timing && {
      syncSamples: doc.timing.sync_samples,
      backPorchSamples: doc.timing.back_porch_samples,
      activeSamples: doc.timing.active_samples,
      frontPorchSamples: doc.timing.front_porch_samples,
    },
    scramblingMethod: doc.scrambling_method,
    segmentsPerLine: doc.segments_per_line,
    operations: doc.operations && { ...doc.operations },
    syncEnd: doc.sync_end,
    frontPorchReserve: doc.front_porch_reserve,
    scrambled: doc.scrambled,
    descrambled: doc.descrambled,
    extra,
  });
}

/**
 * Map SignalMetadata to its on-disk document. Unset optional fields are left out.
 */
export function toDocument(meta: SignalMetadata): Record<string, unknown> {
  const doc: Record<string, unknown> = {
    standard: meta.standard,
    sample_rate: meta.sampleRate,
    resolution: [...meta.resolution],
    lines_per_frame: meta.linesPerFrame,
    fps: meta.fps,
    samples_per_line: meta.samplesPerLine,
    samples_per_frame: meta.samplesPerFrame,
    active_lines: meta.activeLines,
    bandwidth_mhz: meta.bandwidthMhz,
    voltage_levels: {
      sync_tip: meta.levels.syncTip,
      blanking: meta.levels.blanking,
      black: meta.levels.black,
      white: meta.levels.white,
    },
    timestamp: meta.timestamp,
  };

  if (meta.timing) {
    doc.timing = {
      sync_samples: meta.timing.syncSamples,
      back_porch_samples: meta.timing.backPorchSamples,
      active_samples: meta.timing.activeSamples,
      front_porch_samples: meta.timing.frontPorchSamples,
    };
  }
  if (meta.scramblingMethod !== undefined) doc.scrambling_method = meta.scramblingMethod;
  if (meta.segmentsPerLine !== undefined) doc.segments_per_line = meta.segmentsPerLine;
  if (meta.operations) doc.operations = { ...meta.operations };
  if (meta.syncEnd !== undefined) doc.sync_end = meta.syncEnd;
  if (meta.frontPorchReserve !== undefined) doc.front_porch_reserve = meta.frontPorchReserve;
  if (meta.scrambled !== undefined) doc.scrambled = meta.scrambled;
  if (meta.descrambled !== undefined) doc.descrambled = meta.descrambled;

  for (const [key, value] of Object.entries(meta.extra)) {
    if (!(key in doc)) doc[key] = value;
  }

  return doc;
}

// ============================================================================
// Builder
// ============================================================================

type Draft = { -readonly [K in keyof SignalMetadata]: SignalMetadata[K] };

export interface ScramblingSettings {
  method: string;
  segmentsPerLine: number;
  operations: ScrambleOperations;
  syncEnd: number;
  frontPorchReserve: number;
}

/**
 * Assembles a metadata record step by step; build() freezes it.
 * Every "update before the header is written" happens here.
 */
export class MetadataBuilder {
  private draft: Draft;

  private constructor(draft: Draft) {
    this.draft = draft;
  }

  static fromConfig(config: SignalConfig, now: Date = new Date()): MetadataBuilder {
    const { standard, timing } = config;
    return new MetadataBuilder({
      standard: standard.name,
      sampleRate: config.sampleRate,
      resolution: [config.width, config.activeLines],
      linesPerFrame: standard.linesPerFrame,
      fps: standard.fps,
      samplesPerLine: config.samplesPerLine,
      samplesPerFrame: config.samplesPerFrame,
      activeLines: config.activeLines,
      bandwidthMhz: config.bandwidthMhz,
      levels: { ...standard.levels },
      timestamp: now.toISOString(),
      timing: {
        syncSamples: timing.syncSamples,
        backPorchSamples: timing.backPorchSamples,
        activeSamples: timing.activeSamples,
        frontPorchSamples: timing.frontPorchSamples,
      },
      extra: {},
    });
  }

  /**
   * Start from an existing record (e.g. the input file's metadata)
   */
  static from(meta: SignalMetadata): MetadataBuilder {
    return new MetadataBuilder({
      ...meta,
      resolution: [meta.resolution[0], meta.resolution[1]],
      levels: { ...meta.levels },
      timing: meta.timing && { ...meta.timing },
      operations: meta.operations && { ...meta.operations },
      extra: { ...meta.extra },
    });
  }

  withScrambling(settings: ScramblingSettings): this {
    this.draft.scramblingMethod = settings.method;
    this.draft.segmentsPerLine = settings.segmentsPerLine;
    this.draft.operations = { ...settings.operations };
    this.draft.syncEnd = settings.syncEnd;
    this.draft.frontPorchReserve = settings.frontPorchReserve;
    return this;
  }

  markScrambled(): this {
    this.draft.scrambled = true;
    this.draft.descrambled = undefined;
    return this;
  }

  markDescrambled(): this {
    this.draft.scrambled = false;
    this.draft.descrambled = true;
    return this;
  }

  withTimestamp(date: Date): this {
    this.draft.timestamp = date.toISOString();
    return this;
  }

  build(): SignalMetadata {
    return freezeMetadata({
      ...this.draft,
      resolution: [this.draft.resolution[0], this.draft.resolution[1]],
      levels: { ...this.draft.levels },
      timing: this.draft.timing && { ...this.draft.timing },
      operations: this.draft.operations && { ...this.draft.operations },
      extra: { ...this.draft.extra },
    });
  }
}
