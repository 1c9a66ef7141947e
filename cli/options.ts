/**
 * Shared option parsing for CLI commands
 */

import { InvalidArgumentError } from 'commander';
import type { ScrambleOperations } from '../src/container/metadata.js';
import { resolveKey } from '../src/lib/key.js';
import type { KeystreamBackend } from '../src/lib/keystream.js';
import type { GeometryOverrides } from '../src/lib/segments.js';
import { getStandard, type AnalogStandard } from '../src/utils/constants.js';
import { silentLogger, stderrLogger, type Logger } from '../src/utils/logger.js';

export function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return n;
}

export function parsePositiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return n;
}

export function parseStandard(value: string): AnalogStandard {
  try {
    return getStandard(value);
  } catch {
    throw new InvalidArgumentError('Use "ntsc" or "pal".');
  }
}

export function parseBackend(value: string): KeystreamBackend {
  const backend = value.toLowerCase();
  if (backend !== 'auto' && backend !== 'cipher' && backend !== 'fallback') {
    throw new InvalidArgumentError('Use "auto", "cipher" or "fallback".');
  }
  return backend;
}

export interface KeyedOptions {
  key?: string;
  password?: string;
  segments?: number;
  syncEnd?: number;
  frontPorchReserve?: number;
  permutation?: boolean;
  inversion?: boolean;
  shift?: boolean;
  backend?: KeystreamBackend;
  quiet?: boolean;
  verbose?: boolean;
}

export function keyFromOptions(options: KeyedOptions): Promise<Uint8Array> {
  return resolveKey({ key: options.key, password: options.password });
}

/**
 * Only flags given on the command line; the rest stay undefined
 */
export function operationOverrides(options: KeyedOptions): Partial<ScrambleOperations> {
  const ops: Partial<ScrambleOperations> = {};
  if (options.permutation !== undefined) ops.permutation = options.permutation;
  if (options.inversion !== undefined) ops.inversion = options.inversion;
  if (options.shift !== undefined) ops.shift = options.shift;
  return ops;
}

export function geometryOverrides(options: KeyedOptions): GeometryOverrides {
  return {
    segmentsPerLine: options.segments,
    syncEnd: options.syncEnd,
    frontPorchReserve: options.frontPorchReserve,
  };
}

export function commandLogger(tag: string, options: { quiet?: boolean; verbose?: boolean }): Logger {
  return options.quiet ? silentLogger : stderrLogger(tag, options.verbose);
}

/**
 * Progress line on stderr, only when it is a terminal
 */
export function progressReporter(quiet: boolean | undefined, total?: number): ((done: number) => void) | undefined {
  if (quiet || !process.stderr.isTTY) return undefined;
  return (done) => {
    process.stderr.write(total !== undefined ? `\rFrames: ${done}/${total}` : `\rFrames: ${done}`);
  };
}

/**
 * AbortSignal tripped by Ctrl+C for the duration of `fn`
 */
export async function withInterrupt<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);
  try {
    return await fn(controller.signal);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
