/**
 * CLI Scramble and Descramble Commands
 */

import { descrambleFile, scrambleFile } from '../src/pipeline.js';
import { commandLogger, geometryOverrides, keyFromOptions, operationOverrides, progressReporter, withInterrupt, type KeyedOptions } from './options.js';

type Direction = 'scramble' | 'descramble';

async function runKeyed(direction: Direction, input: string, output: string, options: KeyedOptions): Promise<void> {
  const log = options.quiet ? () => {} : console.error.bind(console);

  try {
    const key = await keyFromOptions(options);
    log(`${direction === 'scramble' ? 'Scrambling' : 'Descrambling'} ${input}...`);

    const run = direction === 'scramble' ? scrambleFile : descrambleFile;
    const result = await withInterrupt((signal) => run(input, output, {
      key,
      backend: options.backend,
      operations: operationOverrides(options),
      geometry: geometryOverrides(options),
      signal,
      onProgress: progressReporter(options.quiet),
      logger: commandLogger(direction === 'scramble' ? 'Scrambler' : 'Descrambler', options),
    }));

    console.error('');
    console.error(`Frames:  ${result.frames}${result.aborted ? ' (interrupted)' : ''}`);
    console.error(`Output:  ${output}`);

  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

export function scrambleCommand(input: string, output: string, options: KeyedOptions): Promise<void> {
  return runKeyed('scramble', input, output, options);
}

export function descrambleCommand(input: string, output: string, options: KeyedOptions): Promise<void> {
  return runKeyed('descramble', input, output, options);
}
