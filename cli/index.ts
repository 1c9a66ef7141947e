/**
 * Analog scrambler CLI
 */

import { createProgram } from './program.js';

createProgram().parseAsync().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
