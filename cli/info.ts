/**
 * CLI Info Command
 */

import { AnalogFileReader, toDocument } from '../src/container/index.js';
import { timingForMetadata } from '../src/decode/index.js';
import { checkCompatibility, geometryFromMetadata } from '../src/lib/segments.js';

interface InfoOptions {
  json?: boolean;
}

export async function infoCommand(input: string, options: InfoOptions): Promise<void> {
  const reader = new AnalogFileReader(input);

  try {
    const meta = reader.open();
    const frameCount = reader.frameCount();
    const geometry = geometryFromMetadata(meta);
    const timing = timingForMetadata(meta);
    const compatibility = checkCompatibility(geometry, timing);

    if (options.json) {
      console.log(JSON.stringify({
        file: input,
        frames: frameCount,
        metadata: toDocument(meta),
        geometry: {
          sync_end: geometry.syncEnd,
          active_length: geometry.activeLength,
          segments_per_line: geometry.segmentsPerLine,
          segment_size: geometry.segmentSize,
          max_shift: geometry.maxShift,
          compatible: compatibility.insideActiveVideo && compatibility.evenlyDivisible,
          warnings: compatibility.warnings,
        },
      }, null, 2));
      return;
    }

    const ops = meta.operations;
    console.log(`File:          ${input}`);
    console.log(`Standard:      ${meta.standard}`);
    console.log(`Resolution:    ${meta.resolution[0]}x${meta.resolution[1]}`);
    console.log(`Frame rate:    ${meta.fps.toFixed(2)} fps`);
    console.log(`Sample rate:   ${(meta.sampleRate / 1e6).toFixed(1)} MHz`);
    console.log(`Samples/line:  ${meta.samplesPerLine}`);
    console.log(`Lines/frame:   ${meta.linesPerFrame}`);
    console.log(`Frames:        ${frameCount}`);
    console.log(`Scrambled:     ${meta.scrambled ? 'yes' : 'no'}${meta.descrambled ? ' (descrambled)' : ''}`);
    if (meta.scramblingMethod !== undefined) {
      console.log(`Method:        ${meta.scramblingMethod}`);
    }
    if (ops) {
      console.log(`Operations:    permutation=${ops.permutation} inversion=${ops.inversion} shift=${ops.shift}`);
    }
    console.log(`Segments:      ${geometry.segmentsPerLine} x ${geometry.segmentSize} samples`);
    for (const warning of compatibility.warnings) {
      console.log(`Warning:       ${warning}`);
    }
    if (compatibility.suggestedFrontPorchReserve !== undefined) {
      console.log(`Suggestion:    --front-porch-reserve ${compatibility.suggestedFrontPorchReserve}`);
    }

  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  } finally {
    reader.close();
  }
}
