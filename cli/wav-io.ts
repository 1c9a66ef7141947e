/**
 * WAV export for inspecting analog signals in audio tools
 *
 * Samples are written as mono 32-bit IEEE float (format 3), unscaled.
 */

import { writeFileSync } from 'fs';

const HEADER_SIZE = 44;
const MAX_UINT32 = 0xFFFFFFFF;

/**
 * Create a float WAV buffer. Rates above the 32-bit header field are clamped.
 */
export function createWavBuffer(samples: Float32Array, sampleRate: number): Buffer {
  const bytesPerSample = 4;
  const rate = Math.min(MAX_UINT32, Math.max(1, Math.round(sampleRate)));
  const dataSize = samples.length * bytesPerSample;
  const fileSize = HEADER_SIZE + dataSize;
  if (fileSize - 8 > MAX_UINT32) {
    throw new Error(`Too many samples for a WAV file: ${samples.length}`);
  }

  const buffer = Buffer.alloc(fileSize);
  const view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);

  // RIFF header
  buffer.write('RIFF', 0);
  view.setUint32(4, fileSize - 8, true);
  buffer.write('WAVE', 8);

  // fmt chunk
  buffer.write('fmt ', 12);
  view.setUint32(16, 16, true);
  view.setUint16(20, 3, true);  // IEEE float
  view.setUint16(22, 1, true);
  view.setUint32(24, rate, true);
  view.setUint32(28, Math.min(MAX_UINT32, rate * bytesPerSample), true);
  view.setUint16(32, bytesPerSample, true);
  view.setUint16(34, 32, true);

  // data chunk
  buffer.write('data', 36);
  view.setUint32(40, dataSize, true);

  for (let i = 0; i < samples.length; i++) {
    view.setFloat32(HEADER_SIZE + i * bytesPerSample, samples[i], true);
  }

  return buffer;
}

export function writeWavFile(filePath: string, samples: Float32Array, sampleRate: number): void {
  writeFileSync(filePath, createWavBuffer(samples, sampleRate));
}
