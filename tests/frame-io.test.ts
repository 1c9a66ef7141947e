import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { RawVideoReader, RawVideoWriter, encodePgm, parsePixelFormat, writeFramePgm } from '../cli/frame-io';
import { createWavBuffer } from '../cli/wav-io';
import { createFrame } from '../src/frames/types';

let testDir: string;

beforeAll(() => {
  testDir = mkdtempSync(join(tmpdir(), 'analog-frame-io-test-'));
});

afterAll(() => {
  rmSync(testDir, { recursive: true, force: true });
});

describe('Raw video', () => {
  it('should read whole frames and note a trailing partial frame', () => {
    const path = join(testDir, 'input.gray');
    writeFileSync(path, Uint8Array.from({ length: 2 * 6 + 4 }, (_, i) => i));

    const reader = new RawVideoReader(path, 3, 2, 'gray');
    const first = reader.next();
    const second = reader.next();
    expect(Array.from(first!.data)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(Array.from(second!.data)).toEqual([6, 7, 8, 9, 10, 11]);
    expect(reader.next()).toBeNull();
    expect(reader.trailingBytes).toBe(4);
    expect(reader.framesRead).toBe(2);
    reader.close();
  });

  it('should read rgb24 frames', () => {
    const path = join(testDir, 'input.rgb');
    writeFileSync(path, new Uint8Array(2 * 2 * 3).fill(9));
    const reader = new RawVideoReader(path, 2, 2, 'rgb24');
    expect(reader.next()).toMatchObject({ width: 2, height: 2, channels: 3 });
    reader.close();
  });

  it('should expand gray frames when writing rgb', () => {
    const path = join(testDir, 'out.rgb');
    const frame = createFrame(2, 1);
    frame.data.set([10, 20]);

    const writer = new RawVideoWriter(path, true);
    writer.write(frame);
    writer.close();
    expect(Array.from(readFileSync(path))).toEqual([10, 10, 10, 20, 20, 20]);
  });

  it('should validate pixel formats', () => {
    expect(parsePixelFormat('RGB24')).toBe('rgb24');
    expect(() => parsePixelFormat('yuv420p')).toThrow('Invalid pixel format');
  });
});

describe('PGM output', () => {
  it('should write a binary P5 header', () => {
    const frame = createFrame(3, 2);
    frame.data.set([1, 2, 3, 4, 5, 6]);
    const pgm = encodePgm(frame);
    const header = 'P5\n3 2\n255\n';
    expect(new TextDecoder().decode(pgm.subarray(0, header.length))).toBe(header);
    expect(Array.from(pgm.subarray(header.length))).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('should number frame files', () => {
    const dir = join(testDir, 'frames');
    const path = writeFramePgm(dir, 7, createFrame(2, 2));
    expect(path).toBe(join(dir, 'frame_000007.pgm'));
    expect(readdirSync(dir)).toEqual(['frame_000007.pgm']);
  });

  it('should refuse colour frames', () => {
    expect(() => encodePgm(createFrame(1, 1, 3))).toThrow('PGM output needs a grayscale frame');
  });
});

describe('WAV export', () => {
  it('should write a mono float WAV', () => {
    const buffer = createWavBuffer(Float32Array.from([0.5, -0.25, 0.7]), 10_000_000);
    expect(buffer.toString('ascii', 0, 4)).toBe('RIFF');
    expect(buffer.readUInt32LE(4)).toBe(36 + 12);
    expect(buffer.toString('ascii', 8, 12)).toBe('WAVE');
    expect(buffer.readUInt16LE(20)).toBe(3);
    expect(buffer.readUInt16LE(22)).toBe(1);
    expect(buffer.readUInt32LE(24)).toBe(10_000_000);
    expect(buffer.readUInt32LE(28)).toBe(40_000_000);
    expect(buffer.readUInt16LE(34)).toBe(32);
    expect(buffer.readUInt32LE(40)).toBe(12);
    expect(buffer.readFloatLE(44)).toBe(0.5);
    expect(buffer.readFloatLE(48)).toBe(-0.25);
  });

  it('should clamp sample rates that do not fit the header', () => {
    const buffer = createWavBuffer(new Float32Array(1), 5e9);
    expect(buffer.readUInt32LE(24)).toBe(0xFFFFFFFF);
  });
});
