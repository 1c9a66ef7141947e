/**
 * Raw video and image I/O for the CLI
 *
 * Input is headerless 8-bit video, frames back to back, as written by
 * `ffmpeg -f rawvideo -pix_fmt gray|rgb24`. Output is the same raw layout,
 * or one binary PGM per frame.
 */

import { closeSync, mkdirSync, openSync, readSync, writeFileSync, writeSync } from 'fs';
import { join } from 'path';
import { toRgb, type FrameSource, type PixelFrame } from '../src/frames/types.js';

export type PixelFormat = 'gray' | 'rgb24';

export function parsePixelFormat(value: string): PixelFormat {
  const format = value.toLowerCase();
  if (format !== 'gray' && format !== 'rgb24') {
    throw new Error(`Invalid pixel format "${value}". Use "gray" or "rgb24".`);
  }
  return format;
}

function channelsFor(format: PixelFormat): 1 | 3 {
  return format === 'gray' ? 1 : 3;
}

export class RawVideoReader implements FrameSource<PixelFrame> {
  readonly width: number;
  readonly height: number;
  readonly channels: 1 | 3;
  private fd: number | null;
  private position = 0;
  framesRead = 0;
  trailingBytes = 0;

  constructor(path: string, width: number, height: number, format: PixelFormat) {
    this.width = width;
    this.height = height;
    this.channels = channelsFor(format);
    this.fd = openSync(path, 'r');
  }

  get frameBytes(): number {
    return this.width * this.height * this.channels;
  }

  next(): PixelFrame | null {
    if (this.fd === null) return null;

    const data = new Uint8Array(this.frameBytes);
    let got = 0;
    while (got < data.length) {
      const n = readSync(this.fd, data, got, data.length - got, this.position + got);
      if (n === 0) break;
      got += n;
    }

    if (got < data.length) {
      this.trailingBytes = got;
      return null;
    }

    this.position += got;
    this.framesRead++;
    return { width: this.width, height: this.height, channels: this.channels, data };
  }

  close(): void {
    if (this.fd === null) return;
    closeSync(this.fd);
    this.fd = null;
  }
}

export class RawVideoWriter {
  readonly path: string;
  readonly rgb: boolean;
  private fd: number | null;
  framesWritten = 0;

  constructor(path: string, rgb = false) {
    this.path = path;
    this.rgb = rgb;
    this.fd = openSync(path, 'w');
  }

  write(frame: PixelFrame): void {
    if (this.fd === null) {
      throw new Error('Raw video writer is closed');
    }
    const out = this.rgb ? toRgb(frame) : frame;
    let written = 0;
    while (written < out.data.length) {
      written += writeSync(this.fd, out.data, written, out.data.length - written);
    }
    this.framesWritten++;
  }

  close(): void {
    if (this.fd === null) return;
    closeSync(this.fd);
    this.fd = null;
  }
}

/**
 * Binary PGM (P5) for a grayscale frame
 */
export function encodePgm(frame: PixelFrame): Uint8Array {
  if (frame.channels !== 1) {
    throw new Error('PGM output needs a grayscale frame');
  }
  const header = new TextEncoder().encode(`P5\n${frame.width} ${frame.height}\n255\n`);
  const out = new Uint8Array(header.length + frame.data.length);
  out.set(header, 0);
  out.set(frame.data, header.length);
  return out;
}

/**
 * Write frame_000000.pgm, frame_000001.pgm, ... into a directory
 */
export function writeFramePgm(dir: string, index: number, frame: PixelFrame): string {
  mkdirSync(dir, { recursive: true });
  const path = join(dir, `frame_${String(index).padStart(6, '0')}.pgm`);
  writeFileSync(path, encodePgm(frame));
  return path;
}
