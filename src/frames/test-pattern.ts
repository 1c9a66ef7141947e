/**
 * Synthetic test frames
 *
 * The run is split in thirds: a vertical sine gradient scrolling with the
 * frame index, a static checkerboard, then a circular ripple.
 */
import { SIGNAL } from '../utils/constants';
import { createFrame, type FrameSource, type PixelFrame } from './types';

export type PatternKind = 'gradient' | 'checkerboard' | 'ripple';

export interface TestPatternOptions {
  width?: number;
  height?: number;
  frameCount?: number;
  squareSize?: number;
}

const SPATIAL_FREQUENCY = 0.05;

function sineValue(position: number, phase: number): number {
  return Math.trunc(128 + 127 * Math.sin(position * SPATIAL_FREQUENCY + phase));
}

export function gradientFrame(width: number, height: number, phase: number): PixelFrame {
  const frame = createFrame(width, height);
  for (let y = 0; y < height; y++) {
    frame.data.fill(sineValue(y, phase), y * width, (y + 1) * width);
  }
  return frame;
}

export function checkerboardFrame(width: number, height: number, squareSize = 40): PixelFrame {
  const frame = createFrame(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const even = (Math.floor(x / squareSize) + Math.floor(y / squareSize)) % 2 === 0;
      frame.data[y * width + x] = even ? 255 : 0;
    }
  }
  return frame;
}

export function rippleFrame(width: number, height: number, phase: number): PixelFrame {
  const frame = createFrame(width, height);
  const cx = Math.floor(width / 2);
  const cy = Math.floor(height / 2);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      frame.data[y * width + x] = sineValue(Math.hypot(x - cx, y - cy), phase);
    }
  }
  return frame;
}

export class TestPatternSource implements FrameSource<PixelFrame> {
  readonly width: number;
  readonly height: number;
  readonly frameCount: number;
  private readonly squareSize: number;
  private index = 0;

  constructor(options: TestPatternOptions = {}) {
    this.width = options.width ?? SIGNAL.WIDTH;
    this.height = options.height ?? SIGNAL.HEIGHT;
    this.frameCount = options.frameCount ?? 90;
    this.squareSize = options.squareSize ?? 40;
  }

  patternAt(index: number): PatternKind {
    const third = Math.floor(this.frameCount / 3);
    if (index < third) return 'gradient';
    if (index < 2 * third) return 'checkerboard';
    return 'ripple';
  }

  frameAt(index: number): PixelFrame {
    const third = Math.floor(this.frameCount / 3);
    switch (this.patternAt(index)) {
      case 'gradient':
        return gradientFrame(this.width, this.height, (index / this.frameCount) * 4 * Math.PI);
      case 'checkerboard':
        return checkerboardFrame(this.width, this.height, this.squareSize);
      case 'ripple':
        return rippleFrame(this.width, this.height, ((index - 2 * third) / Math.max(1, third)) * 2 * Math.PI);
    }
  }

  next(): PixelFrame | null {
    if (this.index >= this.frameCount) return null;
    return this.frameAt(this.index++);
  }
}
