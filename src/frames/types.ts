/**
 * 8-bit raster frame, row-major. Three-channel frames are RGB ordered.
 */
export interface PixelFrame {
  width: number;
  height: number;
  channels: 1 | 3;
  data: Uint8Array;
}

/**
 * Pull-based frame source. `next()` returns null once the source is exhausted.
 */
export interface FrameSource<T = PixelFrame> {
  next(): T | null;
}

export function createFrame(width: number, height: number, channels: 1 | 3 = 1): PixelFrame {
  return { width, height, channels, data: new Uint8Array(width * height * channels) };
}

/**
 * Check that a frame's buffer matches its declared shape
 */
export function assertFrameShape(frame: PixelFrame): void {
  const expected = frame.width * frame.height * frame.channels;
  if (frame.width < 1 || frame.height < 1) {
    throw new RangeError(`Frame dimensions must be positive, got ${frame.width}x${frame.height}`);
  }
  if (frame.data.length !== expected) {
    throw new RangeError(
      `Frame buffer holds ${frame.data.length} bytes, expected ${expected} for ${frame.width}x${frame.height}x${frame.channels}`
    );
  }
}

/**
 * Expand a grayscale frame to three channels
 */
export function toRgb(frame: PixelFrame): PixelFrame {
  if (frame.channels === 3) return frame;
  const out = createFrame(frame.width, frame.height, 3);
  for (let i = 0; i < frame.data.length; i++) {
    const v = frame.data[i];
    out.data[i * 3] = v;
    out.data[i * 3 + 1] = v;
    out.data[i * 3 + 2] = v;
  }
  return out;
}

/**
 * Wrap an array or other iterable as a pull-based source
 */
export function sourceFromIterable<T>(items: Iterable<T>): FrameSource<T> {
  const iterator = items[Symbol.iterator]();
  return {
    next(): T | null {
      const result = iterator.next();
      return result.done ? null : result.value;
    },
  };
}
