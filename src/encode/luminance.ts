/**
 * Frame → luminance conversion
 *
 * Y = 0.299 R + 0.587 G + 0.114 B (Rec. 601), followed by a bilinear
 * resize with pixel-centre alignment.
 */
import { assertFrameShape, type PixelFrame } from '../frames/types';

export interface LumaPlane {
  width: number;
  height: number;
  /** Values in [0, 1] */
  data: Float32Array;
}

/**
 * Extract normalized luminance at the frame's own size
 */
export function frameToLuma(frame: PixelFrame): LumaPlane {
  assertFrameShape(frame);
  const pixels = frame.width * frame.height;
  const data = new Float32Array(pixels);

  if (frame.channels === 1) {
    for (let i = 0; i < pixels; i++) {
      data[i] = frame.data[i] / 255;
    }
  } else {
    for (let i = 0; i < pixels; i++) {
      const r = frame.data[i * 3];
      const g = frame.data[i * 3 + 1];
      const b = frame.data[i * 3 + 2];
      data[i] = (0.299 * r + 0.587 * g + 0.114 * b) / 255;
    }
  }

  return { width: frame.width, height: frame.height, data };
}

/**
 * Bilinear resize. Source coordinate for output pixel d is
 * (d + 0.5) * scale - 0.5, clamped to the source edges.
 */
export function resizeBilinear(plane: LumaPlane, width: number, height: number): LumaPlane {
  if (plane.width === width && plane.height === height) {
    return plane;
  }

  const out = new Float32Array(width * height);
  const scaleX = plane.width / width;
  const scaleY = plane.height / height;

  for (let y = 0; y < height; y++) {
    const sy = Math.max(0, (y + 0.5) * scaleY - 0.5);
    const y0 = Math.min(Math.floor(sy), plane.height - 1);
    const y1 = Math.min(y0 + 1, plane.height - 1);
    const fy = sy - y0;

    for (let x = 0; x < width; x++) {
      const sx = Math.max(0, (x + 0.5) * scaleX - 0.5);
      const x0 = Math.min(Math.floor(sx), plane.width - 1);
      const x1 = Math.min(x0 + 1, plane.width - 1);
      const fx = sx - x0;

      const top = plane.data[y0 * plane.width + x0] * (1 - fx) + plane.data[y0 * plane.width + x1] * fx;
      const bottom = plane.data[y1 * plane.width + x0] * (1 - fx) + plane.data[y1 * plane.width + x1] * fx;
      out[y * width + x] = top * (1 - fy) + bottom * fy;
    }
  }

  return { width, height, data: out };
}

/**
 * Convert a frame to a luminance plane of the requested size
 */
export function frameToLuminance(frame: PixelFrame, width: number, height: number): LumaPlane {
  return resizeBilinear(frameToLuma(frame), width, height);
}
