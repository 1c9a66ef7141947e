/**
 * Bandwidth limiting: windowed-sinc low-pass FIR
 *
 * Kernel: sinc(2 * fc * t) * hamming(t), t = -(N-1)/2 .. (N-1)/2,
 * normalized so the taps sum to 1 (unit DC gain).
 */
import { SIGNAL } from '../utils/constants';

function sinc(x: number): number {
  if (x === 0) return 1;
  const px = Math.PI * x;
  return Math.sin(px) / px;
}

/**
 * Hamming window of the given length
 */
export function hammingWindow(length: number): Float64Array {
  const window = new Float64Array(length);
  if (length === 1) {
    window[0] = 1;
    return window;
  }
  for (let n = 0; n < length; n++) {
    window[n] = 0.54 - 0.46 * Math.cos((2 * Math.PI * n) / (length - 1));
  }
  return window;
}

/**
 * Create the low-pass kernel for a bandwidth at a sample rate
 * @param bandwidthHz Cutoff frequency
 * @param sampleRate Sampling rate in Hz
 * @param taps Kernel length (odd)
 */
export function createLowpassKernel(
  bandwidthHz: number,
  sampleRate: number,
  taps: number = SIGNAL.FILTER_TAPS
): Float64Array {
  if (taps < 1 || taps % 2 === 0) {
    throw new RangeError(`Kernel length must be a positive odd number, got ${taps}`);
  }

  const cutoff = bandwidthHz / sampleRate;
  const center = (taps - 1) / 2;
  const window = hammingWindow(taps);
  const kernel = new Float64Array(taps);

  let sum = 0;
  for (let i = 0; i < taps; i++) {
    kernel[i] = sinc(2 * cutoff * (i - center)) * window[i];
    sum += kernel[i];
  }

  for (let i = 0; i < taps; i++) {
    kernel[i] /= sum;
  }

  return kernel;
}

/**
 * Same-length convolution: the kernel centre sits on each output sample,
 * samples beyond either edge count as zero.
 */
export function convolveSame(signal: Float32Array, kernel: Float64Array): Float32Array {
  const n = signal.length;
  const m = kernel.length;
  const half = Math.floor((m - 1) / 2);
  const output = new Float32Array(n);

  for (let i = 0; i < n; i++) {
    let acc = 0;
    // out[i] = sum_t kernel[t] * signal[i + half - t]
    const tStart = Math.max(0, i + half - (n - 1));
    const tEnd = Math.min(m - 1, i + half);
    for (let t = tStart; t <= tEnd; t++) {
      acc += kernel[t] * signal[i + half - t];
    }
    output[i] = acc;
  }

  return output;
}
