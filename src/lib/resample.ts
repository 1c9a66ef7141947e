/**
 * Linear resampling over evenly spaced positions.
 *
 * Both endpoints map onto each other: output[0] = input[0] and
 * output[last] = input[last].
 */
export function resampleLinear(input: ArrayLike<number>, targetLength: number): Float32Array {
  const output = new Float32Array(targetLength);
  const n = input.length;
  if (targetLength === 0 || n === 0) return output;

  if (n === 1 || targetLength === 1) {
    output.fill(input[0]);
    return output;
  }

  const step = (n - 1) / (targetLength - 1);
  for (let i = 0; i < targetLength; i++) {
    const pos = i * step;
    const j = Math.floor(pos);
    if (j >= n - 1) {
      output[i] = input[n - 1];
      continue;
    }
    const frac = pos - j;
    output[i] = input[j] + (input[j + 1] - input[j]) * frac;
  }

  return output;
}
