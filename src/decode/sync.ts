/**
 * Sync pulse diagnostics
 *
 * Advisory only: reports how many sync pulses a frame contains and the
 * voltage seen in the sync regions. Never fails the pipeline.
 */
import type { VoltageLevels } from '../utils/constants';

export interface SyncStats {
  syncPulses: number;
  expectedLines: number;
  syncLevelMin: number;
  syncLevelMean: number;
  signalMin: number;
  signalMax: number;
}

export function analyzeSync(
  signal: Float32Array,
  levels: VoltageLevels,
  expectedLines: number
): SyncStats {
  const threshold = (levels.syncTip + levels.blanking) / 2;

  let pulses = 0;
  let below = 0;
  let sum = 0;
  let syncMin = Infinity;
  let signalMin = Infinity;
  let signalMax = -Infinity;
  let wasBelow = false;

  for (let i = 0; i < signal.length; i++) {
    const v = signal[i];
    if (v < signalMin) signalMin = v;
    if (v > signalMax) signalMax = v;

    const isBelow = v < threshold;
    if (isBelow) {
      // Rising edge of the sync mask; a pulse already active at sample 0 is not counted
      if (!wasBelow && i > 0) pulses++;
      below++;
      sum += v;
      if (v < syncMin) syncMin = v;
    }
    wasBelow = isBelow;
  }

  return {
    syncPulses: pulses,
    expectedLines,
    syncLevelMin: below > 0 ? syncMin : 0,
    syncLevelMean: below > 0 ? sum / below : 0,
    signalMin: signal.length > 0 ? signalMin : 0,
    signalMax: signal.length > 0 ? signalMax : 0,
  };
}
