import type { SpeedSample } from './types';

export const SMOOTHING_FACTOR = 0.1;

/**
 * Exponential moving average of one series.
 * Written as `previous + α·(raw − previous)`, which equals
 * `previous·(1 − α) + raw·α` but keeps a constant input exact.
 */
export function ema(previous: number | undefined, raw: number, alpha = SMOOTHING_FACTOR) {
  if (previous === undefined) return raw;
  return previous + alpha * (raw - previous);
}

/**
 * Smooth upload and download independently against the last stored sample.
 * The first sample of a session (no previous) is kept raw.
 */
export function smoothSpeed(previous: SpeedSample | undefined, raw: SpeedSample, alpha = SMOOTHING_FACTOR): SpeedSample {
  return {
    timestamp: raw.timestamp,
    uploadBytesPerSec: ema(previous?.uploadBytesPerSec, raw.uploadBytesPerSec, alpha),
    downloadBytesPerSec: ema(previous?.downloadBytesPerSec, raw.downloadBytesPerSec, alpha),
  };
}
