/**
 * Level metering over int16 windows. Stateless; drives the live meter and AGC.
 */
import { FULL_SCALE } from "./types";

/** RMS of the window normalised to [0, 1]. Empty input reads as 0. */
export function rms(samples: Int16Array): number {
  if (samples.length === 0) return 0;

  let sumSquares = 0;
  for (let i = 0; i < samples.length; i++) {
    sumSquares += samples[i] * samples[i];
  }

  return Math.min(1, Math.sqrt(sumSquares / samples.length) / FULL_SCALE);
}

/** Largest absolute sample value. */
export function peak(samples: Int16Array): number {
  let max = 0;
  for (let i = 0; i < samples.length; i++) {
    max = Math.max(max, Math.abs(samples[i]));
  }
  return max;
}

/** Normalised level in dBFS, floored at -96 for silence. */
export function levelDb(level: number): number {
  return level > 0 ? 20 * Math.log10(level) : -96;
}
