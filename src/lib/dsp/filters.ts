/**
 * First-order RC filters over interleaved int16 data.
 * Each channel keeps its own history; output is clamped to int16.
 *
 *   low-pass:  y[n] = a·x[n] + (1 − a)·y[n−1],   a = dt / (rc + dt)
 *   high-pass: y[n] = a·(y[n−1] + x[n] − x[n−1]), a = rc / (rc + dt)
 */
import { toInt16 } from "./pcm";

export const DEFAULT_FILTER_SAMPLE_RATE = 44100;

function rcConstants(cutoffHz: number, sampleRate: number): { rc: number; dt: number } {
  return { rc: 1 / (2 * Math.PI * cutoffHz), dt: 1 / sampleRate };
}

export function lowPass(
  samples: Int16Array,
  cutoffHz: number,
  sampleRate = DEFAULT_FILTER_SAMPLE_RATE,
  channels = 1
): Int16Array {
  const out = new Int16Array(samples.length);
  if (samples.length === 0) return out;

  const { rc, dt } = rcConstants(cutoffHz, sampleRate);
  const alpha = dt / (rc + dt);

  for (let ch = 0; ch < channels && ch < samples.length; ch++) {
    out[ch] = samples[ch];
    for (let i = ch + channels; i < samples.length; i += channels) {
      out[i] = toInt16(alpha * samples[i] + (1 - alpha) * out[i - channels]);
    }
  }

  return out;
}

export function highPass(
  samples: Int16Array,
  cutoffHz: number,
  sampleRate = DEFAULT_FILTER_SAMPLE_RATE,
  channels = 1
): Int16Array {
  const out = new Int16Array(samples.length);
  if (samples.length === 0) return out;

  const { rc, dt } = rcConstants(cutoffHz, sampleRate);
  const alpha = rc / (rc + dt);

  for (let ch = 0; ch < channels && ch < samples.length; ch++) {
    out[ch] = samples[ch];
    for (let i = ch + channels; i < samples.length; i += channels) {
      out[i] = toInt16(alpha * (out[i - channels] + samples[i] - samples[i - channels]));
    }
  }

  return out;
}
