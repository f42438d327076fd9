import { INT16_MAX } from "./types";

export interface TrimOptions {
  thresholdRatio?: number;
  minSilenceMs?: number;
  sampleRate?: number;
  channels?: number;
}

/**
 * Shortens long silent stretches. The first `minRun` frames of every silent
 * run are kept verbatim; the rest of that run is dropped until a frame with
 * any channel at or above the threshold resets the counter.
 */
export function trimSilence(samples: Int16Array, options: TrimOptions = {}): Int16Array {
  const {
    thresholdRatio = 0.02,
    minSilenceMs = 500,
    sampleRate = 44100,
    channels = 1,
  } = options;

  if (samples.length === 0) return new Int16Array(0);

  const threshold = Math.trunc(INT16_MAX * thresholdRatio);
  const minRun = Math.trunc((minSilenceMs * sampleRate) / 1000);
  const frames = Math.floor(samples.length / channels);

  const out = new Int16Array(frames * channels);
  let written = 0;
  let run = 0;

  for (let f = 0; f < frames; f++) {
    const start = f * channels;

    let silent = true;
    for (let ch = 0; ch < channels; ch++) {
      if (Math.abs(samples[start + ch]) >= threshold) {
        silent = false;
        break;
      }
    }

    if (silent) {
      const keep = run < minRun;
      run++;
      if (!keep) continue;
    } else {
      run = 0;
    }

    for (let ch = 0; ch < channels; ch++) out[written++] = samples[start + ch];
  }

  return out.slice(0, written);
}
