/**
 * Peak normalizer. Two passes over the whole buffer (peak scan, then scale),
 * which is why enhancement runs on fully buffered audio.
 */
import { Stage } from "../Stage";
import { toInt16 } from "../pcm";
import { peak } from "../levelMeter";
import { DEFAULT_STAGE_PARAMS, INT16_MAX, type NormalizerParams, type StageId } from "../types";

export function normalize(samples: Int16Array): Int16Array {
  const max = peak(samples);
  if (max === 0) return samples.slice();

  const out = new Int16Array(samples.length);
  for (let i = 0; i < samples.length; i++) {
    // Multiply before dividing so the peak sample lands on exactly ±32767
    out[i] = toInt16((samples[i] * INT16_MAX) / max);
  }
  return out;
}

export class Normalizer extends Stage<NormalizerParams> {
  readonly id: StageId = "normalizer";

  constructor(params: NormalizerParams = DEFAULT_STAGE_PARAMS.normalizer) {
    super(params);
  }

  process(samples: Int16Array): Int16Array {
    return normalize(samples);
  }
}
