/**
 * Hard-knee compressor working on each sample independently.
 * Only the excess above the threshold is divided by the ratio; the sign is kept.
 * No envelope follower: attack/release times are not modelled.
 */
import { Stage } from "../Stage";
import { toInt16 } from "../pcm";
import { DEFAULT_STAGE_PARAMS, INT16_MAX, type CompressorParams, type StageId } from "../types";

export function compress(
  samples: Int16Array,
  thresholdRatio = DEFAULT_STAGE_PARAMS.compressor.thresholdRatio,
  ratio = DEFAULT_STAGE_PARAMS.compressor.ratio
): Int16Array {
  const threshold = Math.trunc(INT16_MAX * thresholdRatio);
  const out = new Int16Array(samples.length);

  for (let i = 0; i < samples.length; i++) {
    const sample = samples[i];
    const amplitude = Math.abs(sample);

    if (amplitude > threshold) {
      const compressed = threshold + (amplitude - threshold) / ratio;
      out[i] = toInt16(sample >= 0 ? compressed : -compressed);
    } else {
      out[i] = sample;
    }
  }

  return out;
}

export class Compressor extends Stage<CompressorParams> {
  readonly id: StageId = "compressor";

  constructor(params: CompressorParams = DEFAULT_STAGE_PARAMS.compressor) {
    super(params);
  }

  process(samples: Int16Array): Int16Array {
    return compress(samples, this.params.thresholdRatio, this.params.ratio);
  }
}
