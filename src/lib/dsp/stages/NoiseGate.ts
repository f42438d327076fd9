/**
 * Instantaneous noise gate: samples under the threshold are scaled down,
 * everything else passes untouched. There is no attack/release envelope,
 * so a signal hovering at the threshold can click.
 */
import { Stage } from "../Stage";
import { toInt16 } from "../pcm";
import { DEFAULT_STAGE_PARAMS, INT16_MAX, type NoiseGateParams, type StageId } from "../types";

export function gate(
  samples: Int16Array,
  thresholdRatio = DEFAULT_STAGE_PARAMS.noiseGate.thresholdRatio,
  reduction = DEFAULT_STAGE_PARAMS.noiseGate.reduction
): Int16Array {
  const threshold = Math.trunc(INT16_MAX * thresholdRatio);
  const out = new Int16Array(samples.length);

  for (let i = 0; i < samples.length; i++) {
    const sample = samples[i];
    out[i] = Math.abs(sample) < threshold ? toInt16(sample * reduction) : sample;
  }

  return out;
}

export class NoiseGate extends Stage<NoiseGateParams> {
  readonly id: StageId = "noiseGate";

  constructor(params: NoiseGateParams = DEFAULT_STAGE_PARAMS.noiseGate) {
    super(params);
  }

  process(samples: Int16Array): Int16Array {
    return gate(samples, this.params.thresholdRatio, this.params.reduction);
  }
}
