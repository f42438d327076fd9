/**
 * configToSlots — converts an EnhancementConfig into the fixed 4-slot chain.
 *
 * Every stage is always present; disabled features become bypassed slots
 * carrying their default parameters.
 */

import { DEFAULT_STAGE_PARAMS, type ChainSlot, type EnhancementConfig } from "./types";

export function configToSlots(config: EnhancementConfig): ChainSlot[] {
  return [
    {
      id: "noiseGate",
      bypass: !config.noiseReduction,
      params: DEFAULT_STAGE_PARAMS.noiseGate,
    },
    {
      id: "compressor",
      bypass: !config.compression,
      params: DEFAULT_STAGE_PARAMS.compressor,
    },
    // A zero target is a no-op gain; skip the pass entirely
    {
      id: "gain",
      bypass: config.targetGainDb === 0,
      params: { gainDb: config.targetGainDb },
    },
    {
      id: "normalizer",
      bypass: !config.normalization,
      params: DEFAULT_STAGE_PARAMS.normalizer,
    },
  ];
}
