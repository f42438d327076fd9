/**
 * Linear gain with hard clipping, and the RMS-driven AGC built on it.
 * Clipping is a plain clamp at the int16 limits, with no soft knee or lookahead.
 */
import { Stage } from "../Stage";
import { dbToLinear, toInt16 } from "../pcm";
import { rms } from "../levelMeter";
import { DEFAULT_STAGE_PARAMS, type GainParams, type StageId } from "../types";

/** AGC target as a normalised RMS level */
export const AGC_TARGET_LEVEL = 0.5;
/** AGC never moves the signal by more than this in either direction */
export const AGC_MAX_GAIN_DB = 20;

export function applyGain(samples: Int16Array, gainDb: number): Int16Array {
  const linear = dbToLinear(gainDb);
  const out = new Int16Array(samples.length);
  for (let i = 0; i < samples.length; i++) {
    out[i] = toInt16(samples[i] * linear);
  }
  return out;
}

/**
 * Gain needed to move the window's RMS onto targetLevel, clamped to ±maxGainDb.
 * Returns 0 for a silent window.
 */
export function agcGainDb(
  samples: Int16Array,
  targetLevel = AGC_TARGET_LEVEL,
  maxGainDb = AGC_MAX_GAIN_DB
): number {
  const currentLevel = rms(samples);
  if (currentLevel <= 0) return 0;

  const requiredDb = 20 * Math.log10(targetLevel / currentLevel);
  return Math.max(-maxGainDb, Math.min(maxGainDb, requiredDb));
}

export function agc(
  samples: Int16Array,
  targetLevel = AGC_TARGET_LEVEL,
  maxGainDb = AGC_MAX_GAIN_DB
): Int16Array {
  // Silent window: no level to steer from
  if (rms(samples) <= 0) return samples.slice();
  return applyGain(samples, agcGainDb(samples, targetLevel, maxGainDb));
}

export class GainStage extends Stage<GainParams> {
  readonly id: StageId = "gain";

  constructor(params: GainParams = DEFAULT_STAGE_PARAMS.gain) {
    super(params);
  }

  process(samples: Int16Array): Int16Array {
    return applyGain(samples, this.params.gainDb);
  }
}
