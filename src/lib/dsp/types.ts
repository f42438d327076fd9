/**
 * Core DSP type definitions for the enhancement pipeline.
 * All stages, the pipeline and the capture controller share these types.
 */

// ── 16-bit PCM range ──────────────────────────────────────────────
export const INT16_MAX = 32767;
export const INT16_MIN = -32768;
/** Divisor that maps a sample magnitude onto [0, 1] */
export const FULL_SCALE = 32768;

// ── Stage identifiers (fixed order) ───────────────────────────────
export const STAGE_ORDER = [
  "noiseGate",
  "compressor",
  "gain",
  "normalizer",
] as const;

export type StageId = (typeof STAGE_ORDER)[number];

// ── Sample format passed to every stage ───────────────────────────
export interface PcmFormat {
  sampleRate: number;
  /** Interleaved channel count (1 or 2) */
  channels: number;
}

// ── Per-stage parameter interfaces ────────────────────────────────

export interface NoiseGateParams {
  thresholdRatio: number; // fraction of full scale, 0 to 1
  reduction: number; // multiplier applied below threshold
}

export interface CompressorParams {
  thresholdRatio: number; // fraction of full scale, 0 to 1
  ratio: number; // >= 1
}

export interface GainParams {
  gainDb: number;
}

export type NormalizerParams = Record<string, never>;

export type StageParams = {
  noiseGate: NoiseGateParams;
  compressor: CompressorParams;
  gain: GainParams;
  normalizer: NormalizerParams;
};

export const DEFAULT_STAGE_PARAMS: StageParams = {
  noiseGate: { thresholdRatio: 0.01, reduction: 0.3 },
  compressor: { thresholdRatio: 0.7, ratio: 4.0 },
  gain: { gainDb: 0 },
  normalizer: {},
};

// ── Chain slot: one stage, its params and its bypass flag ─────────
export type ChainSlot = {
  [K in StageId]: { id: K; bypass: boolean; params: StageParams[K] };
}[StageId];

// ── Enhancement request ───────────────────────────────────────────
export interface EnhancementConfig {
  noiseReduction: boolean;
  compression: boolean;
  normalization: boolean;
  /** Applied only when non-zero */
  targetGainDb: number;
}

export const DEFAULT_ENHANCEMENT: EnhancementConfig = {
  noiseReduction: true,
  compression: true,
  normalization: true,
  targetGainDb: 0,
};

// ── Owned sample buffer ───────────────────────────────────────────

export interface SampleBuffer extends PcmFormat {
  /** Interleaved signed 16-bit samples */
  samples: Int16Array;
}

/**
 * Factory for SampleBuffer with validation.
 * - Throws on a channel count other than 1 or 2
 * - Throws on a non-positive sample rate
 * - Throws when the samples do not fill whole frames
 */
export function createSampleBuffer(
  samples: Int16Array,
  sampleRate: number,
  channels: number
): SampleBuffer {
  if (channels !== 1 && channels !== 2) {
    throw new Error(`createSampleBuffer: unsupported channel count ${channels}`);
  }
  if (!(sampleRate > 0)) {
    throw new Error(`createSampleBuffer: invalid sample rate ${sampleRate}`);
  }
  if (samples.length % channels !== 0) {
    throw new Error("createSampleBuffer: sample count is not a whole number of frames");
  }
  return { samples, sampleRate, channels };
}
