export { CaptureController, RAW_SUFFIX, type CaptureControllerDeps } from "@/lib/capture/CaptureController";
export { CAPTURE_STATUSES, canTransition, type CaptureStatus } from "@/lib/capture/captureStatus";
export type { CaptureHandle, CaptureSource } from "@/lib/capture/CaptureSource";
export { SoxCaptureSource, type RecorderOptions, type RecorderProgram } from "@/lib/capture/SoxCaptureSource";

export {
  AUDIO_QUALITY,
  estimatedBytesPerMinute,
  isSupported,
  pcmBytesPerSecond,
  pcmFormatOf,
  type AudioQuality,
  type AudioQualityId,
} from "@/lib/audio/AudioQuality";
export { readPcmFile, writePcmFileAtomic } from "@/lib/audio/pcmFile";
export { fsStorageProbe, type StorageProbe } from "@/lib/audio/storage";

export { EnhancementPipeline } from "@/lib/dsp/EnhancementPipeline";
export { configToSlots } from "@/lib/dsp/configToSlots";
export { rms, peak, levelDb } from "@/lib/dsp/levelMeter";
export { applyGain, agc, agcGainDb } from "@/lib/dsp/stages/Gain";
export { gate } from "@/lib/dsp/stages/NoiseGate";
export { compress } from "@/lib/dsp/stages/Compressor";
export { normalize } from "@/lib/dsp/stages/Normalizer";
export { lowPass, highPass } from "@/lib/dsp/filters";
export { trimSilence, type TrimOptions } from "@/lib/dsp/silenceTrimmer";
export { decodePcm16le, encodePcm16le, toInt16 } from "@/lib/dsp/pcm";
export {
  createSampleBuffer,
  DEFAULT_ENHANCEMENT,
  STAGE_ORDER,
  type ChainSlot,
  type EnhancementConfig,
  type PcmFormat,
  type SampleBuffer,
  type StageId,
} from "@/lib/dsp/types";

export {
  CaptureError,
  classifyError,
  PROCESSING_ERROR_KINDS,
  type ProcessingErrorKind,
  type ProcessingFailure,
  type ProcessingResult,
  type ProcessingSuccess,
} from "@/lib/errors";
export { applySettingClamps, DEFAULT_SETTINGS, type CaptureSettings } from "@/lib/settings";
export { getTimings, clearTimings, type TimingSummary } from "@/lib/perfTimer";
