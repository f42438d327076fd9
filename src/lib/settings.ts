import { AUDIO_QUALITY, type AudioQuality } from "@/lib/audio/AudioQuality";
import { DEFAULT_ENHANCEMENT, type EnhancementConfig } from "@/lib/dsp/types";
import { AGC_MAX_GAIN_DB, AGC_TARGET_LEVEL } from "@/lib/dsp/stages/Gain";

export interface CaptureSettings {
  /** Preset used by enhancement calls made outside a session */
  quality: AudioQuality;
  enhancement: EnhancementConfig;
  /** Gain applied to each chunk before it is written, -20 to +20 dB */
  realtimeGainDb: number;
  /** Run AGC on each chunk before the fixed real-time gain */
  realtimeAgc: boolean;
  agcTargetLevel: number; // 0.01 to 1
  agcMaxGainDb: number; // 0 to 40
  /** Upper bound on the source probe in initialize() */
  initTimeoutMs: number; // 100 to 10000
  /** start() refuses to open a session with less free space than this */
  minFreeBytes: number;
}

export const MAX_REALTIME_GAIN_DB = 20;

export const DEFAULT_SETTINGS: CaptureSettings = {
  quality: AUDIO_QUALITY.STANDARD,
  enhancement: DEFAULT_ENHANCEMENT,
  realtimeGainDb: 0,
  realtimeAgc: false,
  agcTargetLevel: AGC_TARGET_LEVEL,
  agcMaxGainDb: AGC_MAX_GAIN_DB,
  initTimeoutMs: 2000,
  minFreeBytes: 100 * 1024 * 1024,
};

export interface ClampedSettings {
  settings: CaptureSettings;
  clampsApplied: string[];
}

/**
 * Merge user settings over the defaults and pull every numeric field back
 * into its allowed range. Each adjustment is reported.
 */
export function applySettingClamps(partial: Partial<CaptureSettings>): ClampedSettings {
  const s: CaptureSettings = {
    ...DEFAULT_SETTINGS,
    ...partial,
    enhancement: { ...DEFAULT_ENHANCEMENT, ...partial.enhancement },
  };
  const clamps: string[] = [];

  const clamp = (name: string, value: number, min: number, max: number, unit = ""): number => {
    if (Number.isNaN(value)) {
      clamps.push(`${name} was not a number; reset to ${min}${unit}`);
      return min;
    }
    if (value < min) {
      clamps.push(`${name} clamped from ${value}${unit} to ${min}${unit}`);
      return min;
    }
    if (value > max) {
      clamps.push(`${name} clamped from ${value}${unit} to ${max}${unit}`);
      return max;
    }
    return value;
  };

  s.realtimeGainDb = clamp("Realtime gain", s.realtimeGainDb, -MAX_REALTIME_GAIN_DB, MAX_REALTIME_GAIN_DB, "dB");
  s.enhancement.targetGainDb = clamp(
    "Target gain",
    s.enhancement.targetGainDb,
    -MAX_REALTIME_GAIN_DB,
    MAX_REALTIME_GAIN_DB,
    "dB"
  );
  s.agcTargetLevel = clamp("AGC target level", s.agcTargetLevel, 0.01, 1);
  s.agcMaxGainDb = clamp("AGC max gain", s.agcMaxGainDb, 0, 40, "dB");
  s.initTimeoutMs = clamp("Init timeout", s.initTimeoutMs, 100, 10000, "ms");
  s.minFreeBytes = clamp("Minimum free space", s.minFreeBytes, 0, Number.MAX_SAFE_INTEGER, " bytes");

  return { settings: s, clampsApplied: clamps };
}
