/**
 * Capture quality presets. The numbers are fixed contracts: storage estimates
 * outside this package are computed from them.
 */
import type { PcmFormat } from "@/lib/dsp/types";

export type AudioQualityId = "HIGH_QUALITY" | "STANDARD" | "SPACE_SAVING";

export interface AudioQuality {
  readonly id: AudioQualityId;
  readonly sampleRate: number;
  readonly bitRate: number;
  readonly channels: number;
  readonly label: string;
}

export const AUDIO_QUALITY: Readonly<Record<AudioQualityId, AudioQuality>> = Object.freeze({
  HIGH_QUALITY: Object.freeze({
    id: "HIGH_QUALITY",
    sampleRate: 48000,
    bitRate: 128000,
    channels: 2,
    label: "High quality",
  }),
  STANDARD: Object.freeze({
    id: "STANDARD",
    sampleRate: 44100,
    bitRate: 64000,
    channels: 1,
    label: "Standard",
  }),
  SPACE_SAVING: Object.freeze({
    id: "SPACE_SAVING",
    sampleRate: 22050,
    bitRate: 32000,
    channels: 1,
    label: "Space saving",
  }),
});

export function isSupported(quality: AudioQuality): boolean {
  return (
    quality.sampleRate > 0 &&
    quality.bitRate > 0 &&
    quality.channels >= 1 &&
    quality.channels <= 2
  );
}

/** Encoded size estimate from the nominal bit rate. */
export function estimatedBytesPerMinute(quality: AudioQuality): number {
  return (quality.bitRate * 60) / 8;
}

/** Size of the raw capture stream. */
export function pcmBytesPerSecond(quality: AudioQuality): number {
  return quality.sampleRate * quality.channels * 2;
}

export function pcmFormatOf(quality: AudioQuality): PcmFormat {
  return { sampleRate: quality.sampleRate, channels: quality.channels };
}
