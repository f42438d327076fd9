import type { Readable } from "stream";
import type { AudioQuality } from "@/lib/audio/AudioQuality";

/**
 * One open capture. `stream` yields raw 16-bit LE PCM in the quality's
 * format and reports device failures through its `error` event.
 */
export interface CaptureHandle {
  readonly stream: Readable;
  pause(): void;
  resume(): void;
  /** Ends capture and frees the device. Called at most once per handle. */
  stop(): void;
}

export interface CaptureSource {
  /** Resolve when the device can capture at `quality`; honour `signal`. */
  probe(quality: AudioQuality, signal: AbortSignal): Promise<void>;
  open(quality: AudioQuality): CaptureHandle;
}
