import { execFile } from "child_process";
import { promisify } from "util";
import recorder from "node-record-lpcm16";
import type { AudioQuality } from "@/lib/audio/AudioQuality";
import type { CaptureHandle, CaptureSource } from "./CaptureSource";

const execFileAsync = promisify(execFile);

export type RecorderProgram = "sox" | "rec" | "arecord";

export interface RecorderOptions {
  recorder: RecorderProgram;
  /** Input device; the system default when omitted */
  device?: string;
}

/**
 * Captures through an external recorder process, which writes headerless
 * PCM to stdout.
 */
export class SoxCaptureSource implements CaptureSource {
  constructor(private readonly options: RecorderOptions = { recorder: "sox" }) {}

  async probe(quality: AudioQuality, signal: AbortSignal): Promise<void> {
    console.debug(`[SoxCaptureSource] Probing ${this.options.recorder} for ${quality.label}`);
    await execFileAsync(this.options.recorder, ["--version"], { signal });
  }

  open(quality: AudioQuality): CaptureHandle {
    const recording = recorder.record({
      sampleRate: quality.sampleRate,
      channels: quality.channels,
      audioType: "raw",
      recorder: this.options.recorder,
      threshold: 0,
      endOnSilence: false,
      device: this.options.device ?? null,
    });

    const stream = recording.stream();

    // Spawn failures (missing binary, busy device) surface on the process
    recording.process.on("error", (err: Error) => {
      stream.emit("error", err);
    });

    return {
      stream,
      pause: () => recording.pause(),
      resume: () => recording.resume(),
      stop: () => recording.stop(),
    };
  }
}
