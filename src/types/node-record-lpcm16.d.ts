declare module "node-record-lpcm16" {
  import type { Readable } from "stream";
  import type { ChildProcess } from "child_process";

  export interface RecordingOptions {
    sampleRate?: number;
    channels?: number;
    threshold?: number;
    recorder?: "sox" | "rec" | "arecord";
    endOnSilence?: boolean;
    audioType?: string;
    device?: string | null;
  }

  export interface Recording {
    stream(): Readable;
    stop(): void;
    pause(): void;
    resume(): void;
    process: ChildProcess;
  }

  const recorder: {
    record(options?: RecordingOptions): Recording;
  };

  export default recorder;
}
