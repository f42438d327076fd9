import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { access, mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { CaptureController, RAW_SUFFIX } from "../CaptureController";
import { AUDIO_QUALITY } from "@/lib/audio/AudioQuality";
import { decodePcm16le, encodePcm16le } from "@/lib/dsp/pcm";
import type { EnhancementConfig } from "@/lib/dsp/types";
import type { CaptureSettings } from "@/lib/settings";
import type { ProcessingFailure } from "@/lib/errors";
import type { CaptureStatus } from "../captureStatus";
import { FakeCaptureSource, errnoError, flush } from "./fakeCaptureSource";

const PASSTHROUGH: EnhancementConfig = {
  noiseReduction: false,
  compression: false,
  normalization: false,
  targetGainDb: 0,
};

function makeController(
  source: FakeCaptureSource,
  settings: Partial<CaptureSettings> = {},
  freeBytes = Number.MAX_SAFE_INTEGER
): CaptureController {
  return new CaptureController({
    source,
    storage: { freeBytes: () => Promise.resolve(freeBytes) },
    settings,
  });
}

function recordStatuses(controller: CaptureController): CaptureStatus[] {
  const statuses: CaptureStatus[] = [];
  controller.on("status", (status: CaptureStatus) => statuses.push(status));
  return statuses;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe("CaptureController", () => {
  let dir: string;
  let target: string;

  beforeEach(async () => {
    vi.spyOn(console, "debug").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    dir = await mkdtemp(join(tmpdir(), "capture-"));
    target = join(dir, "call.pcm");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe("initializeAudioCapture", () => {
    it("settles on IDLE once the source answers", async () => {
      const controller = makeController(new FakeCaptureSource());
      const statuses = recordStatuses(controller);

      expect(await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD)).toBe(true);
      expect(statuses).toEqual(["INITIALIZING", "IDLE"]);
      expect(controller.getLastError()).toBeNull();
    });

    it("rejects an unsupported quality", async () => {
      const controller = makeController(new FakeCaptureSource());

      const ok = await controller.initializeAudioCapture({ ...AUDIO_QUALITY.STANDARD, channels: 6 });

      expect(ok).toBe(false);
      expect(controller.getProcessingStatus()).toBe("ERROR");
      expect(controller.getLastError()?.kind).toBe("InitializationFailed");
    });

    it("gives up on a source that does not answer in time", async () => {
      const source = new FakeCaptureSource({ probe: "hang" });
      const controller = makeController(source, { initTimeoutMs: 100 });

      const ok = await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);

      expect(ok).toBe(false);
      expect(controller.getLastError()).toEqual({
        ok: false,
        kind: "HardwareError",
        message: "Capture source did not respond within 100ms",
      });
      expect(source.lastSignal?.aborted).toBe(true);
    });

    it("reports a failed probe as a hardware error", async () => {
      const controller = makeController(new FakeCaptureSource({ probe: new Error("no device") }));

      expect(await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD)).toBe(false);
      expect(controller.getLastError()).toEqual({ ok: false, kind: "HardwareError", message: "no device" });
    });
  });

  describe("session lifecycle", () => {
    it("refuses to start before initialization", async () => {
      const controller = makeController(new FakeCaptureSource());

      expect(await controller.startCapture(target)).toBe(false);
      expect(controller.getProcessingStatus()).toBe("IDLE");
    });

    it("returns null from stop when nothing is capturing", async () => {
      const controller = makeController(new FakeCaptureSource());
      const statuses = recordStatuses(controller);

      expect(await controller.stopCapture()).toBeNull();
      expect(statuses).toEqual([]);
    });

    it("captures, enhances and finalizes into the target", async () => {
      const source = new FakeCaptureSource();
      const controller = makeController(source);
      const statuses = recordStatuses(controller);

      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);
      expect(await controller.startCapture(target)).toBe(true);
      expect(controller.isCapturing()).toBe(true);

      source.current.feed(new Array<number>(4410).fill(1000));
      await flush();
      expect(controller.getCurrentDuration()).toBe(100);

      const result = await controller.stopCapture();

      expect(result).toEqual({
        ok: true,
        outputFile: target,
        durationMs: 100,
        fileSizeBytes: 8820,
        quality: AUDIO_QUALITY.STANDARD,
      });
      expect(statuses).toEqual([
        "INITIALIZING",
        "IDLE",
        "CAPTURING",
        "PROCESSING",
        "ENHANCING",
        "FINALIZING",
        "IDLE",
      ]);
      const enhanced = decodePcm16le(await readFile(target));
      expect(enhanced[0]).toBe(32767);
      expect(await exists(`${target}${RAW_SUFFIX}`)).toBe(false);
      expect(source.current.stopCalls).toBe(1);
      expect(controller.getCurrentDuration()).toBe(0);
    });

    it("rejects a second start and keeps the first session running", async () => {
      const source = new FakeCaptureSource();
      const controller = makeController(source, { enhancement: PASSTHROUGH });

      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);
      await controller.startCapture(target);

      expect(await controller.startCapture(join(dir, "other.pcm"))).toBe(false);
      expect(source.handles).toHaveLength(1);
      expect(controller.getProcessingStatus()).toBe("CAPTURING");

      source.current.feed([1, 2, 3]);
      await flush();
      const result = await controller.stopCapture();
      expect(result?.ok).toBe(true);
      expect(Array.from(decodePcm16le(await readFile(target)))).toEqual([1, 2, 3]);
    });

    it("pauses and resumes without counting audio sent while paused", async () => {
      const source = new FakeCaptureSource();
      const controller = makeController(source);

      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);
      await controller.startCapture(target);

      expect(controller.pauseCapture()).toBe(true);
      expect(controller.pauseCapture()).toBe(false);
      expect(controller.getProcessingStatus()).toBe("PAUSED");
      expect(controller.getCurrentAudioLevel()).toBeNull();

      source.current.feed(new Array<number>(441).fill(1000));
      await flush();
      expect(controller.getCurrentDuration()).toBe(0);

      expect(controller.resumeCapture()).toBe(true);
      expect(controller.resumeCapture()).toBe(false);
      expect(source.current.pauseCalls).toBe(1);
      expect(source.current.resumeCalls).toBe(1);

      source.current.feed(new Array<number>(441).fill(1000));
      await flush();
      expect(controller.getCurrentDuration()).toBe(10);
    });

    it("finalizes from PAUSED", async () => {
      const source = new FakeCaptureSource();
      const controller = makeController(source, { enhancement: PASSTHROUGH });

      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);
      await controller.startCapture(target);
      source.current.feed([5, 6]);
      await flush();
      controller.pauseCapture();

      const result = await controller.stopCapture();
      expect(result?.ok).toBe(true);
      expect(controller.getProcessingStatus()).toBe("IDLE");
    });

    it("reports an empty capture as a processing failure and keeps the raw file", async () => {
      const source = new FakeCaptureSource();
      const controller = makeController(source);

      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);
      await controller.startCapture(target);

      const result = await controller.stopCapture();

      expect(result?.ok).toBe(false);
      expect(result).toMatchObject({ kind: "AudioProcessingFailed" });
      expect(controller.getProcessingStatus()).toBe("ERROR");
      expect(await exists(`${target}${RAW_SUFFIX}`)).toBe(true);
      expect(await exists(target)).toBe(false);
      expect(source.current.stopCalls).toBe(1);
    });

    it("can start a new session after an error", async () => {
      const source = new FakeCaptureSource();
      const controller = makeController(source);

      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);
      await controller.startCapture(target);
      await controller.stopCapture();
      expect(controller.getProcessingStatus()).toBe("ERROR");

      expect(await controller.startCapture(join(dir, "retry.pcm"))).toBe(true);
      expect(controller.getProcessingStatus()).toBe("CAPTURING");
    });
  });

  describe("start failures", () => {
    it("refuses to start with too little free space", async () => {
      const controller = makeController(new FakeCaptureSource(), {}, 1024);
      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);

      expect(await controller.startCapture(target)).toBe(false);
      expect(controller.getLastError()?.kind).toBe("InsufficientStorage");
      expect(await readdir(dir)).toEqual([]);
    });

    it("reports a missing recorder as an unavailable source and removes the raw file", async () => {
      const controller = makeController(new FakeCaptureSource({ openError: errnoError("ENOENT") }));
      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);

      expect(await controller.startCapture(target)).toBe(false);
      expect(controller.getLastError()?.kind).toBe("SourceUnavailable");
      expect(controller.getProcessingStatus()).toBe("ERROR");
      expect(await exists(`${target}${RAW_SUFFIX}`)).toBe(false);
    });

    it("reports a refused device as a permission problem", async () => {
      const controller = makeController(new FakeCaptureSource({ openError: errnoError("EACCES") }));
      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);

      expect(await controller.startCapture(target)).toBe(false);
      expect(controller.getLastError()?.kind).toBe("PermissionDenied");
    });
  });

  describe("live processing", () => {
    it("meters each chunk", async () => {
      const source = new FakeCaptureSource();
      const controller = makeController(source);
      const levels: number[] = [];
      controller.on("level", (level: number) => levels.push(level));

      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);
      await controller.startCapture(target);
      source.current.feed([16384, -16384]);
      await flush();

      expect(levels).toEqual([0.5]);
      expect(controller.getCurrentAudioLevel()).toBe(0.5);
    });

    it("joins samples split across chunks", async () => {
      const source = new FakeCaptureSource();
      const controller = makeController(source, { enhancement: PASSTHROUGH });

      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);
      await controller.startCapture(target);
      const bytes = encodePcm16le(Int16Array.from([300, -300]));
      source.current.stream.write(bytes.subarray(0, 3));
      await flush();
      source.current.stream.write(bytes.subarray(3));
      await flush();

      await controller.stopCapture();
      expect(Array.from(decodePcm16le(await readFile(target)))).toEqual([300, -300]);
    });

    it("applies real-time gain before the raw file", async () => {
      const source = new FakeCaptureSource();
      const controller = makeController(source, { enhancement: PASSTHROUGH });

      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);
      await controller.startCapture(target);
      expect(controller.applyRealtimeGain(6)).toBe(true);
      source.current.feed([1000, -1000]);
      await flush();

      await controller.stopCapture();
      expect(Array.from(decodePcm16le(await readFile(target)))).toEqual([1995, -1995]);
    });

    it("clamps real-time gain to +20 dB", async () => {
      const source = new FakeCaptureSource();
      const controller = makeController(source, { enhancement: PASSTHROUGH });

      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);
      await controller.startCapture(target);
      controller.applyRealtimeGain(50);
      expect(controller.getRealtimeGain()).toBe(20);
      expect(controller.applyRealtimeGain(Number.NaN)).toBe(false);
      source.current.feed([1000]);
      await flush();

      await controller.stopCapture();
      expect(Array.from(decodePcm16le(await readFile(target)))).toEqual([10000]);
    });

    it("runs AGC on chunks when enabled", async () => {
      const source = new FakeCaptureSource();
      const controller = makeController(source, { enhancement: PASSTHROUGH, realtimeAgc: true });

      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);
      await controller.startCapture(target);
      source.current.feed([100, -100]);
      await flush();

      await controller.stopCapture();
      expect(Array.from(decodePcm16le(await readFile(target)))).toEqual([1000, -1000]);
    });

    it("fails the session when the source errors", async () => {
      const source = new FakeCaptureSource();
      const controller = makeController(source);
      const failures: ProcessingFailure[] = [];
      controller.on("failure", (failure: ProcessingFailure) => failures.push(failure));

      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);
      await controller.startCapture(target);
      source.current.stream.emit("error", new Error("device unplugged"));

      expect(controller.getProcessingStatus()).toBe("ERROR");
      expect(failures).toEqual([{ ok: false, kind: "HardwareError", message: "device unplugged" }]);
      expect(source.current.stopCalls).toBe(1);
      expect(await controller.stopCapture()).toBeNull();
      expect(source.current.stopCalls).toBe(1);
    });

    it("fails the session when the source ends on its own", async () => {
      const source = new FakeCaptureSource();
      const controller = makeController(source);

      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);
      await controller.startCapture(target);
      source.current.stream.end();
      await flush();

      expect(controller.getProcessingStatus()).toBe("ERROR");
      expect(controller.getLastError()?.message).toBe("Capture stream ended unexpectedly");
    });
  });

  describe("overlapping calls", () => {
    it("opens a single session when two starts overlap", async () => {
      const source = new FakeCaptureSource();
      const controller = makeController(source);
      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);

      const results = await Promise.all([
        controller.startCapture(target),
        controller.startCapture(join(dir, "other.pcm")),
      ]);

      expect(results).toEqual([true, false]);
      expect(source.handles).toHaveLength(1);
      expect(controller.getProcessingStatus()).toBe("CAPTURING");
      expect(await exists(join(dir, `other.pcm${RAW_SUFFIX}`))).toBe(false);
    });

    it("turns away initialize while a start is opening its files", async () => {
      const source = new FakeCaptureSource();
      const controller = makeController(source);
      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);

      const [started, initialized] = await Promise.all([
        controller.startCapture(target),
        controller.initializeAudioCapture(AUDIO_QUALITY.HIGH_QUALITY),
      ]);

      expect(started).toBe(true);
      expect(initialized).toBe(false);
      expect(controller.getProcessingStatus()).toBe("CAPTURING");
    });

    it("lets a running stop finish before release tears down", async () => {
      const source = new FakeCaptureSource();
      const controller = makeController(source);
      const statuses = recordStatuses(controller);

      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);
      await controller.startCapture(target);
      source.current.feed(new Array<number>(4410).fill(1000));
      await flush();

      const stopping = controller.stopCapture();
      await flush();
      await controller.release();
      const result = await stopping;

      expect(result).toMatchObject({ ok: true, outputFile: target, fileSizeBytes: 8820 });
      expect(await exists(target)).toBe(true);
      expect(statuses).not.toContain("ERROR");
      expect(controller.getProcessingStatus()).toBe("IDLE");
      expect(source.current.stopCalls).toBe(1);
    });
  });

  describe("raw file backpressure", () => {
    it("pauses the source until the raw file writer drains", async () => {
      const source = new FakeCaptureSource();
      const controller = makeController(source, { enhancement: PASSTHROUGH });

      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);
      await controller.startCapture(target);
      await flush();

      const flow: string[] = [];
      source.current.stream.on("pause", () => flow.push("pause"));
      source.current.stream.on("resume", () => flow.push("resume"));

      // 64 KiB in one chunk is past the writer's high-water mark
      source.current.feed(new Array<number>(32768).fill(1000));
      await vi.waitFor(() => expect(flow).toEqual(["pause", "resume"]));

      const result = await controller.stopCapture();
      expect(result).toMatchObject({ ok: true, fileSizeBytes: 65536 });
    });
  });

  describe("release", () => {
    it("stops the device and returns to IDLE", async () => {
      const source = new FakeCaptureSource();
      const controller = makeController(source);

      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);
      await controller.startCapture(target);
      await controller.release();

      expect(controller.getProcessingStatus()).toBe("IDLE");
      expect(source.current.stopCalls).toBe(1);
      expect(await controller.startCapture(target)).toBe(false);
    });
  });

  describe("file operations", () => {
    it("enhances a file outside a session", async () => {
      const controller = makeController(new FakeCaptureSource());
      const statuses = recordStatuses(controller);
      const input = join(dir, "in.pcm");
      const output = join(dir, "out.pcm");
      await writeFile(input, encodePcm16le(Int16Array.from([100, -200, 50])));

      expect(await controller.applyAudioEnhancement(input, output)).toBe(true);
      expect(statuses).toEqual(["ENHANCING", "IDLE"]);
      expect(Array.from(decodePcm16le(await readFile(output)))).toEqual([16383, -32767, 8191]);
    });

    it("moves to ERROR when a standalone enhancement fails", async () => {
      const controller = makeController(new FakeCaptureSource());

      const ok = await controller.applyAudioEnhancement(join(dir, "missing.pcm"), join(dir, "out.pcm"));

      expect(ok).toBe(false);
      expect(controller.getProcessingStatus()).toBe("ERROR");
      expect(controller.getLastError()?.kind).toBe("AudioProcessingFailed");
    });

    it("normalizes a file in place", async () => {
      const controller = makeController(new FakeCaptureSource());
      const statuses = recordStatuses(controller);
      const file = join(dir, "quiet.pcm");
      await writeFile(file, encodePcm16le(Int16Array.from([100, -200, 50])));

      expect(await controller.normalizeAudio(file)).toBe(true);
      expect(statuses).toEqual(["PROCESSING", "IDLE"]);
      expect(Array.from(decodePcm16le(await readFile(file)))).toEqual([16383, -32767, 8191]);
    });

    it("leaves the session status alone while capturing", async () => {
      const controller = makeController(new FakeCaptureSource());
      const file = join(dir, "side.pcm");
      await writeFile(file, encodePcm16le(Int16Array.from([100, -200])));

      await controller.initializeAudioCapture(AUDIO_QUALITY.STANDARD);
      await controller.startCapture(target);
      const statuses = recordStatuses(controller);

      expect(await controller.normalizeAudio(file)).toBe(true);
      expect(statuses).toEqual([]);
      expect(controller.getProcessingStatus()).toBe("CAPTURING");
    });
  });
});
