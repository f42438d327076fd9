/**
 * CaptureController — owns one capture session at a time.
 *
 * Lifecycle: initialize() probes the source, start() opens the raw capture
 * file and the device handle, chunks are metered and gained as they arrive,
 * and stop() runs the enhancement pipeline from the raw file into the target.
 *
 * Events:
 * - `status` (status: CaptureStatus) on every state change
 * - `level` (level: number) per captured chunk, normalised RMS
 * - `failure` (failure: ProcessingFailure) when a live session dies
 */

import { EventEmitter, once } from "events";
import { createWriteStream, type WriteStream } from "fs";
import { mkdir, rm, stat } from "fs/promises";
import { finished } from "stream/promises";
import { dirname } from "path";

import { isSupported, pcmFormatOf, type AudioQuality } from "@/lib/audio/AudioQuality";
import { fsStorageProbe, type StorageProbe } from "@/lib/audio/storage";
import { EnhancementPipeline } from "@/lib/dsp/EnhancementPipeline";
import type { PcmFormat } from "@/lib/dsp/types";
import { decodePcm16le, encodePcm16le } from "@/lib/dsp/pcm";
import { rms } from "@/lib/dsp/levelMeter";
import { agc, applyGain } from "@/lib/dsp/stages/Gain";
import {
  CaptureError,
  classifyError,
  toFailure,
  type ProcessingErrorKind,
  type ProcessingFailure,
  type ProcessingResult,
  type ProcessingSuccess,
} from "@/lib/errors";
import { applySettingClamps, MAX_REALTIME_GAIN_DB, type CaptureSettings } from "@/lib/settings";
import { startTimer } from "@/lib/perfTimer";
import { canTransition, hasOpenSession, isSettled, type CaptureStatus } from "./captureStatus";
import type { CaptureHandle, CaptureSource } from "./CaptureSource";

/** Raw capture lands beside the target under this suffix until stop() */
export const RAW_SUFFIX = ".raw";

export interface CaptureControllerDeps {
  source: CaptureSource;
  storage?: StorageProbe;
  pipeline?: EnhancementPipeline;
  settings?: Partial<CaptureSettings>;
}

interface CaptureSession {
  quality: AudioQuality;
  outputFile: string;
  rawFile: string;
  writer: WriteStream;
  handle: CaptureHandle | null;
  /** Removes the controller's listeners from the handle's stream */
  detach: () => void;
  /** Odd byte left over from the previous chunk */
  carry: Buffer | null;
  samplesCaptured: number;
}

export class CaptureController extends EventEmitter {
  private readonly source: CaptureSource;
  private readonly storage: StorageProbe;
  private readonly pipeline: EnhancementPipeline;
  private readonly settings: CaptureSettings;

  private status: CaptureStatus = "IDLE";
  private quality: AudioQuality | null = null;
  private session: CaptureSession | null = null;
  private level: number | null = null;
  private realtimeGainDb: number;
  private lastError: ProcessingFailure | null = null;
  /** Lifecycle call still awaiting I/O; a second one is turned away */
  private running: Promise<unknown> | null = null;

  constructor(deps: CaptureControllerDeps) {
    super();
    this.source = deps.source;
    this.storage = deps.storage ?? fsStorageProbe;
    this.pipeline = deps.pipeline ?? new EnhancementPipeline();

    const { settings, clampsApplied } = applySettingClamps(deps.settings ?? {});
    for (const clamp of clampsApplied) console.warn(`[CaptureController] ${clamp}`);
    this.settings = settings;
    this.realtimeGainDb = settings.realtimeGainDb;
  }

  // ── Lifecycle ───────────────────────────────────────────────

  async initializeAudioCapture(quality: AudioQuality): Promise<boolean> {
    return this.exclusive("initialize", false, () => this.initialize(quality));
  }

  async startCapture(target: string): Promise<boolean> {
    return this.exclusive("start", false, () => this.start(target));
  }

  /**
   * Finalize the session: PROCESSING → ENHANCING → FINALIZING → IDLE.
   * Returns null without any state change when no session is open.
   */
  async stopCapture(): Promise<ProcessingResult | null> {
    return this.exclusive("stop", null, () => this.stop());
  }

  /**
   * Tear down whatever is held, once any running start, stop or file
   * operation has settled. An open session's raw capture is flushed and left
   * on disk; nothing is enhanced.
   */
  async release(): Promise<void> {
    while (this.running) {
      await Promise.allSettled([this.running]);
    }
    await this.exclusive("release", undefined, () => this.teardown());
  }

  private async initialize(quality: AudioQuality): Promise<boolean> {
    if (!isSettled(this.status)) {
      console.warn(`[CaptureController] initialize rejected while ${this.status}`);
      return false;
    }

    console.debug(`[CaptureController] Initializing with ${quality.label}`);
    this.setStatus("INITIALIZING");
    this.quality = null;

    try {
      if (!isSupported(quality)) {
        throw new CaptureError(
          "InitializationFailed",
          `Unsupported quality: ${quality.sampleRate} Hz, ${quality.channels} ch, ${quality.bitRate} bps`
        );
      }
      await this.probeWithTimeout(quality);
    } catch (err) {
      const error = err instanceof CaptureError ? err : new CaptureError("HardwareError", errorMessage(err), { cause: err });
      this.enterError(error);
      return false;
    }

    this.quality = quality;
    this.lastError = null;
    this.setStatus("IDLE");
    return true;
  }

  private async start(target: string): Promise<boolean> {
    const quality = this.quality;
    if (!quality) {
      console.warn("[CaptureController] start rejected: not initialized");
      return false;
    }
    if (!isSettled(this.status)) {
      console.warn(`[CaptureController] start rejected while ${this.status}`);
      return false;
    }

    const rawFile = `${target}${RAW_SUFFIX}`;
    let writer: WriteStream | null = null;
    let step: ProcessingErrorKind = "FileCreationFailed";

    try {
      const dir = dirname(target);
      await mkdir(dir, { recursive: true });

      const free = await this.storage.freeBytes(dir);
      if (free < this.settings.minFreeBytes) {
        throw new CaptureError(
          "InsufficientStorage",
          `Only ${free} bytes free in ${dir}; ${this.settings.minFreeBytes} required`
        );
      }

      writer = createWriteStream(rawFile);
      await once(writer, "open");

      step = "HardwareError";
      const handle = this.source.open(quality);
      this.openSession(quality, target, rawFile, writer, handle);
      this.setStatus("CAPTURING");
    } catch (err) {
      const error = classifyError(err, step);
      this.releaseHandle();
      this.session = null;
      writer?.destroy();
      await rm(rawFile, { force: true });
      this.enterError(error);
      return false;
    }

    console.debug(`[CaptureController] Capturing to ${rawFile}`);
    return true;
  }

  pauseCapture(): boolean {
    const handle = this.session?.handle;
    if (this.status !== "CAPTURING" || !handle) return false;

    handle.pause();
    this.setStatus("PAUSED");
    return true;
  }

  resumeCapture(): boolean {
    const handle = this.session?.handle;
    if (this.status !== "PAUSED" || !handle) return false;

    handle.resume();
    this.setStatus("CAPTURING");
    return true;
  }

  private async stop(): Promise<ProcessingResult | null> {
    const session = this.session;
    if (!session || !hasOpenSession(this.status)) {
      console.warn(`[CaptureController] stop rejected while ${this.status}`);
      return null;
    }

    const endTimer = startTimer(`stopCapture:${session.quality.id}`);
    let step: ProcessingErrorKind = "EncodingFailed";

    try {
      this.setStatus("PROCESSING");
      this.releaseHandle();
      session.writer.end();
      await finished(session.writer);

      step = "AudioProcessingFailed";
      this.setStatus("ENHANCING");
      const enhanced = await this.pipeline.enhance(
        session.rawFile,
        session.outputFile,
        this.settings.enhancement,
        pcmFormatOf(session.quality)
      );
      if (!enhanced) {
        throw new CaptureError("AudioProcessingFailed", `Enhancement of ${session.rawFile} failed`);
      }

      step = "FileCreationFailed";
      this.setStatus("FINALIZING");
      const { size } = await stat(session.outputFile);
      await rm(session.rawFile, { force: true });

      const result: ProcessingSuccess = {
        ok: true,
        outputFile: session.outputFile,
        durationMs: durationOf(session),
        fileSizeBytes: size,
        quality: session.quality,
      };

      this.session = null;
      this.level = null;
      this.setStatus("IDLE");
      console.debug(`[CaptureController] Finalized ${result.outputFile}: ${result.durationMs}ms, ${size} bytes`);
      return result;
    } catch (err) {
      const error = classifyError(err, step);
      this.releaseHandle();
      session.writer.destroy();
      this.session = null;
      this.level = null;
      this.enterError(error);
      return toFailure(error);
    } finally {
      endTimer(session.samplesCaptured);
    }
  }

  private async teardown(): Promise<void> {
    const session = this.session;
    this.releaseHandle();
    this.session = null;
    this.quality = null;
    this.level = null;

    if (session) {
      session.writer.end();
      try {
        await finished(session.writer);
      } catch (err) {
        console.error(`[CaptureController] Raw capture ${session.rawFile} was not flushed:`, err);
      }
    }

    // The one move outside the transition table: nothing else is running here
    if (this.status !== "IDLE") {
      this.status = "IDLE";
      this.emit("status", this.status);
    }
  }

  // ── File operations ─────────────────────────────────────────

  async applyAudioEnhancement(inputFile: string, outputFile: string): Promise<boolean> {
    return this.runFileOperation("ENHANCING", () =>
      this.pipeline.enhance(inputFile, outputFile, this.settings.enhancement, this.fileFormat())
    );
  }

  /** Normalize `file` in place; it is replaced only when the whole pass succeeds. */
  async normalizeAudio(file: string): Promise<boolean> {
    return this.runFileOperation("PROCESSING", () =>
      this.pipeline.enhance(
        file,
        file,
        { noiseReduction: false, compression: false, normalization: true, targetGainDb: 0 },
        this.fileFormat()
      )
    );
  }

  // ── Real-time controls and queries ──────────────────────────

  applyRealtimeGain(gainDb: number): boolean {
    if (Number.isNaN(gainDb)) return false;
    this.realtimeGainDb = Math.max(-MAX_REALTIME_GAIN_DB, Math.min(MAX_REALTIME_GAIN_DB, gainDb));
    console.debug(`[CaptureController] Realtime gain set to ${this.realtimeGainDb}dB`);
    return true;
  }

  getRealtimeGain(): number {
    return this.realtimeGainDb;
  }

  getCurrentAudioLevel(): number | null {
    return this.status === "CAPTURING" ? this.level : null;
  }

  getCurrentDuration(): number {
    return this.session ? durationOf(this.session) : 0;
  }

  isCapturing(): boolean {
    return this.status === "CAPTURING";
  }

  getProcessingStatus(): CaptureStatus {
    return this.status;
  }

  getLastError(): ProcessingFailure | null {
    return this.lastError;
  }

  // ── Internals ───────────────────────────────────────────────

  private setStatus(next: CaptureStatus): void {
    if (!canTransition(this.status, next)) {
      throw new CaptureError("Unknown", `Illegal transition ${this.status} → ${next}`);
    }
    if (next === this.status) return;
    this.status = next;
    this.emit("status", next);
  }

  private enterError(error: CaptureError): void {
    console.error(`[CaptureController] ${error.kind}: ${error.message}`);
    this.lastError = toFailure(error);
    this.setStatus("ERROR");
  }

  private async probeWithTimeout(quality: AudioQuality): Promise<void> {
    const ac = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Settle first so the race reports the timeout, not the probe's abort error
        reject(new CaptureError("HardwareError", `Capture source did not respond within ${this.settings.initTimeoutMs}ms`));
        ac.abort();
      }, this.settings.initTimeoutMs);
    });

    try {
      await Promise.race([this.source.probe(quality, ac.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private openSession(
    quality: AudioQuality,
    outputFile: string,
    rawFile: string,
    writer: WriteStream,
    handle: CaptureHandle
  ): void {
    const stream = handle.stream;
    const onData = (chunk: Buffer) => this.handleChunk(chunk);
    const onError = (err: unknown) => this.failSession(classifyError(err, "HardwareError"));
    const onEnd = () => this.failSession(new CaptureError("HardwareError", "Capture stream ended unexpectedly"));
    const onWriteError = (err: unknown) => this.failSession(classifyError(err, "EncodingFailed"));

    stream.on("data", onData);
    stream.on("error", onError);
    stream.on("end", onEnd);
    writer.on("error", onWriteError);

    this.session = {
      quality,
      outputFile,
      rawFile,
      writer,
      handle,
      carry: null,
      samplesCaptured: 0,
      detach: () => {
        stream.off("data", onData);
        stream.off("error", onError);
        stream.off("end", onEnd);
        writer.off("error", onWriteError);
        // The recorder may still report its own exit after release
        stream.on("error", (err: unknown) => {
          console.debug("[CaptureController] Capture stream error after release:", err);
        });
        // finished() in stop()/release() observes write errors from here on
        writer.on("error", (err: unknown) => {
          console.debug("[CaptureController] Raw capture write error after release:", err);
        });
      },
    };
  }

  private handleChunk(chunk: Buffer): void {
    const session = this.session;
    if (!session || this.status !== "CAPTURING") return;

    const bytes = session.carry ? Buffer.concat([session.carry, chunk]) : chunk;
    const usable = bytes.length - (bytes.length % 2);
    session.carry = usable < bytes.length ? bytes.subarray(usable) : null;
    if (usable === 0) return;

    let samples = decodePcm16le(bytes.subarray(0, usable));
    session.samplesCaptured += samples.length;

    this.level = rms(samples);
    this.emit("level", this.level);

    if (this.settings.realtimeAgc) {
      samples = agc(samples, this.settings.agcTargetLevel, this.settings.agcMaxGainDb);
    }
    if (this.realtimeGainDb !== 0) {
      samples = applyGain(samples, this.realtimeGainDb);
    }

    if (!session.writer.write(encodePcm16le(samples))) {
      this.holdUntilDrained(session);
    }
  }

  /** Stop reading from the source until the raw file writer has caught up. */
  private holdUntilDrained(session: CaptureSession): void {
    const stream = session.handle?.stream;
    if (!stream || stream.isPaused()) return;

    stream.pause();
    session.writer.once("drain", () => {
      if (session.handle) stream.resume();
    });
  }

  private failSession(error: CaptureError): void {
    const session = this.session;
    if (!session || !hasOpenSession(this.status)) return;

    this.releaseHandle();
    // Keep whatever audio already reached the raw file
    session.writer.end();
    this.session = null;
    this.level = null;
    this.enterError(error);
    this.emit("failure", toFailure(error));
  }

  /** Stop the device exactly once; later calls are no-ops. */
  private releaseHandle(): void {
    const session = this.session;
    const handle = session?.handle;
    if (!session || !handle) return;

    session.handle = null;
    session.detach();
    try {
      handle.stop();
    } catch (err) {
      console.error("[CaptureController] Capture handle did not stop cleanly:", err);
    }
  }

  private fileFormat(): PcmFormat {
    return pcmFormatOf(this.session?.quality ?? this.quality ?? this.settings.quality);
  }

  /**
   * Standalone file work. While a session is open the status is left alone;
   * otherwise it moves through `busy` and settles on IDLE or ERROR.
   */
  private async runFileOperation(
    busy: "ENHANCING" | "PROCESSING",
    operation: () => Promise<boolean>
  ): Promise<boolean> {
    if (this.session) return operation();

    return this.exclusive(busy, false, async () => {
      if (!isSettled(this.status)) {
        console.warn(`[CaptureController] File operation rejected while ${this.status}`);
        return false;
      }

      this.setStatus(busy);
      const ok = await operation();
      if (ok) {
        this.setStatus("IDLE");
      } else {
        this.enterError(new CaptureError("AudioProcessingFailed", "Audio file operation failed"));
      }
      return ok;
    });
  }

  /**
   * Run one lifecycle operation at a time. The claim is taken before the
   * operation's first await, so an overlapping call sees it and gets
   * `rejected` back.
   */
  private async exclusive<T>(name: string, rejected: T, operation: () => Promise<T>): Promise<T> {
    if (this.running) {
      console.warn(`[CaptureController] ${name} rejected while another operation is running`);
      return rejected;
    }

    const running = operation();
    this.running = running;
    try {
      return await running;
    } finally {
      this.running = null;
    }
  }
}

function durationOf(session: CaptureSession): number {
  const { sampleRate, channels } = session.quality;
  return Math.round((session.samplesCaptured * 1000) / (sampleRate * channels));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
