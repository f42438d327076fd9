/**
 * Error taxonomy and the typed result returned by capture finalization.
 */
import type { AudioQuality } from "@/lib/audio/AudioQuality";

export const PROCESSING_ERROR_KINDS = [
  "InitializationFailed",
  "SourceUnavailable",
  "PermissionDenied",
  "InsufficientStorage",
  "EncodingFailed",
  "FileCreationFailed",
  "HardwareError",
  "AudioProcessingFailed",
  "Unknown",
] as const;

export type ProcessingErrorKind = (typeof PROCESSING_ERROR_KINDS)[number];

export class CaptureError extends Error {
  constructor(
    readonly kind: ProcessingErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "CaptureError";
  }
}

export interface ProcessingSuccess {
  ok: true;
  outputFile: string;
  durationMs: number;
  fileSizeBytes: number;
  quality: AudioQuality;
}

export interface ProcessingFailure {
  ok: false;
  kind: ProcessingErrorKind;
  message: string;
}

export type ProcessingResult = ProcessingSuccess | ProcessingFailure;

export function toFailure(error: CaptureError): ProcessingFailure {
  return { ok: false, kind: error.kind, message: error.message };
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Wrap anything thrown into a CaptureError. Errno codes that identify the
 * cause win over `fallback`, which names the step that was running.
 */
export function classifyError(err: unknown, fallback: ProcessingErrorKind): CaptureError {
  if (err instanceof CaptureError) return err;

  const message = err instanceof Error ? err.message : String(err);
  const code = errnoCode(err);

  if (code === "ENOSPC" || code === "EDQUOT") {
    return new CaptureError("InsufficientStorage", message, { cause: err });
  }

  // The capture source is the only place a missing binary or an access
  // refusal points at the device rather than the filesystem
  if (fallback === "HardwareError") {
    if (code === "ENOENT") return new CaptureError("SourceUnavailable", message, { cause: err });
    if (code === "EACCES" || code === "EPERM") {
      return new CaptureError("PermissionDenied", message, { cause: err });
    }
  }

  return new CaptureError(fallback, message, { cause: err });
}
