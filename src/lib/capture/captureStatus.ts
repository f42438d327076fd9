export const CAPTURE_STATUSES = [
  "IDLE",
  "INITIALIZING",
  "CAPTURING",
  "PAUSED",
  "PROCESSING",
  "ENHANCING",
  "FINALIZING",
  "ERROR",
] as const;

export type CaptureStatus = (typeof CAPTURE_STATUSES)[number];

/**
 * Every allowed move of the controller. PROCESSING and ENHANCING are also
 * entered from IDLE/ERROR by standalone file operations.
 */
const TRANSITIONS: Readonly<Record<CaptureStatus, readonly CaptureStatus[]>> = {
  IDLE: ["INITIALIZING", "CAPTURING", "PROCESSING", "ENHANCING", "ERROR"],
  INITIALIZING: ["IDLE", "ERROR"],
  CAPTURING: ["PAUSED", "PROCESSING", "ERROR"],
  PAUSED: ["CAPTURING", "PROCESSING", "ERROR"],
  PROCESSING: ["ENHANCING", "IDLE", "ERROR"],
  ENHANCING: ["FINALIZING", "IDLE", "ERROR"],
  FINALIZING: ["IDLE", "ERROR"],
  ERROR: ["INITIALIZING", "CAPTURING", "PROCESSING", "ENHANCING", "IDLE"],
};

export function canTransition(from: CaptureStatus, to: CaptureStatus): boolean {
  return from === to || TRANSITIONS[from].includes(to);
}

/** States from which a new session may be initialized or started */
export function isSettled(status: CaptureStatus): boolean {
  return status === "IDLE" || status === "ERROR";
}

export function hasOpenSession(status: CaptureStatus): boolean {
  return status === "CAPTURING" || status === "PAUSED";
}
