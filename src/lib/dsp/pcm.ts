/**
 * 16-bit PCM helpers shared by every stage.
 * Expects signed little-endian samples, no container header.
 */
import { INT16_MAX, INT16_MIN } from "./types";

/** Truncate toward zero and hard-clip into the int16 range. */
export function toInt16(value: number): number {
  if (value >= INT16_MAX) return INT16_MAX;
  if (value <= INT16_MIN) return INT16_MIN;
  return Math.trunc(value);
}

export function dbToLinear(db: number): number {
  return Math.pow(10, db / 20);
}

/**
 * Decode a byte buffer into samples. A trailing odd byte is ignored;
 * callers streaming chunks must carry it over themselves.
 */
export function decodePcm16le(bytes: Buffer): Int16Array {
  const count = Math.floor(bytes.length / 2);
  const samples = new Int16Array(count);
  for (let i = 0; i < count; i++) {
    samples[i] = bytes.readInt16LE(i * 2);
  }
  return samples;
}

export function encodePcm16le(samples: Int16Array): Buffer {
  const bytes = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i++) {
    bytes.writeInt16LE(samples[i], i * 2);
  }
  return bytes;
}
