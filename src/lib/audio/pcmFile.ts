/**
 * Whole-file PCM I/O for the enhancement pipeline.
 * Files are raw 16-bit little-endian samples with no header.
 */
import { readFile, rename, rm, writeFile } from "fs/promises";
import { decodePcm16le, encodePcm16le } from "@/lib/dsp/pcm";
import { createSampleBuffer, type PcmFormat, type SampleBuffer } from "@/lib/dsp/types";

/** Suffix of the sibling file written before the atomic rename */
export const TEMP_SUFFIX = ".tmp";

/**
 * Read a PCM file into an owned buffer. Trailing bytes that do not make a
 * whole frame are dropped.
 */
export async function readPcmFile(path: string, format: PcmFormat): Promise<SampleBuffer> {
  const bytes = await readFile(path);
  const frameBytes = 2 * format.channels;
  const usable = bytes.length - (bytes.length % frameBytes);
  const samples = decodePcm16le(bytes.subarray(0, usable));
  return createSampleBuffer(samples, format.sampleRate, format.channels);
}

/**
 * Write samples next to `path` and rename into place, so `path` either keeps
 * its previous contents or holds the complete new ones.
 */
export async function writePcmFileAtomic(path: string, samples: Int16Array): Promise<void> {
  const tempPath = `${path}${TEMP_SUFFIX}`;
  try {
    await writeFile(tempPath, encodePcm16le(samples));
    await rename(tempPath, path);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }
}
