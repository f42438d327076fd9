/**
 * EnhancementPipeline — assembles and runs the fixed-order stage chain.
 * Stages are always instantiated in STAGE_ORDER.
 * Only params and bypass toggles vary per configuration.
 */

import { Stage } from "./Stage";
import {
  STAGE_ORDER,
  type ChainSlot,
  type EnhancementConfig,
  type PcmFormat,
  type SampleBuffer,
  type StageId,
  type StageParams,
} from "./types";
import { configToSlots } from "./configToSlots";
import { NoiseGate } from "./stages/NoiseGate";
import { Compressor } from "./stages/Compressor";
import { GainStage } from "./stages/Gain";
import { Normalizer } from "./stages/Normalizer";
import { readPcmFile, writePcmFileAtomic } from "@/lib/audio/pcmFile";
import { measure, startTimer } from "@/lib/perfTimer";

type StageInstances = { [K in StageId]: Stage<StageParams[K]> };

export class EnhancementPipeline {
  private readonly stages: StageInstances = {
    noiseGate: new NoiseGate(),
    compressor: new Compressor(),
    gain: new GainStage(),
    normalizer: new Normalizer(),
  };
  private bypassed: Set<StageId> = new Set(STAGE_ORDER);

  /**
   * Configure the chain from an array of ChainSlots.
   * Slots not present are bypassed. Order is always STAGE_ORDER.
   */
  configure(slots: ChainSlot[]): void {
    this.bypassed = new Set(STAGE_ORDER);

    for (const slot of slots) {
      switch (slot.id) {
        case "noiseGate": this.stages.noiseGate.configure(slot.params); break;
        case "compressor": this.stages.compressor.configure(slot.params); break;
        case "gain": this.stages.gain.configure(slot.params); break;
        case "normalizer": this.stages.normalizer.configure(slot.params); break;
      }
      if (!slot.bypass) this.bypassed.delete(slot.id);
    }
  }

  /** Get the ordered list of active (non-bypassed) stage IDs. */
  getActiveStages(): StageId[] {
    return STAGE_ORDER.filter((id) => !this.bypassed.has(id));
  }

  /**
   * Run the buffer through every active stage in order.
   * The input buffer is left untouched.
   */
  process(buffer: SampleBuffer): SampleBuffer {
    let samples = buffer.samples;

    for (const id of this.getActiveStages()) {
      const stage: Stage<unknown> = this.stages[id];
      const input = samples;
      samples = measure(`stage:${id}`, input.length, () => stage.process(input));
    }

    return {
      samples: samples === buffer.samples ? samples.slice() : samples,
      sampleRate: buffer.sampleRate,
      channels: buffer.channels,
    };
  }

  /**
   * Enhance a whole PCM file. The input is read in full and never modified;
   * the output appears only once every stage and the write have succeeded.
   * Returns false on any read, processing or write failure.
   */
  async enhance(
    inputFile: string,
    outputFile: string,
    config: EnhancementConfig,
    format: PcmFormat
  ): Promise<boolean> {
    const endTimer = startTimer("enhance");
    let sampleCount = 0;
    try {
      let source: SampleBuffer;
      try {
        source = await readPcmFile(inputFile, format);
      } catch (err) {
        console.error(`[EnhancementPipeline] Cannot read ${inputFile}:`, err);
        return false;
      }

      sampleCount = source.samples.length;
      if (sampleCount === 0) {
        console.error(`[EnhancementPipeline] ${inputFile} holds no audio`);
        return false;
      }

      this.configure(configToSlots(config));
      console.debug(
        `[EnhancementPipeline] ${source.samples.length} samples through [${this.getActiveStages().join(", ")}]`
      );

      try {
        const enhanced = this.process(source);
        await writePcmFileAtomic(outputFile, enhanced.samples);
      } catch (err) {
        console.error(`[EnhancementPipeline] Enhancement of ${inputFile} failed:`, err);
        return false;
      }

      return true;
    } finally {
      endTimer(sampleCount);
    }
  }
}
