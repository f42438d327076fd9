/**
 * Abstract base class for all enhancement stages.
 * A stage never mutates its input: process() returns a new Int16Array.
 */

import type { StageId } from "./types";

export abstract class Stage<P> {
  abstract readonly id: StageId;

  constructor(protected params: P) {}

  /** Replace parameters ahead of the next process() call */
  configure(params: P): void {
    this.params = params;
  }

  abstract process(samples: Int16Array): Int16Array;
}
