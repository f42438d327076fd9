/**
 * Timings of pipeline stages and session finalization. Callers pass the
 * number of samples that went through, so slow stages show up as low
 * throughput rather than only as long calls on long recordings.
 */

interface TimingRecord {
  elapsedMs: number;
  samples: number;
}

export interface TimingSummary {
  count: number;
  avgMs: number;
  maxMs: number;
  totalSamples: number;
  /** null until some samples and some time have been recorded */
  samplesPerMs: number | null;
}

const records = new Map<string, TimingRecord[]>();

/** Start timing `label`; the returned function records how many samples were handled. */
export function startTimer(label: string): (samples?: number) => number {
  const start = performance.now();
  return (samples = 0) => {
    const elapsedMs = performance.now() - start;
    const list = records.get(label);
    if (list) list.push({ elapsedMs, samples });
    else records.set(label, [{ elapsedMs, samples }]);
    console.debug(`[perf] ${label}: ${elapsedMs.toFixed(1)}ms, ${samples} samples`);
    return elapsedMs;
  };
}

/** Time a synchronous step over `samples` samples and pass its result through. */
export function measure<T>(label: string, samples: number, fn: () => T): T {
  const endTimer = startTimer(label);
  try {
    return fn();
  } finally {
    endTimer(samples);
  }
}

function summarize(list: TimingRecord[]): TimingSummary {
  let totalMs = 0;
  let maxMs = 0;
  let totalSamples = 0;
  for (const { elapsedMs, samples } of list) {
    totalMs += elapsedMs;
    maxMs = Math.max(maxMs, elapsedMs);
    totalSamples += samples;
  }
  return {
    count: list.length,
    avgMs: totalMs / list.length,
    maxMs,
    totalSamples,
    samplesPerMs: totalSamples > 0 && totalMs > 0 ? totalSamples / totalMs : null,
  };
}

export function getTimings(): Record<string, TimingSummary> {
  const result: Record<string, TimingSummary> = {};
  for (const [label, list] of records) result[label] = summarize(list);
  return result;
}

export function clearTimings(): void {
  records.clear();
}
