/**
 * Progress sinks for the orchestrator.
 */
import type { ProgressSink } from "./types";

export type ProgressCallback = (done: number, total: number, batchId: string) => void;

/** Adapt a plain callback (a dashboard's progress handler, a test spy) to ProgressSink. */
export function progressFromCallback(callback: ProgressCallback): ProgressSink {
  return { onClusterComplete: callback };
}

/** Logs every `every`-th completion and the last one. */
export function createConsoleProgressSink(every = 25): ProgressSink {
  return {
    onClusterComplete(done, total, batchId) {
      if (done % every === 0 || done === total) {
        const pct = total > 0 ? ((done / total) * 100).toFixed(1) : "100.0";
        console.log(`[enrich] [${batchId}] ${done}/${total} processed (${pct}%)`);
      }
    },
  };
}
