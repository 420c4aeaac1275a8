import type { ScanPhase } from '@dupsweep/common';
import type { ScanProgress } from './types.js';

type Clock = () => number;

export type ProgressPatch = Partial<
  Omit<ScanProgress, 'startedAtMs' | 'phaseStartedAtMs' | 'elapsedMs' | 'phase'>
>;

/**
 * Owns the progress counters of one scan. Every update builds a new frozen
 * snapshot and swaps it in whole, so readers only ever see complete states.
 */
export class ProgressTracker {
  private current: ScanProgress;
  private readonly now: Clock;

  constructor({ minSize, now = Date.now }: { minSize: number; now?: Clock }) {
    this.now = now;
    const startedAtMs = now();
    const initial: ScanProgress = {
      phase: 'scanning',
      filesVisited: 0,
      filesSkipped: 0,
      filesMatched: 0,
      bytesVisited: 0,
      directoriesPending: 0,
      hashTotal: 0,
      hashDone: 0,
      bytesToHash: 0,
      bytesHashed: 0,
      elapsedMs: 0,
      minSize,
      startedAtMs,
      phaseStartedAtMs: startedAtMs,
    };
    this.current = Object.freeze(initial);
  }

  snapshot(): ScanProgress {
    return this.current;
  }

  update(
    patch: ProgressPatch | ((prev: ScanProgress) => ProgressPatch),
  ): ScanProgress {
    const prev = this.current;
    const next = typeof patch === 'function' ? patch(prev) : patch;
    this.current = Object.freeze({
      ...prev,
      ...next,
      elapsedMs: this.now() - prev.startedAtMs,
    });
    return this.current;
  }

  enterPhase(phase: ScanPhase): ScanProgress {
    const prev = this.current;
    if (prev.phase === phase) return prev;
    const at = this.now();
    this.current = Object.freeze({
      ...prev,
      phase,
      phaseStartedAtMs: at,
      elapsedMs: at - prev.startedAtMs,
    });
    return this.current;
  }
}
