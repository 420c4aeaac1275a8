import fs from 'node:fs/promises';
import path from 'node:path';
import type { BudgetDecision, ScanPhase } from '@dupsweep/common';
import { InvalidConfigurationError } from './errors.js';
import type { ScanProgress, TimeBudget } from './types.js';

export const MIN_SUGGESTED_MIN_SIZE = 50 * 1024 * 1024;
// Rates measured over less than this are too noisy to act on.
export const MIN_SAMPLE_MS = 2000;
const RUNNING_MAX_HEADROOM = 1.25;

export type BudgetCheck =
  | { kind: 'estimating'; remainingSeconds: number }
  | { kind: 'within'; etaSeconds: number; remainingSeconds: number }
  | {
      kind: 'exceeded';
      etaSeconds: number;
      remainingSeconds: number;
      suggestedMinSize: number;
    };

export type BudgetExceeded = Extract<BudgetCheck, { kind: 'exceeded' }>;

export function suggestMinSize(current: number): number {
  return Math.max(current * 2, MIN_SUGGESTED_MIN_SIZE);
}

/**
 * Used bytes of the volume when `root` is a volume root, as a first guess of
 * how much a full walk will visit. Deeper roots get no initial guess: the
 * volume figure would overstate them by an unknown factor.
 */
export async function estimateTreeBytes(
  root: string,
): Promise<number | undefined> {
  const resolved = path.resolve(root);
  if (path.parse(resolved).root !== resolved) return undefined;
  try {
    const stats = await fs.statfs(resolved);
    const used = (stats.blocks - stats.bfree) * stats.bsize;
    return used > 0 ? used : undefined;
  } catch {
    return undefined;
  }
}

export class TimeBudgetEstimator {
  private readonly requestedMinutes: number;
  private currentMinSize: number;
  private raiseRequests = 0;
  private initialEstimateBytes: number | undefined;
  private runningMaxBytes = 0;
  private acknowledgedPhase: ScanPhase | null = null;
  private pausedPhase: ScanPhase | null = null;
  private pausedMs = 0;

  constructor({
    timeBudgetMinutes,
    minSize,
    initialEstimateBytes,
  }: {
    timeBudgetMinutes: number;
    minSize: number;
    initialEstimateBytes?: number;
  }) {
    this.requestedMinutes = timeBudgetMinutes;
    this.currentMinSize = minSize;
    this.initialEstimateBytes = initialEstimateBytes;
  }

  get minSize() {
    return this.currentMinSize;
  }

  get budget(): TimeBudget {
    return {
      requestedMinutes: this.requestedMinutes,
      minSize: this.currentMinSize,
      raiseRequests: this.raiseRequests,
    };
  }

  setInitialEstimate(bytes: number | undefined) {
    this.initialEstimateBytes = bytes;
  }

  /** Current projection of total bytes the walk will visit. */
  estimatedTotalBytes(bytesVisited: number): number {
    if (bytesVisited > this.runningMaxBytes) {
      this.runningMaxBytes = bytesVisited * RUNNING_MAX_HEADROOM;
    }
    return Math.max(this.initialEstimateBytes ?? 0, this.runningMaxBytes);
  }

  private sample(
    progress: ScanProgress,
  ): { done: number; total: number } | null {
    if (progress.phase === 'scanning') {
      const done = progress.bytesVisited;
      return { done, total: this.estimatedTotalBytes(done) };
    }
    if (progress.phase === 'hashing') {
      return { done: progress.bytesHashed, total: progress.bytesToHash };
    }
    return null;
  }

  check(progress: ScanProgress, nowMs: number): BudgetCheck {
    const budgetMs = this.requestedMinutes * 60_000;
    const remainingSeconds = (budgetMs - (nowMs - progress.startedAtMs)) / 1000;
    const sample = this.sample(progress);
    const paused =
      this.pausedPhase === progress.phase ? this.pausedMs : 0;
    const phaseMs = nowMs - progress.phaseStartedAtMs - paused;
    if (!sample || sample.done <= 0 || phaseMs < MIN_SAMPLE_MS) {
      return { kind: 'estimating', remainingSeconds };
    }

    const rate = sample.done / (phaseMs / 1000);
    const etaSeconds = Math.max(0, (sample.total - sample.done) / rate);
    if (
      etaSeconds > Math.max(0, remainingSeconds) &&
      this.acknowledgedPhase !== progress.phase
    ) {
      return {
        kind: 'exceeded',
        etaSeconds,
        remainingSeconds,
        suggestedMinSize: suggestMinSize(this.currentMinSize),
      };
    }
    return { kind: 'within', etaSeconds, remainingSeconds };
  }

  validateDecision(decision: BudgetDecision) {
    if (decision.action !== 'raise') return;
    if (!Number.isInteger(decision.minSize) || decision.minSize < 0) {
      throw new InvalidConfigurationError([
        { path: 'minSize', message: 'must be a non-negative integer' },
      ]);
    }
    if (decision.minSize < this.currentMinSize) {
      throw new InvalidConfigurationError([
        {
          path: 'minSize',
          message: `cannot lower the threshold below ${this.currentMinSize}`,
        },
      ]);
    }
  }

  /**
   * Records the caller's answer to an exceeded signal. Either answer silences
   * further signals for the phase it was given in; the time spent waiting is
   * left out of that phase's rate.
   */
  applyDecision(
    decision: BudgetDecision,
    { phase, pausedMs }: { phase: ScanPhase; pausedMs: number },
  ) {
    this.validateDecision(decision);
    if (decision.action === 'raise') {
      this.currentMinSize = decision.minSize;
      this.raiseRequests += 1;
    }
    this.acknowledgedPhase = phase;
    if (this.pausedPhase === phase) {
      this.pausedMs += Math.max(0, pausedMs);
    } else {
      this.pausedPhase = phase;
      this.pausedMs = Math.max(0, pausedMs);
    }
  }
}
