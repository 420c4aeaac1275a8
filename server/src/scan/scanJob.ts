import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import type {
  BudgetDecision,
  LogEntry,
  ScanMode,
  ScanPhase,
  ScanResultsDto,
  ScanState,
  ScanStatusDto,
} from '@dupsweep/common';
import type { ScanOptions } from '../config/scanConfig.js';
import { append as appendLog } from '../logStore.js';
import { baseLogger, type ScanLogger } from '../logger.js';
import { rankGroups, summarize, toGroupDto } from './aggregate.js';
import { SizeBucketer } from './bucketing.js';
import {
  estimateTreeBytes,
  TimeBudgetEstimator,
  type BudgetCheck,
  type BudgetExceeded,
} from './budget.js';
import { verifyDigests, type FileHasher } from './digest.js';
import {
  describeError,
  NoPendingDecisionError,
  ScanBusyError,
  ScanNotFoundError,
} from './errors.js';
import { buildExclusionSet, defaultExcludes } from './exclusions.js';
import * as scanLock from './lock.js';
import { NameBucketer } from './names.js';
import {
  createPlaceholderDetector,
  type PlaceholderDetector,
} from './placeholder.js';
import { ProgressTracker } from './progress.js';
import { formatEta } from './report.js';
import { scanFiles } from './scanner.js';
import type { CandidateGroup, DuplicateGroup, SizeBucket } from './types.js';

export type ScanJobInput = {
  mode: ScanMode;
  options: ScanOptions;
};

export type ScanDeps = {
  hasher?: FileHasher;
  detectPlaceholder?: PlaceholderDetector;
  defaultExcludes?: string[];
  estimateTreeBytes?: (root: string) => Promise<number | undefined>;
  now?: () => number;
  logger?: ScanLogger;
};

type PendingDecision = {
  check: BudgetExceeded;
  resolve: (decision: BudgetDecision | null) => void;
};

type ScanRun = {
  runId: string;
  input: ScanJobInput;
  state: ScanState;
  message?: string;
  lastError: string | null;
  controller: AbortController;
  tracker: ProgressTracker;
  estimator: TimeBudgetEstimator;
  lastCheck: BudgetCheck | null;
  pending: PendingDecision | null;
  groups: DuplicateGroup[] | null;
  now: () => number;
};

const runs = new Map<string, ScanRun>();
const completions = new Map<string, Promise<void>>();
const events = new EventEmitter();
events.setMaxListeners(0);

const TERMINAL_STATES: ReadonlySet<ScanState> = new Set<ScanState>([
  'done',
  'cancelled',
  'error',
]);

export function isTerminal(state: ScanState) {
  return TERMINAL_STATES.has(state);
}

function logLifecycle(
  level: LogEntry['level'],
  message: string,
  context: Record<string, unknown>,
) {
  const cleanedContext = Object.fromEntries(
    Object.entries(context).filter(([, value]) => value !== undefined),
  );
  const runId =
    typeof cleanedContext.runId === 'string' ? cleanedContext.runId : undefined;

  const entry: LogEntry = {
    level,
    source: 'server',
    message,
    timestamp: new Date().toISOString(),
    runId,
    context: cleanedContext,
  };

  appendLog(entry);
  if (level === 'error') baseLogger.error({ ...cleanedContext }, message);
  else if (level === 'warn') baseLogger.warn({ ...cleanedContext }, message);
  else baseLogger.info({ ...cleanedContext }, message);
}

function setState(run: ScanRun, state: ScanState, message?: string) {
  run.state = state;
  run.message = message;
  events.emit('status', toStatus(run));
}

function advance(run: ScanRun, phase: ScanPhase, message?: string) {
  run.tracker.enterPhase(phase);
  setState(run, phase, message);
}

function toStatus(run: ScanRun): ScanStatusDto {
  const { startedAtMs, phaseStartedAtMs, ...progress } =
    run.tracker.snapshot();
  const live = !isTerminal(run.state);
  const check = run.lastCheck;
  const pending = run.pending;
  return {
    runId: run.runId,
    mode: run.input.mode,
    state: run.state,
    root: run.input.options.root,
    progress: {
      ...progress,
      elapsedMs: live ? run.now() - startedAtMs : progress.elapsedMs,
    },
    etaSeconds:
      live && check && check.kind !== 'estimating'
        ? Math.round(check.etaSeconds)
        : null,
    budget: { ...run.estimator.budget },
    suggestion: pending
      ? {
          suggestedMinSize: pending.check.suggestedMinSize,
          etaSeconds: Math.round(pending.check.etaSeconds),
          remainingSeconds: Math.max(
            0,
            Math.round(pending.check.remainingSeconds),
          ),
        }
      : null,
    ...(run.message !== undefined ? { message: run.message } : {}),
    lastError: run.lastError,
  };
}

/**
 * Runs the budget check between units of work. When the projection overruns
 * the budget the run parks in `needs_decision` until `decide` or
 * `cancelScan` settles it.
 */
async function budgetCheckpoint(run: ScanRun): Promise<'proceed' | 'stop'> {
  if (run.controller.signal.aborted) return 'stop';
  const progress = run.tracker.snapshot();
  const check = run.estimator.check(progress, run.now());
  run.lastCheck = check;
  if (check.kind !== 'exceeded') return 'proceed';

  const phase = progress.phase;
  const pausedAt = run.now();
  logLifecycle('warn', 'scan budget exceeded', {
    runId: run.runId,
    phase,
    etaSeconds: Math.round(check.etaSeconds),
    remainingSeconds: Math.round(check.remainingSeconds),
    suggestedMinSize: check.suggestedMinSize,
  });
  const decision = await new Promise<BudgetDecision | null>((resolve) => {
    run.pending = { check, resolve };
    setState(
      run,
      'needs_decision',
      `Estimated ${formatEta(check.etaSeconds)} left, budget has ${formatEta(
        Math.max(0, check.remainingSeconds),
      )}`,
    );
  });
  run.pending = null;
  if (decision === null) return 'stop';

  run.estimator.applyDecision(decision, {
    phase,
    pausedMs: run.now() - pausedAt,
  });
  run.tracker.update({ minSize: run.estimator.minSize });
  setState(run, phase);
  return 'proceed';
}

function hashWorkload(buckets: readonly SizeBucket[]) {
  let files = 0;
  let bytes = 0;
  for (const bucket of buckets) {
    files += bucket.members.length;
    bytes += bucket.size * bucket.members.length;
  }
  return { files, bytes };
}

function finish(
  run: ScanRun,
  state: 'done' | 'cancelled',
  candidates: readonly CandidateGroup[],
) {
  if (state === 'done') run.tracker.enterPhase('grouping');
  run.groups = rankGroups(candidates);
  const summary = summarize(run.groups);
  advance(
    run,
    state,
    state === 'done'
      ? `Found ${summary.groups} duplicate groups`
      : 'Cancelled',
  );
  logLifecycle('info', state === 'done' ? 'scan done' : 'scan cancelled', {
    runId: run.runId,
    mode: run.input.mode,
    root: run.input.options.root,
    minSize: run.estimator.minSize,
    raiseRequests: run.estimator.budget.raiseRequests,
    filesVisited: run.tracker.snapshot().filesVisited,
    ...summary,
  });
}

async function processRun(run: ScanRun, deps: ScanDeps) {
  const { mode, options } = run.input;
  const signal = run.controller.signal;
  const logger = deps.logger ?? baseLogger;
  const getMinSize = () => run.estimator.minSize;
  const checkpoint = () => budgetCheckpoint(run);
  try {
    logLifecycle('info', 'scan start', {
      runId: run.runId,
      mode,
      root: options.root,
      minSize: options.minSize,
      timeBudgetMinutes: options.timeBudgetMinutes,
      includeCloud: options.includeCloud,
      noExcludes: options.noExcludes,
    });
    setState(run, 'scanning', 'Walking the file tree');
    run.estimator.setInitialEstimate(
      await (deps.estimateTreeBytes ?? estimateTreeBytes)(options.root),
    );

    const exclusions = buildExclusionSet({
      noExcludes: options.noExcludes,
      addExclude: options.addExclude,
      defaults: deps.defaultExcludes ?? defaultExcludes(),
    });
    const sizes = new SizeBucketer();
    const names = new NameBucketer({
      ignoreExt: options.ignoreExt,
      requireSameSize: options.requireSameSize,
    });

    const records = scanFiles(options.root, {
      exclusions,
      getMinSize,
      includeCloud: options.includeCloud,
      detectPlaceholder: deps.detectPlaceholder ?? createPlaceholderDetector(),
      progress: run.tracker,
      signal,
      checkpoint,
      logger,
    });
    for await (const record of records) {
      if (mode === 'size') sizes.add(record);
      else names.add(record);
    }
    if (signal.aborted) {
      finish(run, 'cancelled', []);
      return;
    }

    if (mode === 'name') {
      finish(run, 'done', names.groups(getMinSize()));
      return;
    }

    const buckets = sizes.collisions();
    const workload = hashWorkload(buckets);
    run.tracker.update({
      hashTotal: workload.files,
      bytesToHash: workload.bytes,
    });
    advance(run, 'hashing', `Hashing ${workload.files} files`);

    const verification = await verifyDigests(buckets, {
      getMinSize,
      concurrency: options.hashConcurrency,
      hasher: deps.hasher,
      signal,
      checkpoint,
      logger,
      onFile: (record, outcome) =>
        run.tracker.update((prev) =>
          outcome === 'dropped'
            ? {
                hashTotal: prev.hashTotal - 1,
                bytesToHash: prev.bytesToHash - record.size,
              }
            : {
                hashDone: prev.hashDone + 1,
                bytesHashed: prev.bytesHashed + record.size,
              },
        ),
    });
    if (verification.failed > 0) {
      logLifecycle('warn', 'scan hash failures', {
        runId: run.runId,
        failed: verification.failed,
      });
    }
    finish(run, signal.aborted ? 'cancelled' : 'done', verification.groups);
  } catch (error) {
    run.lastError = describeError(error);
    advance(run, 'error', run.lastError);
    logLifecycle('error', 'scan error', {
      runId: run.runId,
      mode,
      root: options.root,
      lastError: run.lastError,
    });
  } finally {
    run.pending = null;
    scanLock.release(run.runId);
  }
}

export function isBusy() {
  return scanLock.isHeld();
}

export function startScan(input: ScanJobInput, deps: ScanDeps = {}): string {
  const runId = randomUUID();
  if (!scanLock.acquire(runId)) {
    throw new ScanBusyError(scanLock.currentOwner());
  }
  const now = deps.now ?? Date.now;
  const run: ScanRun = {
    runId,
    input,
    state: 'queued',
    message: 'Queued',
    lastError: null,
    controller: new AbortController(),
    tracker: new ProgressTracker({ minSize: input.options.minSize, now }),
    estimator: new TimeBudgetEstimator({
      timeBudgetMinutes: input.options.timeBudgetMinutes,
      minSize: input.options.minSize,
    }),
    lastCheck: null,
    pending: null,
    groups: null,
    now,
  };
  runs.set(runId, run);
  completions.set(
    runId,
    new Promise<void>((resolve) => {
      setImmediate(() => {
        void processRun(run, deps).then(resolve);
      });
    }),
  );
  return runId;
}

export function getStatus(runId: string): ScanStatusDto | null {
  const run = runs.get(runId);
  return run ? toStatus(run) : null;
}

/** Ranked results, or null while the run is still in progress. */
export function getResults(runId: string): ScanResultsDto | null {
  const run = runs.get(runId);
  if (!run) throw new ScanNotFoundError(runId);
  if (!isTerminal(run.state) || run.state === 'error' || !run.groups) {
    return null;
  }
  return {
    runId,
    state: run.state,
    groups: run.groups.map(toGroupDto),
    summary: summarize(run.groups),
  };
}

export function decide(runId: string, decision: BudgetDecision) {
  const run = runs.get(runId);
  if (!run) throw new ScanNotFoundError(runId);
  const pending = run.pending;
  if (!pending) throw new NoPendingDecisionError(runId);
  run.estimator.validateDecision(decision);
  run.pending = null;
  logLifecycle('info', 'scan budget decision', {
    runId,
    action: decision.action,
    minSize: decision.action === 'raise' ? decision.minSize : undefined,
  });
  pending.resolve(decision);
}

export function cancelScan(runId: string): {
  found: boolean;
  state?: ScanState;
} {
  const run = runs.get(runId);
  if (!run) return { found: false };
  if (isTerminal(run.state)) return { found: true, state: run.state };
  run.controller.abort();
  const pending = run.pending;
  run.pending = null;
  pending?.resolve(null);
  logLifecycle('info', 'scan cancel requested', { runId, state: run.state });
  return { found: true, state: run.state };
}

export async function waitForScan(runId: string): Promise<ScanStatusDto> {
  const completion = completions.get(runId);
  const run = runs.get(runId);
  if (!completion || !run) throw new ScanNotFoundError(runId);
  await completion;
  return toStatus(run);
}

/** Called with a fresh status on every state change of any run. */
export function subscribeScan(handler: (status: ScanStatusDto) => void) {
  events.on('status', handler);
  return () => {
    events.off('status', handler);
  };
}

export function __resetScanJobsForTest() {
  for (const run of runs.values()) {
    run.controller.abort();
    run.pending?.resolve(null);
  }
  runs.clear();
  completions.clear();
  events.removeAllListeners();
  scanLock.release();
}
