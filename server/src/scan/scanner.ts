import type { Dirent, Stats } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { baseLogger, type ScanLogger } from '../logger.js';
import { describeError, ioFailureReason } from './errors.js';
import type { ExclusionSet } from './exclusions.js';
import type { PlaceholderDetector } from './placeholder.js';
import type { ProgressTracker } from './progress.js';
import type { FileRecord } from './types.js';

export type ScanFilesOptions = {
  exclusions: ExclusionSet;
  // Read for every file so a threshold raised mid-run applies from there on.
  getMinSize: () => number;
  includeCloud: boolean;
  detectPlaceholder: PlaceholderDetector;
  progress?: ProgressTracker;
  signal?: AbortSignal;
  // Consulted before each directory is read; 'stop' ends the walk.
  checkpoint?: () => Promise<'proceed' | 'stop'>;
  logger?: ScanLogger;
};

function logSkip(
  logger: ScanLogger,
  entryPath: string,
  kind: 'directory' | 'file',
  error: unknown,
) {
  const reason = ioFailureReason(error);
  if (reason === 'permission') {
    logger.warn(
      { path: entryPath, kind, reason },
      'permission denied, skipping',
    );
  } else if (reason === 'transient') {
    logger.warn(
      { path: entryPath, kind, reason, error: describeError(error) },
      'entry vanished or locked, skipping',
    );
  } else {
    logger.warn(
      { path: entryPath, kind, reason, error: describeError(error) },
      'unreadable entry, skipping',
    );
  }
}

async function readDirEntries(
  dir: string,
  logger: ScanLogger,
): Promise<Dirent[] | undefined> {
  try {
    return await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    logSkip(logger, dir, 'directory', error);
    return undefined;
  }
}

/**
 * Walks `root` depth first and yields one record per regular file that
 * passes the exclusion, size and placeholder filters. The walk is lazy: no
 * directory is read until the consumer pulls the next record.
 */
export async function* scanFiles(
  root: string,
  options: ScanFilesOptions,
): AsyncGenerator<FileRecord, void, undefined> {
  const {
    exclusions,
    getMinSize,
    includeCloud,
    detectPlaceholder,
    progress,
    signal,
    checkpoint,
    logger = baseLogger,
  } = options;
  const start = path.resolve(root);
  if (exclusions.isExcluded(start)) {
    logger.info({ root: start }, 'scan root is excluded');
    return;
  }

  const pending: string[] = [start];
  let order = 0;

  const skip = () =>
    progress?.update((prev) => ({ filesSkipped: prev.filesSkipped + 1 }));

  while (pending.length > 0) {
    if (signal?.aborted) return;
    if (checkpoint && (await checkpoint()) === 'stop') return;
    const dir = pending.pop();
    if (dir === undefined) break;
    progress?.update({ directoriesPending: pending.length });

    const entries = await readDirEntries(dir, logger);
    if (!entries) continue;

    const subdirs: string[] = [];
    for (const entry of entries) {
      if (signal?.aborted) return;
      const abs = path.join(dir, entry.name);

      if (entry.isSymbolicLink()) {
        skip();
        continue;
      }
      if (entry.isDirectory()) {
        if (exclusions.isExcluded(abs)) {
          logger.debug({ path: abs }, 'excluded directory');
        } else {
          subdirs.push(abs);
        }
        continue;
      }
      if (!entry.isFile() || exclusions.isExcluded(abs)) {
        skip();
        continue;
      }

      let stats: Stats;
      try {
        stats = await fs.lstat(abs);
      } catch (error) {
        logSkip(logger, abs, 'file', error);
        skip();
        continue;
      }

      const size = stats.size;
      progress?.update((prev) => ({
        filesVisited: prev.filesVisited + 1,
        bytesVisited: prev.bytesVisited + size,
      }));

      if (size < getMinSize()) {
        skip();
        continue;
      }

      let placeholder = false;
      try {
        placeholder = await detectPlaceholder(abs, stats);
      } catch (error) {
        logger.debug(
          { path: abs, error: describeError(error) },
          'placeholder probe failed',
        );
      }
      if (placeholder && !includeCloud) {
        skip();
        continue;
      }

      progress?.update((prev) => ({ filesMatched: prev.filesMatched + 1 }));
      yield Object.freeze({
        path: abs,
        size,
        mtimeMs: stats.mtimeMs,
        isCloudPlaceholder: placeholder,
        order: order++,
      });
    }

    // Reverse so the stack pops subdirectories in readdir order.
    for (let i = subdirs.length - 1; i >= 0; i -= 1) {
      pending.push(subdirs[i]);
    }
    progress?.update({ directoriesPending: pending.length });
  }
}
