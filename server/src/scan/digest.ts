import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { addAbortSignal } from 'node:stream';
import { baseLogger, type ScanLogger } from '../logger.js';
import { describeError, ioFailureReason, isAbortError } from './errors.js';
import { Semaphore } from './semaphore.js';
import type { DigestGroup, FileRecord, SizeBucket } from './types.js';

export const HASH_CHUNK_BYTES = 1024 * 1024;

export type FileHasher = (
  filePath: string,
  signal?: AbortSignal,
) => Promise<string>;

export type HashOutcome = 'hashed' | 'failed' | 'dropped';

export async function hashFile(
  filePath: string,
  signal?: AbortSignal,
): Promise<string> {
  const hash = createHash('sha256');
  const stream = createReadStream(filePath, {
    highWaterMark: HASH_CHUNK_BYTES,
  });
  if (signal) addAbortSignal(signal, stream);
  for await (const chunk of stream) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

export type VerifyDigestsOptions = {
  getMinSize: () => number;
  concurrency: number;
  hasher?: FileHasher;
  signal?: AbortSignal;
  // Consulted before each file is scheduled; 'stop' ends scheduling.
  checkpoint?: () => Promise<'proceed' | 'stop'>;
  onFile?: (record: FileRecord, outcome: HashOutcome) => void;
  logger?: ScanLogger;
};

export type DigestVerification = {
  groups: DigestGroup[];
  hashed: number;
  failed: number;
  dropped: number;
  interrupted: boolean;
};

type BucketState = {
  size: number;
  remaining: number;
  byDigest: Map<string, FileRecord[]>;
};

function byDiscovery(a: FileRecord, b: FileRecord) {
  return a.order - b.order;
}

/**
 * Hashes the members of each size bucket and splits the buckets by digest.
 * Only buckets whose members were all accounted for are reported, so an
 * interrupted run never yields a half-verified group.
 */
export async function verifyDigests(
  buckets: readonly SizeBucket[],
  options: VerifyDigestsOptions,
): Promise<DigestVerification> {
  const {
    getMinSize,
    hasher = hashFile,
    signal,
    checkpoint,
    onFile,
    logger = baseLogger,
  } = options;
  const semaphore = new Semaphore(options.concurrency);
  const states: BucketState[] = [];
  const tasks: Promise<void>[] = [];
  let hashed = 0;
  let failed = 0;
  let dropped = 0;
  let interrupted = false;

  const hashOne = async (record: FileRecord, state: BucketState) => {
    try {
      const digest = await hasher(record.path, signal);
      const members = state.byDigest.get(digest);
      if (members) members.push(record);
      else state.byDigest.set(digest, [record]);
      hashed += 1;
      state.remaining -= 1;
      onFile?.(record, 'hashed');
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) {
        interrupted = true;
        return;
      }
      failed += 1;
      state.remaining -= 1;
      logger.warn(
        {
          path: record.path,
          reason: ioFailureReason(error),
          error: describeError(error),
        },
        'hash failed, excluding file',
      );
      onFile?.(record, 'failed');
    } finally {
      semaphore.release();
    }
  };

  schedule: for (const bucket of buckets) {
    const state: BucketState = {
      size: bucket.size,
      remaining: bucket.members.length,
      byDigest: new Map(),
    };
    states.push(state);
    for (const record of bucket.members) {
      if (signal?.aborted) {
        interrupted = true;
        break schedule;
      }
      if (checkpoint && (await checkpoint()) === 'stop') {
        interrupted = true;
        break schedule;
      }
      if (record.size < getMinSize()) {
        dropped += 1;
        state.remaining -= 1;
        onFile?.(record, 'dropped');
        continue;
      }
      await semaphore.acquire();
      tasks.push(hashOne(record, state));
    }
  }

  await Promise.all(tasks);
  if (signal?.aborted) interrupted = true;

  const minSize = getMinSize();
  const groups: DigestGroup[] = [];
  for (const state of states) {
    if (state.remaining !== 0 || state.size < minSize) continue;
    for (const [digest, members] of state.byDigest) {
      if (members.length < 2) continue;
      const group: DigestGroup = {
        kind: 'digest',
        size: state.size,
        digest,
        members: Object.freeze([...members].sort(byDiscovery)),
      };
      groups.push(Object.freeze(group));
    }
  }

  return { groups, hashed, failed, dropped, interrupted };
}
