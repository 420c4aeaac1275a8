import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, test } from 'node:test';

import { ExclusionSet } from '../../scan/exclusions.js';
import { neverPlaceholder } from '../../scan/placeholder.js';
import { ProgressTracker } from '../../scan/progress.js';
import { scanFiles, type ScanFilesOptions } from '../../scan/scanner.js';
import type { FileRecord } from '../../scan/types.js';
import {
  captureLogger,
  makeTree,
  removeTree,
} from '../support/scanFixtures.js';

const roots: string[] = [];

afterEach(async () => {
  await Promise.all(roots.splice(0).map(removeTree));
});

async function fixture() {
  const root = await makeTree({
    'a.txt': 'a'.repeat(100),
    'sub/b.txt': 'b'.repeat(100),
    'sub/skip/c.txt': 'c'.repeat(100),
    'tiny.txt': 'tiny!',
  });
  roots.push(root);
  await fs.symlink(path.join(root, 'a.txt'), path.join(root, 'link.txt'));
  return root;
}

async function collect(
  root: string,
  options: Partial<ScanFilesOptions> = {},
): Promise<FileRecord[]> {
  const { logger } = captureLogger();
  const out: FileRecord[] = [];
  for await (const record of scanFiles(root, {
    exclusions: new ExclusionSet(),
    getMinSize: () => 10,
    includeCloud: false,
    detectPlaceholder: neverPlaceholder,
    logger,
    ...options,
  })) {
    out.push(record);
  }
  return out;
}

function relative(root: string, records: FileRecord[]) {
  return records.map((r) => path.relative(root, r.path)).sort();
}

test('yields regular files at or above the minimum size', async () => {
  const root = await fixture();
  const records = await collect(root);
  assert.deepEqual(relative(root, records), [
    'a.txt',
    path.join('sub', 'b.txt'),
    path.join('sub', 'skip', 'c.txt'),
  ]);
  assert.deepEqual(
    records.map((r) => r.order),
    [0, 1, 2],
  );
  assert.equal(Object.isFrozen(records[0]), true);
});

test('excluded directories are not entered', async () => {
  const root = await fixture();
  const progress = new ProgressTracker({ minSize: 10 });
  const records = await collect(root, {
    exclusions: new ExclusionSet([path.join(root, 'SUB', 'skip')]),
    progress,
  });

  assert.deepEqual(relative(root, records), [
    'a.txt',
    path.join('sub', 'b.txt'),
  ]);
  const snap = progress.snapshot();
  assert.equal(snap.filesVisited, 3);
  assert.equal(snap.bytesVisited, 205);
  // tiny.txt is below the minimum and link.txt is a symlink.
  assert.equal(snap.filesSkipped, 2);
  assert.equal(snap.filesMatched, 2);
  assert.equal(snap.directoriesPending, 0);
});

test('an excluded root yields nothing', async () => {
  const root = await fixture();
  const records = await collect(root, { exclusions: new ExclusionSet([root]) });
  assert.deepEqual(records, []);
});

test('placeholders are skipped unless cloud files are included', async () => {
  const root = await fixture();
  const detectPlaceholder = async (filePath: string) =>
    filePath.endsWith('b.txt');

  const without = await collect(root, {
    detectPlaceholder,
    exclusions: new ExclusionSet([path.join(root, 'sub', 'skip')]),
  });
  assert.deepEqual(relative(root, without), ['a.txt']);

  const withCloud = await collect(root, {
    detectPlaceholder,
    includeCloud: true,
    exclusions: new ExclusionSet([path.join(root, 'sub', 'skip')]),
  });
  const stub = withCloud.find((r) => r.path.endsWith('b.txt'));
  assert.equal(withCloud.length, 2);
  assert.equal(stub?.isCloudPlaceholder, true);
});

test('a missing root is logged and yields nothing', async () => {
  const { logger, messages } = captureLogger();
  const records: FileRecord[] = [];
  for await (const record of scanFiles('/definitely/not/here', {
    exclusions: new ExclusionSet(),
    getMinSize: () => 0,
    includeCloud: false,
    detectPlaceholder: neverPlaceholder,
    logger,
  })) {
    records.push(record);
  }
  assert.deepEqual(records, []);
  assert.deepEqual(messages(), ['entry vanished or locked, skipping']);
});

test('a directory that disappears mid-walk is skipped and the walk goes on', async () => {
  const root = await makeTree({
    'a.txt': 'a'.repeat(100),
    'gone/x.txt': 'x'.repeat(100),
    'keep/y.txt': 'y'.repeat(100),
  });
  roots.push(root);
  const { logger, lines, messages } = captureLogger();
  let checkpoints = 0;
  const records: FileRecord[] = [];

  for await (const record of scanFiles(root, {
    exclusions: new ExclusionSet(),
    getMinSize: () => 0,
    includeCloud: false,
    detectPlaceholder: neverPlaceholder,
    logger,
    // Both subdirectories are queued by the time of the second call.
    checkpoint: async () => {
      checkpoints += 1;
      if (checkpoints === 2) await removeTree(path.join(root, 'gone'));
      return 'proceed';
    },
  })) {
    records.push(record);
  }

  assert.deepEqual(relative(root, records), ['a.txt', path.join('keep', 'y.txt')]);
  assert.deepEqual(messages(), ['entry vanished or locked, skipping']);
  assert.match(lines[0], /"kind":"directory"/u);
  assert.match(lines[0], /"reason":"transient"/u);
});

test('stops when the checkpoint says so or the signal is aborted', async () => {
  const root = await fixture();
  assert.deepEqual(await collect(root, { checkpoint: async () => 'stop' }), []);

  const controller = new AbortController();
  controller.abort();
  assert.deepEqual(await collect(root, { signal: controller.signal }), []);
});
