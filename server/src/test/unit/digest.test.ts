import assert from 'node:assert/strict';
import { createHash } from 'node:crypto';
import path from 'node:path';
import { afterEach, test } from 'node:test';

import { hashFile, verifyDigests } from '../../scan/digest.js';
import type { SizeBucket } from '../../scan/types.js';
import {
  captureLogger,
  makeRecord,
  makeTree,
  removeTree,
} from '../support/scanFixtures.js';

const roots: string[] = [];

afterEach(async () => {
  await Promise.all(roots.splice(0).map(removeTree));
});

function sha256(text: string) {
  return createHash('sha256').update(text).digest('hex');
}

function bucket(size: number, paths: string[], firstOrder = 0): SizeBucket {
  return {
    size,
    members: paths.map((p, i) => makeRecord(p, size, firstOrder + i)),
  };
}

test('hashFile returns the hex SHA-256 of the file content', async () => {
  const root = await makeTree({ 'a.txt': 'hello world' });
  roots.push(root);
  assert.equal(
    await hashFile(path.join(root, 'a.txt')),
    sha256('hello world'),
  );
});

test('buckets split by digest and keep discovery order', async () => {
  const root = await makeTree({
    'one.bin': 'AAAA',
    'two.bin': 'BBBB',
    'three.bin': 'AAAA',
  });
  roots.push(root);
  const files = ['one.bin', 'two.bin', 'three.bin'].map((f) =>
    path.join(root, f),
  );

  const result = await verifyDigests([bucket(4, files)], {
    getMinSize: () => 0,
    concurrency: 2,
  });

  assert.equal(result.hashed, 3);
  assert.equal(result.interrupted, false);
  assert.equal(result.groups.length, 1);
  assert.equal(result.groups[0].digest, sha256('AAAA'));
  assert.deepEqual(
    result.groups[0].members.map((m) => m.path),
    [files[0], files[2]],
  );
});

test('a file that cannot be read is left out with a warning', async () => {
  const { logger, messages, lines } = captureLogger();
  const hasher = async (filePath: string) => {
    if (filePath === '/c') {
      throw Object.assign(new Error('denied'), { code: 'EACCES' });
    }
    return 'same';
  };

  const result = await verifyDigests([bucket(9, ['/a', '/b', '/c'])], {
    getMinSize: () => 0,
    concurrency: 1,
    hasher,
    logger,
  });

  assert.equal(result.failed, 1);
  assert.deepEqual(
    result.groups[0].members.map((m) => m.path),
    ['/a', '/b'],
  );
  assert.deepEqual(messages(), ['hash failed, excluding file']);
  assert.match(lines[0], /"reason":"permission"/u);
});

test('a file that vanishes before hashing is logged as transient', async () => {
  const { logger, lines } = captureLogger();
  const hasher = async (filePath: string) => {
    if (filePath === '/gone') {
      throw Object.assign(new Error('no such file'), { code: 'ENOENT' });
    }
    return 'same';
  };

  const result = await verifyDigests([bucket(9, ['/a', '/b', '/gone'])], {
    getMinSize: () => 0,
    concurrency: 1,
    hasher,
    logger,
  });

  assert.equal(result.failed, 1);
  assert.equal(result.groups.length, 1);
  assert.equal(lines.length, 1);
  assert.match(lines[0], /"reason":"transient"/u);
  assert.match(lines[0], /"path":"\/gone"/u);
});

test('never runs more hashes at once than the concurrency limit', async () => {
  let active = 0;
  let peak = 0;
  const hasher = async () => {
    active += 1;
    peak = Math.max(peak, active);
    await new Promise((resolve) => setTimeout(resolve, 5));
    active -= 1;
    return 'd';
  };

  const result = await verifyDigests(
    [bucket(1, ['/a', '/b', '/c', '/d', '/e', '/f'])],
    { getMinSize: () => 0, concurrency: 2, hasher },
  );

  assert.equal(peak, 2);
  assert.equal(result.groups[0].members.length, 6);
});

test('files below a threshold raised mid-run are dropped unhashed', async () => {
  let minSize = 0;
  const hashed: string[] = [];
  const outcomes: string[] = [];
  const hasher = async (filePath: string) => {
    hashed.push(filePath);
    // Raise the threshold once the first bucket is under way.
    minSize = 50;
    return 'x';
  };

  const result = await verifyDigests(
    [bucket(10, ['/small-1', '/small-2']), bucket(100, ['/big-1', '/big-2'], 2)],
    {
      getMinSize: () => minSize,
      concurrency: 1,
      hasher,
      onFile: (record, outcome) => outcomes.push(`${record.path}:${outcome}`),
    },
  );

  assert.deepEqual(hashed, ['/small-1', '/big-1', '/big-2']);
  // The drop is decided while the first hash is still in flight.
  assert.deepEqual(outcomes, [
    '/small-2:dropped',
    '/small-1:hashed',
    '/big-1:hashed',
    '/big-2:hashed',
  ]);
  assert.equal(result.dropped, 1);
  assert.deepEqual(
    result.groups.map((g) => g.size),
    [100],
  );
});

test('a stop from the checkpoint reports only complete buckets', async () => {
  let calls = 0;
  const checkpoint = async () => {
    calls += 1;
    return calls > 3 ? ('stop' as const) : ('proceed' as const);
  };

  const result = await verifyDigests(
    [bucket(5, ['/a1', '/a2']), bucket(7, ['/b1', '/b2'], 2)],
    {
      getMinSize: () => 0,
      concurrency: 1,
      hasher: async () => 'same',
      checkpoint,
    },
  );

  assert.equal(result.interrupted, true);
  assert.equal(result.hashed, 3);
  assert.deepEqual(
    result.groups.map((g) => g.size),
    [5],
  );
});

test('an aborted signal interrupts without reporting groups', async () => {
  const controller = new AbortController();
  controller.abort();
  const result = await verifyDigests([bucket(3, ['/a', '/b'])], {
    getMinSize: () => 0,
    concurrency: 1,
    hasher: async () => 'same',
    signal: controller.signal,
  });
  assert.equal(result.interrupted, true);
  assert.equal(result.hashed, 0);
  assert.deepEqual(result.groups, []);
});
