import assert from 'node:assert/strict';
import path from 'node:path';
import { afterEach, test } from 'node:test';

import {
  assertScanRoot,
  DEFAULT_HASH_CONCURRENCY,
  DEFAULT_MIN_SIZE,
  DEFAULT_TIME_BUDGET_MINUTES,
  parseByteSize,
  parseScanOptions,
  resolveScanDefaults,
  type ScanDefaults,
} from '../../config/scanConfig.js';
import { InvalidConfigurationError } from '../../scan/errors.js';
import { makeTree, removeTree } from '../support/scanFixtures.js';

const DEFAULTS: ScanDefaults = {
  root: '/srv',
  minSize: 1024,
  timeBudgetMinutes: 30,
  hashConcurrency: 3,
};

const roots: string[] = [];

afterEach(async () => {
  await Promise.all(roots.splice(0).map(removeTree));
});

test('env defaults fall back when unset or invalid', () => {
  const defaults = resolveScanDefaults(
    { DUPSWEEP_MIN_SIZE: 'lots', DUPSWEEP_HASH_CONCURRENCY: '8' },
    '/home/tester/projects',
  );
  assert.deepEqual(defaults, {
    root: path.parse(path.resolve('/home/tester/projects')).root,
    minSize: DEFAULT_MIN_SIZE,
    timeBudgetMinutes: DEFAULT_TIME_BUDGET_MINUTES,
    hashConcurrency: 8,
  });
  assert.equal(resolveScanDefaults({}).hashConcurrency, DEFAULT_HASH_CONCURRENCY);
});

test('env defaults honour the scan root and size', () => {
  const defaults = resolveScanDefaults({
    DUPSWEEP_ROOT: '/data',
    DUPSWEEP_MIN_SIZE: '2048',
    DUPSWEEP_TIME_BUDGET_MIN: '5',
  });
  assert.equal(defaults.root, '/data');
  assert.equal(defaults.minSize, 2048);
  assert.equal(defaults.timeBudgetMinutes, 5);
});

test('missing options are filled from defaults', () => {
  assert.deepEqual(parseScanOptions({}, DEFAULTS), {
    root: path.resolve('/srv'),
    minSize: 1024,
    timeBudgetMinutes: 30,
    noExcludes: false,
    addExclude: [],
    includeCloud: false,
    ignoreExt: true,
    requireSameSize: false,
    hashConcurrency: 3,
  });
});

test('keepExt turns extension stripping off', () => {
  const options = parseScanOptions({ keepExt: true }, DEFAULTS);
  assert.equal(options.ignoreExt, false);
});

test('an explicit ignoreExt false keeps extensions', () => {
  assert.equal(parseScanOptions({ ignoreExt: false }, DEFAULTS).ignoreExt, false);
  assert.equal(parseScanOptions({ ignoreExt: true }, DEFAULTS).ignoreExt, true);
  assert.equal(parseScanOptions({}, DEFAULTS).ignoreExt, true);
});

test('ignoreExt together with keepExt is rejected', () => {
  assert.throws(
    () => parseScanOptions({ ignoreExt: true, keepExt: true }, DEFAULTS),
    (err: unknown) =>
      err instanceof InvalidConfigurationError &&
      err.issues[0].path === 'keepExt',
  );
});

test('invalid values and unknown keys are reported together', () => {
  assert.throws(
    () =>
      parseScanOptions(
        { minSize: -1, hashConcurrency: 0, colour: 'blue' },
        DEFAULTS,
      ),
    (err: unknown) =>
      err instanceof InvalidConfigurationError &&
      err.issues.map((i) => i.path).sort().join(',') ===
        ',hashConcurrency,minSize',
  );
});

test('the scan root must be an existing directory', async () => {
  const root = await makeTree({ 'file.txt': 'x' });
  roots.push(root);
  await assertScanRoot(root);
  await assert.rejects(
    assertScanRoot(path.join(root, 'file.txt')),
    InvalidConfigurationError,
  );
  await assert.rejects(
    assertScanRoot(path.join(root, 'missing')),
    InvalidConfigurationError,
  );
});

test('byte sizes accept plain numbers and binary suffixes', () => {
  assert.equal(parseByteSize('1048576'), 1_048_576);
  assert.equal(parseByteSize('512K'), 524_288);
  assert.equal(parseByteSize('50MB'), 52_428_800);
  assert.equal(parseByteSize('1.5GiB'), 1_610_612_736);
  assert.equal(parseByteSize('ten'), null);
});
