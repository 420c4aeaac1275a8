import assert from 'node:assert/strict';
import path from 'node:path';
import { afterEach, beforeEach, test } from 'node:test';

import type { ScanResultsDto } from '@dupsweep/common';
import {
  buildProgram,
  EXIT_FAILURE,
  EXIT_OK,
  promptDecision,
  runScanCommand,
  type CliIo,
} from '../../cli.js';
import type { ScanDefaults } from '../../config/scanConfig.js';
import { __resetScanJobsForTest, type ScanDeps } from '../../scan/scanJob.js';
import { makeTree, removeTree } from '../support/scanFixtures.js';

const DEFAULTS: ScanDefaults = {
  root: '/',
  minSize: 0,
  timeBudgetMinutes: 60,
  hashConcurrency: 2,
};

const DEPS: ScanDeps = {
  defaultExcludes: [],
  estimateTreeBytes: async () => undefined,
};

const roots: string[] = [];

function captureIo(): CliIo & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (text) => {
      stdout.push(text);
    },
    err: (text) => {
      stderr.push(text);
    },
  };
}

async function duplicateTree() {
  const root = await makeTree({
    'a.txt': 'a'.repeat(100),
    'copy of a.txt': 'a'.repeat(100),
    'b.txt': 'b'.repeat(100),
  });
  roots.push(root);
  return root;
}

function isResults(value: unknown): value is ScanResultsDto {
  return typeof value === 'object' && value !== null && 'groups' in value;
}

beforeEach(() => {
  __resetScanJobsForTest();
});

afterEach(async () => {
  __resetScanJobsForTest();
  await Promise.all(roots.splice(0).map(removeTree));
});

test('conflicting extension flags exit with a configuration error', async () => {
  const io = captureIo();
  const code = await runScanCommand(
    'name',
    { ignoreExt: true, keepExt: true },
    io,
    { defaults: DEFAULTS, deps: DEPS },
  );
  assert.equal(code, EXIT_FAILURE);
  assert.deepEqual(io.stderr, [
    'INVALID_CONFIGURATION: keepExt: ignoreExt and keepExt cannot both be set\n',
  ]);
  assert.deepEqual(io.stdout, []);
});

test('size scan prints the text report', async () => {
  const root = await duplicateTree();
  const io = captureIo();
  const code = await runScanCommand('size', { root }, io, {
    defaults: DEFAULTS,
    deps: DEPS,
  });

  assert.equal(code, EXIT_OK);
  const lines = io.stdout.join('').split('\n');
  assert.equal(lines[0], 'Duplicate groups: 1 (2 files, 100 B reclaimable)');
  assert.deepEqual(
    lines.slice(3, 5).sort(),
    [
      `    ${path.join(root, 'a.txt')}`,
      `    ${path.join(root, 'copy of a.txt')}`,
    ].sort(),
  );
});

test('--json output parses back into results', async () => {
  const root = await duplicateTree();
  const io = captureIo();
  const code = await runScanCommand('name', { root, json: true }, io, {
    defaults: DEFAULTS,
    deps: DEPS,
  });

  assert.equal(code, EXIT_OK);
  const parsed: unknown = JSON.parse(io.stdout.join(''));
  assert.ok(isResults(parsed));
  assert.equal(parsed.state, 'done');
  assert.deepEqual(parsed.summary, { groups: 0, files: 0, wastedBytes: 0 });
});

test('the commander program wires flags through to the scan', async () => {
  const root = await duplicateTree();
  const io = captureIo();
  const previous = process.exitCode;
  try {
    await buildProgram(io, { defaults: DEFAULTS, deps: DEPS }).parseAsync([
      'node',
      'dupsweep',
      'size',
      '--root',
      root,
      '--min-size',
      '1',
      '--on-budget',
      'continue',
      '--json',
    ]);
    assert.equal(process.exitCode, EXIT_OK);
  } finally {
    process.exitCode = previous;
  }
  const parsed: unknown = JSON.parse(io.stdout.join(''));
  assert.ok(isResults(parsed));
  assert.equal(parsed.groups.length, 1);
  assert.equal(parsed.groups[0].kind, 'digest');
  assert.equal(parsed.groups[0].members.length, 2);
});

test('prompt keeps asking until it gets a usable answer', async () => {
  const answers = ['abc', '1KB', '200MB'];
  const errors: string[] = [];
  const decision = await promptDecision(
    async () => answers.shift() ?? 'q',
    { suggestedMinSize: 50 * 1024 * 1024, etaSeconds: 900, remainingSeconds: 60 },
    10 * 1024 * 1024,
    (text) => errors.push(text),
  );
  assert.deepEqual(decision, { action: 'raise', minSize: 200 * 1024 * 1024 });
  assert.deepEqual(errors, [
    'Could not read "abc" as a size.\n',
    'The minimum can only go up from 10.0 MB.\n',
  ]);
});

test('prompt shortcuts map to continue, the suggestion and quit', async () => {
  const suggestion = {
    suggestedMinSize: 1234,
    etaSeconds: 10,
    remainingSeconds: 5,
  };
  const noop = () => undefined;
  assert.deepEqual(
    await promptDecision(async () => '', suggestion, 0, noop),
    { action: 'continue' },
  );
  assert.deepEqual(
    await promptDecision(async () => 'R', suggestion, 0, noop),
    { action: 'raise', minSize: 1234 },
  );
  assert.equal(await promptDecision(async () => 'q', suggestion, 0, noop), null);
});
