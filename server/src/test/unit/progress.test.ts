import assert from 'node:assert/strict';
import { test } from 'node:test';

import { ProgressTracker } from '../../scan/progress.js';

function clock(start = 1_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

test('starts in the scanning phase with zeroed counters', () => {
  const c = clock();
  const tracker = new ProgressTracker({ minSize: 42, now: c.now });
  const snap = tracker.snapshot();
  assert.equal(snap.phase, 'scanning');
  assert.equal(snap.minSize, 42);
  assert.equal(snap.filesVisited, 0);
  assert.equal(snap.startedAtMs, 1_000);
  assert.equal(snap.phaseStartedAtMs, 1_000);
});

test('updates swap in a new frozen snapshot', () => {
  const c = clock();
  const tracker = new ProgressTracker({ minSize: 0, now: c.now });
  const before = tracker.snapshot();
  c.advance(250);
  tracker.update((prev) => ({ filesVisited: prev.filesVisited + 1 }));
  tracker.update({ bytesVisited: 10 });
  const after = tracker.snapshot();

  assert.notEqual(before, after);
  assert.equal(before.filesVisited, 0);
  assert.equal(after.filesVisited, 1);
  assert.equal(after.bytesVisited, 10);
  assert.equal(after.elapsedMs, 250);
  assert.equal(Object.isFrozen(after), true);
});

test('entering a phase restarts the phase clock only on change', () => {
  const c = clock();
  const tracker = new ProgressTracker({ minSize: 0, now: c.now });
  c.advance(500);
  tracker.enterPhase('hashing');
  assert.equal(tracker.snapshot().phaseStartedAtMs, 1_500);
  c.advance(100);
  const same = tracker.enterPhase('hashing');
  assert.equal(same.phaseStartedAtMs, 1_500);
  assert.equal(same.phase, 'hashing');
});
