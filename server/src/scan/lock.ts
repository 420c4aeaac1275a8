// One scan at a time per process. The slot expires so a run whose driver
// died without releasing it cannot block the server forever.
const DEFAULT_TTL_MS = 6 * 60 * 60 * 1000;

type SlotState = {
  owner: string;
  expiresAt: number;
};

let state: SlotState | null = null;

function isExpired(slot: SlotState | null, now: number) {
  return slot !== null && slot.expiresAt <= now;
}

export function isHeld(now = Date.now()) {
  if (isExpired(state, now)) {
    state = null;
    return false;
  }
  return state !== null;
}

export function acquire(
  owner: string,
  ttlMs: number = DEFAULT_TTL_MS,
  now = Date.now(),
) {
  if (isHeld(now)) return false;
  state = { owner, expiresAt: now + ttlMs };
  return true;
}

export function release(owner?: string) {
  if (!state) return;
  if (owner && state.owner !== owner) return;
  state = null;
}

export function currentOwner(now = Date.now()) {
  if (isExpired(state, now)) {
    state = null;
    return null;
  }
  return state?.owner ?? null;
}
