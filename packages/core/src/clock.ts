// Time source in seconds. Injected so callers and tests control "now".
export type Clock = {
  now: () => number;
};

export const systemClock: Clock = {
  now: () => Date.now() / 1000,
};

export type ManualClock = Clock & {
  set: (t: number) => void;
  advance: (dt: number) => void;
};

export function createManualClock(start = 0): ManualClock {
  if (!Number.isFinite(start)) throw new Error('start must be finite');
  let current = start;
  return {
    now: () => current,
    set(t) {
      if (!Number.isFinite(t)) throw new Error('t must be finite');
      current = t;
    },
    advance(dt) {
      if (!Number.isFinite(dt) || dt < 0) throw new Error('dt must be finite and >= 0');
      current += dt;
    },
  };
}
