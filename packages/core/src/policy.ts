// Which transition directions are debounced at all.
export type BufferMode = 'BOTH' | 'TRUE_TO_FALSE' | 'FALSE_TO_TRUE' | 'NONE';

export const BUFFER_MODES: readonly BufferMode[] = ['BOTH', 'TRUE_TO_FALSE', 'FALSE_TO_TRUE', 'NONE'];

export type Direction = 'FALSE_TO_TRUE' | 'TRUE_TO_FALSE';

export type ThresholdSet = {
  /** Consecutive reports required, both directions unless overridden. */
  countThreshold: number;
  /** Seconds a candidate must persist, both directions unless overridden. */
  durationThreshold: number;
  countThresholdFalseToTrue?: number;
  countThresholdTrueToFalse?: number;
  durationThresholdFalseToTrue?: number;
  durationThresholdTrueToFalse?: number;
};

export const THRESHOLD_OVERRIDE_KEYS = [
  'countThresholdFalseToTrue',
  'countThresholdTrueToFalse',
  'durationThresholdFalseToTrue',
  'durationThresholdTrueToFalse',
] as const;

export type ThresholdOverrideKey = (typeof THRESHOLD_OVERRIDE_KEYS)[number];

export function isBufferMode(v: unknown): v is BufferMode {
  return typeof v === 'string' && BUFFER_MODES.some((m) => m === v);
}

export function directionOf(from: boolean, to: boolean): Direction {
  if (from === to) throw new Error('direction requires two different values');
  return to ? 'FALSE_TO_TRUE' : 'TRUE_TO_FALSE';
}

export function isStabilized(mode: BufferMode, direction: Direction): boolean {
  switch (mode) {
    case 'BOTH':
      return true;
    case 'NONE':
      return false;
    case 'TRUE_TO_FALSE':
      return direction === 'TRUE_TO_FALSE';
    case 'FALSE_TO_TRUE':
      return direction === 'FALSE_TO_TRUE';
  }
}

function resolve(base: number, override: number | undefined): number {
  return override ?? base;
}

export function resolveCountThreshold(t: Readonly<ThresholdSet>, direction: Direction): number {
  return resolve(
    t.countThreshold,
    direction === 'FALSE_TO_TRUE' ? t.countThresholdFalseToTrue : t.countThresholdTrueToFalse,
  );
}

export function resolveDurationThreshold(t: Readonly<ThresholdSet>, direction: Direction): number {
  return resolve(
    t.durationThreshold,
    direction === 'FALSE_TO_TRUE' ? t.durationThresholdFalseToTrue : t.durationThresholdTrueToFalse,
  );
}
