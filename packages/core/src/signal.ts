import { systemClock, type Clock } from './clock';
import { validateConfig, type ConfigError } from './config';
import { InvalidConfigurationError, InvalidTimestampError } from './errors';
import {
  THRESHOLD_OVERRIDE_KEYS,
  directionOf,
  isBufferMode,
  isStabilized,
  resolveCountThreshold,
  resolveDurationThreshold,
  type BufferMode,
  type Direction,
  type ThresholdSet,
} from './policy';

export type CommitReason = 'STABILIZED' | 'IMMEDIATE' | 'FORCED' | 'RESET';

export type CommitEvent = {
  name: string;
  from: boolean;
  to: boolean;
  reason: CommitReason;
  /** Report time in seconds; undefined for resets, which carry no timestamp. */
  at?: number;
  /** Reports the candidate collected before committing (0 outside of STABILIZED). */
  pendingCount: number;
};

export type SignalOptions = Partial<ThresholdSet> & {
  initialValue?: boolean;
  bufferMode?: BufferMode;
  clock?: Clock;
  onCommit?: (event: CommitEvent) => void;
};

export type SignalSnapshot = {
  name: string;
  value: boolean;
  pendingValue?: boolean;
  pendingCount: number;
  pendingDuration: number;
  bufferMode: BufferMode;
  thresholds: Readonly<ThresholdSet>;
};

function toThresholds(input: Partial<ThresholdSet> & { bufferMode?: unknown }): {
  thresholds: ThresholdSet;
  bufferMode: BufferMode;
} {
  const res = validateConfig(input);
  if (!res.ok) throw new InvalidConfigurationError(res.errors);
  const { bufferMode, ...thresholds } = res.value;
  return { thresholds, bufferMode };
}

/**
 * A boolean whose committed value only follows reports once a candidate has been
 * reported `count` times in a row and has persisted for `duration` seconds.
 *
 * Which directions are debounced is governed by {@link BufferMode}; thresholds may
 * differ per direction. Configuration changes apply from the next report on.
 */
export class StabilizedSignal {
  readonly name: string;

  private current: boolean;
  private candidate: boolean | undefined = undefined;
  private count = 0;
  private since: number | undefined = undefined;

  private config: ThresholdSet;
  private mode: BufferMode;
  private readonly clock: Clock;
  private readonly onCommit?: (event: CommitEvent) => void;

  constructor(name: string, options: SignalOptions = {}) {
    const { initialValue = false, clock = systemClock, onCommit, ...rest } = options;
    const { thresholds, bufferMode } = toThresholds(rest);
    this.name = name;
    this.current = initialValue;
    this.config = thresholds;
    this.mode = bufferMode;
    this.clock = clock;
    this.onCommit = onCommit;
  }

  get value(): boolean {
    return this.current;
  }

  get pendingValue(): boolean | undefined {
    return this.candidate;
  }

  get pendingCount(): number {
    return this.count;
  }

  get pendingSince(): number | undefined {
    return this.since;
  }

  get bufferMode(): BufferMode {
    return this.mode;
  }

  set bufferMode(mode: BufferMode) {
    if (!isBufferMode(mode)) {
      throw new InvalidConfigurationError([
        { path: 'bufferMode', code: 'RANGE', message: 'Unknown buffer mode', actual: mode },
      ]);
    }
    this.mode = mode;
  }

  get thresholds(): Readonly<ThresholdSet> {
    return Object.freeze({ ...this.config });
  }

  /**
   * Merges `patch` into the current thresholds. An override key present with
   * `undefined` removes that override. Nothing changes if the result is invalid.
   */
  setThresholds(patch: Partial<ThresholdSet>): void {
    const merged: Partial<ThresholdSet> = { ...this.config };
    if (patch.countThreshold !== undefined) merged.countThreshold = patch.countThreshold;
    if (patch.durationThreshold !== undefined) merged.durationThreshold = patch.durationThreshold;
    for (const key of THRESHOLD_OVERRIDE_KEYS) {
      if (key in patch) merged[key] = patch[key];
    }
    this.config = toThresholds(merged).thresholds;
  }

  /** Symmetric count threshold; throws when the two directions resolve differently. */
  get countThreshold(): number {
    const up = resolveCountThreshold(this.config, 'FALSE_TO_TRUE');
    const down = resolveCountThreshold(this.config, 'TRUE_TO_FALSE');
    if (up !== down) throw asymmetric('countThreshold', up, down);
    return up;
  }

  set countThreshold(v: number) {
    this.setThresholds({ countThreshold: v });
  }

  /** Symmetric duration threshold; throws when the two directions resolve differently. */
  get durationThreshold(): number {
    const up = resolveDurationThreshold(this.config, 'FALSE_TO_TRUE');
    const down = resolveDurationThreshold(this.config, 'TRUE_TO_FALSE');
    if (up !== down) throw asymmetric('durationThreshold', up, down);
    return up;
  }

  set durationThreshold(v: number) {
    this.setThresholds({ durationThreshold: v });
  }

  countThresholdFor(direction: Direction): number {
    return resolveCountThreshold(this.config, direction);
  }

  durationThresholdFor(direction: Direction): number {
    return resolveDurationThreshold(this.config, direction);
  }

  /**
   * Feeds one observation and returns the committed value afterwards.
   *
   * Reporting the committed value cancels any in-flight transition. A transition
   * the buffer mode does not cover, or one reported with `forceImmediate`, commits
   * at once. Otherwise the candidate commits when both its count and its elapsed
   * duration reach the thresholds of its direction.
   */
  report(newValue: boolean, now: number = this.clock.now(), forceImmediate = false): boolean {
    assertTimestamp(now);
    if (newValue === this.current) {
      this.clearPending();
      return this.current;
    }

    const direction = directionOf(this.current, newValue);
    if (forceImmediate || !isStabilized(this.mode, direction)) {
      this.commit(newValue, forceImmediate ? 'FORCED' : 'IMMEDIATE', now, 0);
      return this.current;
    }

    if (this.candidate !== newValue || this.since === undefined) {
      this.candidate = newValue;
      this.count = 1;
      this.since = now;
    } else {
      this.count += 1;
    }

    const countMet = this.count >= resolveCountThreshold(this.config, direction);
    const durationMet = this.pendingDuration(now) >= resolveDurationThreshold(this.config, direction);
    if (countMet && durationMet) {
      this.commit(newValue, 'STABILIZED', now, this.count);
    }
    return this.current;
  }

  /** Seconds since the current candidate was first reported, 0 when there is none. */
  pendingDuration(now: number = this.clock.now()): number {
    assertTimestamp(now);
    if (this.since === undefined) return 0;
    return Math.max(0, now - this.since);
  }

  /** Clears pending state; with a value, also overrides the committed value. */
  reset(newValue?: boolean): void {
    this.clearPending();
    if (newValue !== undefined && newValue !== this.current) {
      this.commit(newValue, 'RESET', undefined, 0);
    }
  }

  // "count/threshold" for the candidate's direction; "0/0" while stable.
  progress(): string {
    if (this.candidate === undefined) return '0/0';
    const threshold = resolveCountThreshold(this.config, directionOf(this.current, this.candidate));
    return `${Math.min(this.count, threshold)}/${threshold}`;
  }

  snapshot(now: number = this.clock.now()): SignalSnapshot {
    return {
      name: this.name,
      value: this.current,
      pendingValue: this.candidate,
      pendingCount: this.count,
      pendingDuration: this.pendingDuration(now),
      bufferMode: this.mode,
      thresholds: this.thresholds,
    };
  }

  toString(): string {
    return `StabilizedSignal(${this.name}=${this.current}, pending=${this.progress()}, mode=${this.mode})`;
  }

  private commit(to: boolean, reason: CommitReason, at: number | undefined, pendingCount: number): void {
    const from = this.current;
    this.current = to;
    this.clearPending();
    this.onCommit?.({ name: this.name, from, to, reason, at, pendingCount });
  }

  private clearPending(): void {
    this.candidate = undefined;
    this.count = 0;
    this.since = undefined;
  }
}

function assertTimestamp(now: number): void {
  if (!Number.isFinite(now)) throw new InvalidTimestampError(now);
}

function asymmetric(path: string, up: number, down: number): InvalidConfigurationError {
  const error: ConfigError = {
    path,
    code: 'RANGE',
    message: 'Thresholds differ for false->true and true->false; read them per direction',
    actual: { FALSE_TO_TRUE: up, TRUE_TO_FALSE: down },
  };
  return new InvalidConfigurationError([error]);
}
