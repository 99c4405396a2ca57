import {
  silentNotificationsAdapter,
  type NotificationContext,
  type NotificationsAdapter,
} from '@flipguard/notifications';
import { systemClock, type Clock } from './clock';
import { validateConfig } from './config';
import { DuplicateNameError, InvalidConfigurationError, NotFoundError } from './errors';
import type { BufferMode } from './policy';
import { StabilizedSignal, type CommitEvent, type SignalOptions, type SignalSnapshot } from './signal';

export type RegistryDefaults = {
  countThreshold: number;
  durationThreshold: number;
  bufferMode: BufferMode;
};

export type RegistryOptions = {
  clock?: Clock;
  notifications?: NotificationsAdapter;
};

// Per-signal overrides accepted by `add`; clock and hook are owned by the registry.
export type AddSignalOptions = Omit<SignalOptions, 'clock' | 'onCommit'>;

function toDefaults(input: Partial<RegistryDefaults>): RegistryDefaults {
  const res = validateConfig(input);
  if (!res.ok) throw new InvalidConfigurationError(res.errors);
  const { countThreshold, durationThreshold, bufferMode } = res.value;
  return { countThreshold, durationThreshold, bufferMode };
}

/**
 * Named collection of {@link StabilizedSignal}s sharing default thresholds and buffer
 * mode. Defaults are copied into a signal when it is added; changing them later only
 * affects signals added afterwards.
 */
export class SignalRegistry implements Iterable<string> {
  private readonly signals = new Map<string, StabilizedSignal>();
  private current: RegistryDefaults;
  private readonly clock: Clock;
  private readonly notifications: NotificationsAdapter;

  constructor(defaults: Partial<RegistryDefaults> = {}, options: RegistryOptions = {}) {
    this.current = toDefaults(defaults);
    this.clock = options.clock ?? systemClock;
    this.notifications = options.notifications ?? silentNotificationsAdapter;
  }

  get defaults(): Readonly<RegistryDefaults> {
    return { ...this.current };
  }

  /** Keys left out of `patch`, or passed as `undefined`, keep their current default. */
  setDefaults(patch: Partial<RegistryDefaults>): void {
    const merged: Partial<RegistryDefaults> = { ...this.current };
    if (patch.countThreshold !== undefined) merged.countThreshold = patch.countThreshold;
    if (patch.durationThreshold !== undefined) merged.durationThreshold = patch.durationThreshold;
    if (patch.bufferMode !== undefined) merged.bufferMode = patch.bufferMode;
    this.current = toDefaults(merged);
  }

  get size(): number {
    return this.signals.size;
  }

  has(name: string): boolean {
    return this.signals.has(name);
  }

  names(): string[] {
    return [...this.signals.keys()];
  }

  [Symbol.iterator](): Iterator<string> {
    return this.signals.keys();
  }

  add(name: string, options: AddSignalOptions = {}): StabilizedSignal {
    if (this.signals.has(name)) throw new DuplicateNameError(name);

    const signal = new StabilizedSignal(name, {
      countThreshold: options.countThreshold ?? this.current.countThreshold,
      durationThreshold: options.durationThreshold ?? this.current.durationThreshold,
      bufferMode: options.bufferMode ?? this.current.bufferMode,
      countThresholdFalseToTrue: options.countThresholdFalseToTrue,
      countThresholdTrueToFalse: options.countThresholdTrueToFalse,
      durationThresholdFalseToTrue: options.durationThresholdFalseToTrue,
      durationThresholdTrueToFalse: options.durationThresholdTrueToFalse,
      initialValue: options.initialValue,
      clock: this.clock,
      onCommit: (event) => this.logCommit(event),
    });
    this.signals.set(name, signal);
    this.notifications.notify('signal added', {
      name,
      value: signal.value,
      bufferMode: signal.bufferMode,
    });
    return signal;
  }

  remove(name: string): void {
    if (!this.signals.delete(name)) throw new NotFoundError(name);
    this.notifications.notify('signal removed', { name });
  }

  get(name: string): StabilizedSignal {
    const signal = this.signals.get(name);
    if (!signal) throw new NotFoundError(name);
    return signal;
  }

  report(name: string, newValue: boolean, now?: number, forceImmediate = false): boolean {
    return this.get(name).report(newValue, now ?? this.clock.now(), forceImmediate);
  }

  getValue(name: string): boolean {
    return this.get(name).value;
  }

  getAllValues(): Record<string, boolean> {
    const out: Record<string, boolean> = {};
    for (const [name, signal] of this.signals) out[name] = signal.value;
    return out;
  }

  /** Clears every pending transition; committed values are kept. */
  resetAll(): void {
    for (const signal of this.signals.values()) signal.reset();
    this.notifications.notify('pending state cleared', { signals: this.signals.size });
  }

  snapshot(now: number = this.clock.now()): SignalSnapshot[] {
    return [...this.signals.values()].map((s) => s.snapshot(now));
  }

  private logCommit(event: CommitEvent): void {
    const context: NotificationContext = {
      name: event.name,
      from: event.from,
      to: event.to,
      reason: event.reason,
      pendingCount: event.pendingCount,
    };
    if (event.at !== undefined) context.at = event.at;
    this.notifications.notify('signal committed', context);
  }
}
