import { afterEach, describe, expect, it, vi } from 'vitest';
import { createManualClock, systemClock } from '../clock';

describe('clocks', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('system clock reports wall time in seconds', () => {
    vi.spyOn(Date, 'now').mockReturnValue(12_345);
    expect(systemClock.now()).toBe(12.345);
  });

  it('manual clock only moves when told to', () => {
    const clock = createManualClock(5);
    expect(clock.now()).toBe(5);
    clock.advance(2.5);
    expect(clock.now()).toBe(7.5);
    clock.set(1);
    expect(clock.now()).toBe(1);
  });

  it('rejects going backwards through advance', () => {
    const clock = createManualClock();
    expect(() => clock.advance(-1)).toThrow();
    expect(() => clock.set(Number.NaN)).toThrow();
    expect(clock.now()).toBe(0);
  });
});
