import { describe, it, expect } from 'vitest';
import { Timers } from '@core/timers/timers';

describe('60 Hz timers', () => {
  it('tick decrements both counters and clamps at zero', () => {
    const t = new Timers();
    t.setDelay(2);
    t.setSound(1);
    t.tick();
    expect([t.delay, t.sound]).toEqual([1, 0]);
    t.tick();
    t.tick();
    expect([t.delay, t.sound]).toEqual([0, 0]);
    expect(t.soundActive).toBe(false);
  });

  it('advance fires one tick per 1/60 s of elapsed time', () => {
    const t = new Timers();
    t.setDelay(200);
    let fired = 0;
    for (let i = 0; i < 60; i++) fired += t.advance(1000 / 60);
    expect(fired).toBe(60);
    expect(t.delay).toBe(140);
  });

  it('carries fractions across calls', () => {
    const t = new Timers();
    t.setDelay(100);
    expect(t.advance(10)).toBe(0);
    expect(t.advance(10)).toBe(1); // 20 ms
    expect(t.advance(1000)).toBe(60); // 1020 ms total => 61 ticks
    expect(t.delay).toBe(39);
    expect(t.totalTicks).toBe(61);
  });

  it('ignores non-positive elapsed time', () => {
    const t = new Timers();
    t.setDelay(5);
    expect(t.advance(0)).toBe(0);
    expect(t.advance(-50)).toBe(0);
    expect(t.delay).toBe(5);
  });
});

describe('60 Hz timers with long or invalid elapsed times', () => {
  it('applies a large backlog in one step and clamps at zero', () => {
    const t = new Timers();
    t.setDelay(200);
    t.setSound(3);
    expect(t.advance(1e9)).toBe(60_000_000);
    expect([t.delay, t.sound]).toEqual([0, 0]);
    expect(t.totalTicks).toBe(60_000_000);
  });

  it('keeps the fraction left over from a backlog', () => {
    const t = new Timers();
    t.setDelay(10);
    expect(t.advance(110)).toBe(6); // 6.6 ticks
    expect(t.advance(10)).toBe(1); // 0.6 + 0.6
    expect(t.delay).toBe(3);
  });

  it('rejects non-finite elapsed time', () => {
    const t = new Timers();
    t.setDelay(5);
    expect(() => t.advance(Infinity)).toThrow(RangeError);
    expect(() => t.advance(Number.NaN)).toThrow(RangeError);
    expect(t.delay).toBe(5);
  });
});
