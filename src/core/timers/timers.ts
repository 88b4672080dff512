import type { Byte } from '@core/cpu/types';

export const TIMER_HZ = 60;
// Slack for the 1000/60 ms frame period not being representable exactly
const TICK_EPSILON = 1e-9;

// Delay and sound countdowns. Driven by wall-clock time through advance(), never
// by the instruction count.
export class Timers {
  delay: Byte = 0;
  sound: Byte = 0;
  private pending = 0; // fractional ticks carried between advance() calls
  private ticks = 0;

  reset(): void {
    this.delay = 0;
    this.sound = 0;
    this.pending = 0;
    this.ticks = 0;
  }

  tick(): void {
    if (this.delay > 0) this.delay--;
    if (this.sound > 0) this.sound--;
    this.ticks++;
  }

  // Accumulate elapsed time and return how many 60 Hz ticks fired. A backlog is
  // applied in one step, so the cost does not grow with the elapsed time.
  advance(elapsedMs: number): number {
    if (!Number.isFinite(elapsedMs)) throw new RangeError(`elapsed time must be finite, got ${elapsedMs}`);
    if (elapsedMs <= 0) return 0;
    this.pending += (elapsedMs * TIMER_HZ) / 1000;
    const fired = Math.floor(this.pending + TICK_EPSILON);
    if (fired <= 0) return 0;
    this.pending = Math.max(0, this.pending - fired);
    this.delay = Math.max(0, this.delay - fired);
    this.sound = Math.max(0, this.sound - fired);
    this.ticks += fired;
    return fired;
  }

  setDelay(v: Byte): void { this.delay = v & 0xFF; }
  setSound(v: Byte): void { this.sound = v & 0xFF; }

  // Audio collaborator reads this once per frame
  get soundActive(): boolean { return this.sound > 0; }

  get totalTicks(): number { return this.ticks; }
}
