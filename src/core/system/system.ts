import { Memory } from '@core/bus/memory';
import { Chip8CPU } from '@core/cpu/cpu';
import type { RandomByte } from '@core/cpu/cpu';
import { Chip8Fault } from '@core/cpu/faults';
import { PROGRAM_START } from '@core/cpu/types';
import { Framebuffer } from '@core/display/framebuffer';
import { Timers, TIMER_HZ } from '@core/timers/timers';
import { Keypad } from '@core/input/keypad';
import type { Chip8Rom } from '@core/rom/rom';
import { parseRom } from '@core/rom/rom';
import type { Chip8Config } from './config';
import { resolveConfig, validateCyclesPerFrame } from './config';
import { envFlag } from '@utils/env';

export const FRAME_MS = 1000 / TIMER_HZ;

export interface FrameResult {
  executed: number; // instructions completed this frame
  timerTicks: number;
  drew: boolean; // framebuffer touched since the previous frame
  fault: Chip8Fault | null;
}

export interface SystemOptions extends Partial<Chip8Config> {
  random?: RandomByte;
}

// Owns every piece of machine state; hosts drive it one frame at a time.
export class Chip8System {
  public memory: Memory;
  public cpu: Chip8CPU;
  public framebuffer: Framebuffer;
  public timers: Timers;
  public keypad: Keypad;
  public rom: Chip8Rom | null = null;
  private cyclesPerFrame: number;
  private _paused = false;
  private _halted = false;
  private _lastFault: Chip8Fault | null = null;
  private traceFaults: boolean;

  constructor(opts: SystemOptions = {}) {
    const cfg = resolveConfig({ cyclesPerFrame: opts.cyclesPerFrame, decayFactor: opts.decayFactor });
    this.cyclesPerFrame = cfg.cyclesPerFrame;
    this.memory = new Memory();
    this.framebuffer = new Framebuffer(cfg.decayFactor);
    this.timers = new Timers();
    this.keypad = new Keypad();
    this.cpu = new Chip8CPU({
      memory: this.memory,
      framebuffer: this.framebuffer,
      timers: this.timers,
      keypad: this.keypad,
      random: opts.random,
    });
    this.traceFaults = envFlag('CHIP8_TRACE_FAULTS');
  }

  get config(): Chip8Config {
    return { cyclesPerFrame: this.cyclesPerFrame, decayFactor: this.framebuffer.decayFactor };
  }

  setCyclesPerFrame(n: number): void { this.cyclesPerFrame = validateCyclesPerFrame(n); }
  setDecayFactor(d: number): void { this.framebuffer.setDecayFactor(d); }

  get paused(): boolean { return this._paused; }
  get halted(): boolean { return this._halted; }
  get lastFault(): Chip8Fault | null { return this._lastFault; }
  get soundActive(): boolean { return this.timers.soundActive; }

  // Accepts raw bytes or an already-validated ROM
  loadRom(rom: Uint8Array | Chip8Rom): void {
    const parsed = rom instanceof Uint8Array ? parseRom(rom) : parseRom(rom.data, rom.name);
    this.rom = parsed;
    this.reset();
  }

  // Back to power-on state with the current ROM (if any) reinstalled
  reset(): void {
    this.memory.resetProgramRegion();
    if (this.rom) this.memory.load(this.rom.data, PROGRAM_START);
    this.cpu.reset(PROGRAM_START);
    this.timers.reset();
    this.framebuffer.reset();
    this.keypad.reset();
    this._halted = false;
    this._lastFault = null;
  }

  pause(): void { this._paused = true; }

  // Also clears a halt, so the host can retry or skip the faulting instruction
  resume(): void {
    this._paused = false;
    this._halted = false;
  }

  skipFaultedInstruction(): void {
    if (!this._halted) return;
    this.cpu.skip();
    this._halted = false;
    this._lastFault = null;
  }

  // Single instruction, ignoring pause; for debugger-style stepping
  stepInstruction(): Chip8Fault | null {
    if (this._halted) return this._lastFault;
    try {
      this.cpu.step();
      return null;
    } catch (e) {
      return this.onFault(e);
    }
  }

  // One rendered frame: N cycles, then the 60 Hz timers for the elapsed wall-clock
  // time, then one decay pass. The order is fixed so late draws show this frame.
  runFrame(elapsedMs: number = FRAME_MS): FrameResult {
    if (!Number.isFinite(elapsedMs)) throw new RangeError(`elapsed time must be finite, got ${elapsedMs}`);
    let executed = 0;
    let fault: Chip8Fault | null = null;
    if (!this._paused && !this._halted) {
      for (let n = 0; n < this.cyclesPerFrame; n++) {
        try {
          this.cpu.step();
          executed++;
        } catch (e) {
          fault = this.onFault(e);
          break;
        }
      }
    }
    const timerTicks = this._paused ? 0 : this.timers.advance(elapsedMs);
    this.framebuffer.advanceFrame();
    const drew = this.framebuffer.consumeDirty();
    return { executed, timerTicks, drew, fault };
  }

  private onFault(e: unknown): Chip8Fault {
    if (!(e instanceof Chip8Fault)) throw e;
    this._halted = true;
    this._lastFault = e;
    if (this.traceFaults) {
      // eslint-disable-next-line no-console
      console.log(`[sys] ${e.name}: ${e.message}`);
    }
    return e;
  }
}
