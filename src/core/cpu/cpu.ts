import type { Addr, Byte, CPUState } from './types';
import type { Instruction } from './instruction';
import { ADDR_MASK, PROGRAM_START, REGISTER_COUNT, STACK_DEPTH } from './types';
import { decode } from './decoder';
import { Chip8Fault, StackOverflowFault, StackUnderflowFault } from './faults';
import { Memory, FONT_BASE, GLYPH_BYTES } from '@core/bus/memory';
import { Framebuffer } from '@core/display/framebuffer';
import { Timers } from '@core/timers/timers';
import { Keypad } from '@core/input/keypad';
import { disassemble } from '@utils/disasm';
import { envFlag, hex } from '@utils/env';

// Source of uniformly distributed bytes for CXNN
export type RandomByte = () => Byte;

export const mathRandomByte: RandomByte = () => Math.floor(Math.random() * 256) & 0xFF;

const VF = 0xF;

export interface CPUDevices {
  memory: Memory;
  framebuffer: Framebuffer;
  timers: Timers;
  keypad: Keypad;
  random?: RandomByte;
}

export class Chip8CPU {
  state: CPUState;
  private memory: Memory;
  private fb: Framebuffer;
  private timers: Timers;
  private keypad: Keypad;
  private random: RandomByte;
  // Set when FX0A is parked on an empty keypad
  private waitingForKey = false;
  private traceEnabled: boolean;

  constructor(devices: CPUDevices) {
    this.memory = devices.memory;
    this.fb = devices.framebuffer;
    this.timers = devices.timers;
    this.keypad = devices.keypad;
    this.random = devices.random ?? mathRandomByte;
    this.state = Chip8CPU.initialState();
    this.traceEnabled = envFlag('CHIP8_TRACE');
  }

  private static initialState(): CPUState {
    return {
      v: new Uint8Array(REGISTER_COUNT),
      i: 0,
      pc: PROGRAM_START,
      stack: new Uint16Array(STACK_DEPTH),
      sp: 0,
      cycles: 0,
    };
  }

  reset(pc: Addr = PROGRAM_START): void {
    this.state = Chip8CPU.initialState();
    this.state.pc = pc & ADDR_MASK;
    this.waitingForKey = false;
  }

  get isWaitingForKey(): boolean { return this.waitingForKey; }

  // Fetch, decode and execute one instruction. On a fault the PC is put back on
  // the faulting instruction so nothing is left half-applied.
  step(): Instruction {
    const s = this.state;
    const pc = s.pc;
    try {
      const word = this.memory.readWord(pc);
      const ins = decode(word, pc);
      s.pc = pc + 2;
      if (this.traceEnabled) {
        // eslint-disable-next-line no-console
        console.log(`[cpu] pc=$${hex(pc, 3)} op=$${hex(word, 4)} ${disassemble(ins)} I=$${hex(s.i, 3)} sp=${s.sp}`);
      }
      this.execute(ins);
      s.cycles++;
      return ins;
    } catch (e) {
      if (e instanceof Chip8Fault) s.pc = pc;
      throw e;
    }
  }

  // Move past the instruction at PC without executing it
  skip(): void {
    this.state.pc = this.state.pc + 2;
    this.waitingForKey = false;
  }

  execute(ins: Instruction): void {
    const s = this.state;
    const v = s.v;
    switch (ins.op) {
      case 'cls':
        this.fb.clear();
        return;
      case 'ret': {
        if (s.sp === 0) throw new StackUnderflowFault(s.pc - 2);
        s.sp--;
        s.pc = s.stack[s.sp];
        return;
      }
      case 'jp':
        s.pc = ins.addr & ADDR_MASK;
        return;
      case 'call': {
        if (s.sp >= STACK_DEPTH) throw new StackOverflowFault(s.pc - 2);
        s.stack[s.sp] = s.pc;
        s.sp++;
        s.pc = ins.addr & ADDR_MASK;
        return;
      }
      case 'seImm':
        if (v[ins.x] === ins.nn) s.pc += 2;
        return;
      case 'sneImm':
        if (v[ins.x] !== ins.nn) s.pc += 2;
        return;
      case 'seReg':
        if (v[ins.x] === v[ins.y]) s.pc += 2;
        return;
      case 'sneReg':
        if (v[ins.x] !== v[ins.y]) s.pc += 2;
        return;
      case 'ldImm':
        v[ins.x] = ins.nn;
        return;
      case 'addImm':
        v[ins.x] = (v[ins.x] + ins.nn) & 0xFF;
        return;
      case 'ldReg':
        v[ins.x] = v[ins.y];
        return;
      case 'or':
        v[ins.x] = v[ins.x] | v[ins.y];
        return;
      case 'and':
        v[ins.x] = v[ins.x] & v[ins.y];
        return;
      case 'xor':
        v[ins.x] = v[ins.x] ^ v[ins.y];
        return;
      case 'addReg': {
        const sum = v[ins.x] + v[ins.y];
        v[ins.x] = sum & 0xFF;
        v[VF] = sum > 0xFF ? 1 : 0;
        return;
      }
      case 'sub': {
        const a = v[ins.x], b = v[ins.y];
        v[ins.x] = (a - b) & 0xFF;
        v[VF] = a >= b ? 1 : 0; // 1 = no borrow
        return;
      }
      case 'subn': {
        const a = v[ins.x], b = v[ins.y];
        v[ins.x] = (b - a) & 0xFF;
        v[VF] = b >= a ? 1 : 0;
        return;
      }
      case 'shr': {
        const out = v[ins.x] & 0x01;
        v[ins.x] = v[ins.x] >> 1;
        v[VF] = out;
        return;
      }
      case 'shl': {
        const out = (v[ins.x] & 0x80) >> 7;
        v[ins.x] = (v[ins.x] << 1) & 0xFF;
        v[VF] = out;
        return;
      }
      case 'ldI':
        s.i = ins.addr & ADDR_MASK;
        return;
      case 'jpV0':
        s.pc = (ins.addr + v[0]) & ADDR_MASK;
        return;
      case 'rnd':
        v[ins.x] = this.random() & ins.nn & 0xFF;
        return;
      case 'drw': {
        const rows = this.memory.readRange(s.i, ins.n);
        v[VF] = this.fb.drawSprite(v[ins.x], v[ins.y], rows) ? 1 : 0;
        return;
      }
      case 'skp':
        if (this.keypad.isDown(v[ins.x])) s.pc += 2;
        return;
      case 'sknp':
        if (!this.keypad.isDown(v[ins.x])) s.pc += 2;
        return;
      case 'ldVxDt':
        v[ins.x] = this.timers.delay;
        return;
      case 'ldVxKey': {
        const key = this.keypad.firstDown();
        if (key === null) {
          this.waitingForKey = true;
          s.pc -= 2; // re-run until a key is held
          return;
        }
        this.waitingForKey = false;
        v[ins.x] = key;
        return;
      }
      case 'ldDtVx':
        this.timers.setDelay(v[ins.x]);
        return;
      case 'ldStVx':
        this.timers.setSound(v[ins.x]);
        return;
      case 'addI': {
        const sum = s.i + v[ins.x];
        s.i = sum & ADDR_MASK;
        v[VF] = sum > ADDR_MASK ? 1 : 0;
        return;
      }
      case 'ldFont':
        s.i = FONT_BASE + GLYPH_BYTES * (v[ins.x] & 0x0F);
        return;
      case 'bcd': {
        const n = v[ins.x];
        // probe the whole range first so a fault leaves memory untouched
        this.memory.readRange(s.i, 3);
        this.memory.write(s.i, Math.floor(n / 100));
        this.memory.write(s.i + 1, Math.floor(n / 10) % 10);
        this.memory.write(s.i + 2, n % 10);
        return;
      }
      case 'store': {
        this.memory.load(v.subarray(0, ins.x + 1), s.i);
        return;
      }
      case 'load': {
        v.set(this.memory.readRange(s.i, ins.x + 1), 0);
        return;
      }
      default: {
        const unreachable: never = ins;
        throw new Error(`Unhandled instruction ${JSON.stringify(unreachable)}`);
      }
    }
  }
}
