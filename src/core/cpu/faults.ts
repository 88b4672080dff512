import type { Word } from './types';
import { hex } from '@utils/env';

export type FaultKind = 'decode' | 'memory-bounds' | 'stack-overflow' | 'stack-underflow' | 'rom-capacity';

// Base for every condition the core reports to its host. Thrown by the primitives,
// caught and returned as data by the scheduler.
export abstract class Chip8Fault extends Error {
  abstract readonly kind: FaultKind;
}

export class DecodeFault extends Chip8Fault {
  readonly kind = 'decode';
  constructor(readonly word: Word, readonly pc: number) {
    super(`Unknown opcode $${hex(word, 4)} at $${hex(pc, 3)}`);
    this.name = 'DecodeFault';
  }
}

export class MemoryBoundsFault extends Chip8Fault {
  readonly kind = 'memory-bounds';
  constructor(readonly address: number, detail = 'access') {
    super(`Memory ${detail} out of range at $${hex(address, 3)}`);
    this.name = 'MemoryBoundsFault';
  }
}

export class StackOverflowFault extends Chip8Fault {
  readonly kind = 'stack-overflow';
  constructor(readonly pc: number) {
    super(`Stack overflow: call at $${hex(pc, 3)} with 16 return addresses already pushed`);
    this.name = 'StackOverflowFault';
  }
}

export class StackUnderflowFault extends Chip8Fault {
  readonly kind = 'stack-underflow';
  constructor(readonly pc: number) {
    super(`Stack underflow: return at $${hex(pc, 3)} with an empty stack`);
    this.name = 'StackUnderflowFault';
  }
}

export class RomCapacityFault extends Chip8Fault {
  readonly kind = 'rom-capacity';
  constructor(readonly size: number, readonly capacity: number) {
    super(`ROM is ${size} bytes; program space holds ${capacity}`);
    this.name = 'RomCapacityFault';
  }
}
