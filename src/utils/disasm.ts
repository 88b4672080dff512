import type { Instruction } from '@core/cpu/instruction';
import type { Addr, Byte } from '@core/cpu/types';
import { decode } from '@core/cpu/decoder';
import { DecodeFault } from '@core/cpu/faults';

export type ReadByteFn = (addr: Addr) => Byte;

const h = (v: number, w: number) => v.toString(16).toUpperCase().padStart(w, '0');
const r = (n: number) => `V${h(n, 1)}`;

// Cowgod-style mnemonics
export function disassemble(ins: Instruction): string {
  switch (ins.op) {
    case 'cls': return 'CLS';
    case 'ret': return 'RET';
    case 'jp': return `JP $${h(ins.addr, 3)}`;
    case 'call': return `CALL $${h(ins.addr, 3)}`;
    case 'seImm': return `SE ${r(ins.x)}, #$${h(ins.nn, 2)}`;
    case 'sneImm': return `SNE ${r(ins.x)}, #$${h(ins.nn, 2)}`;
    case 'seReg': return `SE ${r(ins.x)}, ${r(ins.y)}`;
    case 'sneReg': return `SNE ${r(ins.x)}, ${r(ins.y)}`;
    case 'ldImm': return `LD ${r(ins.x)}, #$${h(ins.nn, 2)}`;
    case 'addImm': return `ADD ${r(ins.x)}, #$${h(ins.nn, 2)}`;
    case 'ldReg': return `LD ${r(ins.x)}, ${r(ins.y)}`;
    case 'or': return `OR ${r(ins.x)}, ${r(ins.y)}`;
    case 'and': return `AND ${r(ins.x)}, ${r(ins.y)}`;
    case 'xor': return `XOR ${r(ins.x)}, ${r(ins.y)}`;
    case 'addReg': return `ADD ${r(ins.x)}, ${r(ins.y)}`;
    case 'sub': return `SUB ${r(ins.x)}, ${r(ins.y)}`;
    case 'shr': return `SHR ${r(ins.x)}`;
    case 'subn': return `SUBN ${r(ins.x)}, ${r(ins.y)}`;
    case 'shl': return `SHL ${r(ins.x)}`;
    case 'ldI': return `LD I, $${h(ins.addr, 3)}`;
    case 'jpV0': return `JP V0, $${h(ins.addr, 3)}`;
    case 'rnd': return `RND ${r(ins.x)}, #$${h(ins.nn, 2)}`;
    case 'drw': return `DRW ${r(ins.x)}, ${r(ins.y)}, ${ins.n}`;
    case 'skp': return `SKP ${r(ins.x)}`;
    case 'sknp': return `SKNP ${r(ins.x)}`;
    case 'ldVxDt': return `LD ${r(ins.x)}, DT`;
    case 'ldVxKey': return `LD ${r(ins.x)}, K`;
    case 'ldDtVx': return `LD DT, ${r(ins.x)}`;
    case 'ldStVx': return `LD ST, ${r(ins.x)}`;
    case 'addI': return `ADD I, ${r(ins.x)}`;
    case 'ldFont': return `LD F, ${r(ins.x)}`;
    case 'bcd': return `LD B, ${r(ins.x)}`;
    case 'store': return `LD [I], ${r(ins.x)}`;
    case 'load': return `LD ${r(ins.x)}, [I]`;
  }
}

export interface DisasmLine {
  pc: Addr;
  word: number;
  text: string;
}

// Unknown words come back as a data directive instead of throwing
export function disasmAt(read: ReadByteFn, pc: Addr): DisasmLine {
  const word = ((read(pc) & 0xFF) << 8) | (read(pc + 1) & 0xFF);
  let text: string;
  try {
    text = disassemble(decode(word, pc));
  } catch (e) {
    if (!(e instanceof DecodeFault)) throw e;
    text = `DW $${h(word, 4)}`;
  }
  return { pc, word, text };
}

export function formatLine(line: DisasmLine): string {
  return `${h(line.pc, 3)}  ${h(line.word, 4)}  ${line.text}`;
}

// Linear listing of a ROM image as it would sit at `origin`
export function disasmRom(rom: Uint8Array, origin: Addr = 0x200): string[] {
  const out: string[] = [];
  const read: ReadByteFn = (a) => rom[a - origin] ?? 0;
  for (let pc = origin; pc < origin + rom.length; pc += 2) {
    out.push(formatLine(disasmAt(read, pc)));
  }
  return out;
}
