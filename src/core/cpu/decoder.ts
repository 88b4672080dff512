import type { Word } from './types';
import type { Instruction } from './instruction';
import { DecodeFault } from './faults';
import { ADDR_MASK } from './types';

// Classify a 16-bit word. pc is only carried into the fault for reporting.
export function decode(word: Word, pc = 0): Instruction {
  const w = word & 0xFFFF;
  const x = (w >> 8) & 0x0F;
  const y = (w >> 4) & 0x0F;
  const n = w & 0x0F;
  const nn = w & 0xFF;
  const addr = w & ADDR_MASK;

  switch (w >> 12) {
    case 0x0:
      if (w === 0x00E0) return { op: 'cls' };
      if (w === 0x00EE) return { op: 'ret' };
      break; // 0NNN machine-code calls are not supported
    case 0x1: return { op: 'jp', addr };
    case 0x2: return { op: 'call', addr };
    case 0x3: return { op: 'seImm', x, nn };
    case 0x4: return { op: 'sneImm', x, nn };
    case 0x5:
      if (n === 0) return { op: 'seReg', x, y };
      break;
    case 0x6: return { op: 'ldImm', x, nn };
    case 0x7: return { op: 'addImm', x, nn };
    case 0x8:
      switch (n) {
        case 0x0: return { op: 'ldReg', x, y };
        case 0x1: return { op: 'or', x, y };
        case 0x2: return { op: 'and', x, y };
        case 0x3: return { op: 'xor', x, y };
        case 0x4: return { op: 'addReg', x, y };
        case 0x5: return { op: 'sub', x, y };
        case 0x6: return { op: 'shr', x, y };
        case 0x7: return { op: 'subn', x, y };
        case 0xE: return { op: 'shl', x, y };
      }
      break;
    case 0x9:
      if (n === 0) return { op: 'sneReg', x, y };
      break;
    case 0xA: return { op: 'ldI', addr };
    case 0xB: return { op: 'jpV0', addr };
    case 0xC: return { op: 'rnd', x, nn };
    case 0xD: return { op: 'drw', x, y, n };
    case 0xE:
      if (nn === 0x9E) return { op: 'skp', x };
      if (nn === 0xA1) return { op: 'sknp', x };
      break;
    case 0xF:
      switch (nn) {
        case 0x07: return { op: 'ldVxDt', x };
        case 0x0A: return { op: 'ldVxKey', x };
        case 0x15: return { op: 'ldDtVx', x };
        case 0x18: return { op: 'ldStVx', x };
        case 0x1E: return { op: 'addI', x };
        case 0x29: return { op: 'ldFont', x };
        case 0x33: return { op: 'bcd', x };
        case 0x55: return { op: 'store', x };
        case 0x65: return { op: 'load', x };
      }
      break;
  }
  throw new DecodeFault(w, pc);
}
