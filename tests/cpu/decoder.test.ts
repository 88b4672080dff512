import { describe, it, expect } from 'vitest';
import { decode } from '@core/cpu/decoder';
import { DecodeFault } from '@core/cpu/faults';

describe('Opcode decoder', () => {
  it('splits nibble fields for register and immediate forms', () => {
    expect(decode(0x6A42)).toEqual({ op: 'ldImm', x: 0xA, nn: 0x42 });
    expect(decode(0x8CD4)).toEqual({ op: 'addReg', x: 0xC, y: 0xD });
    expect(decode(0xD125)).toEqual({ op: 'drw', x: 1, y: 2, n: 5 });
    expect(decode(0xF333)).toEqual({ op: 'bcd', x: 3 });
  });

  it('classifies the 0, 8, E and F groups by trailing nibble or byte', () => {
    expect(decode(0x00E0).op).toBe('cls');
    expect(decode(0x00EE).op).toBe('ret');
    const eight = [0x0, 0x1, 0x2, 0x3, 0x4, 0x5, 0x6, 0x7, 0xE].map((n) => decode(0x8010 | n).op);
    expect(eight).toEqual(['ldReg', 'or', 'and', 'xor', 'addReg', 'sub', 'shr', 'subn', 'shl']);
    expect(decode(0xE59E)).toEqual({ op: 'skp', x: 5 });
    expect(decode(0xE5A1)).toEqual({ op: 'sknp', x: 5 });
    const f = [0x07, 0x0A, 0x15, 0x18, 0x1E, 0x29, 0x33, 0x55, 0x65].map((nn) => decode(0xF200 | nn).op);
    expect(f).toEqual(['ldVxDt', 'ldVxKey', 'ldDtVx', 'ldStVx', 'addI', 'ldFont', 'bcd', 'store', 'load']);
  });

  it('keeps 12-bit address operands', () => {
    expect(decode(0x1ABC)).toEqual({ op: 'jp', addr: 0xABC });
    expect(decode(0x2FFF)).toEqual({ op: 'call', addr: 0xFFF });
    expect(decode(0xA123)).toEqual({ op: 'ldI', addr: 0x123 });
    expect(decode(0xB300)).toEqual({ op: 'jpV0', addr: 0x300 });
  });

  it('raises a decode fault carrying the word and pc for unassigned patterns', () => {
    for (const w of [0x0123, 0x00E1, 0x5121, 0x9AB3, 0x8018, 0x801F, 0xE19F, 0xF0FF, 0xF100]) {
      expect(() => decode(w)).toThrow(DecodeFault);
    }
    try {
      decode(0x5AB7, 0x2F4);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(DecodeFault);
      if (!(e instanceof DecodeFault)) return;
      expect(e.word).toBe(0x5AB7);
      expect(e.pc).toBe(0x2F4);
      expect(e.kind).toBe('decode');
      expect(e.message).toBe('Unknown opcode $5ab7 at $2f4');
    }
  });
});
