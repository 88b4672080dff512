import type { Addr, Byte } from '@core/cpu/types';
import { MemoryBoundsFault } from '@core/cpu/faults';
import { PROGRAM_START } from '@core/cpu/types';
import glyphs from './fontset.json';

export const MEMORY_SIZE = 0x1000;
export const FONT_BASE = 0x050;
export const GLYPH_BYTES = 5;

// 16 glyphs (0..F), 5 rows each, packed in table order
export const FONTSET = Uint8Array.from(glyphs.flat());

export class Memory {
  private bytes = new Uint8Array(MEMORY_SIZE);

  constructor() {
    this.installFont();
  }

  read(addr: Addr): Byte {
    this.check(addr, 1, 'read');
    return this.bytes[addr];
  }

  write(addr: Addr, value: Byte): void {
    this.check(addr, 1, 'write');
    this.bytes[addr] = value & 0xFF;
  }

  // Big-endian 16-bit fetch used by the decoder
  readWord(addr: Addr): number {
    this.check(addr, 2, 'fetch');
    return (this.bytes[addr] << 8) | this.bytes[addr + 1];
  }

  // Copy of [addr, addr+len)
  readRange(addr: Addr, len: number): Uint8Array {
    this.check(addr, len, 'read');
    return this.bytes.slice(addr, addr + len);
  }

  load(data: Uint8Array, offset: Addr): void {
    this.check(offset, data.length, 'write');
    this.bytes.set(data, offset);
  }

  // Zero everything from the program start upward and restore the font
  resetProgramRegion(): void {
    this.bytes.fill(0, PROGRAM_START);
    this.installFont();
  }

  private installFont(): void {
    this.bytes.set(FONTSET, FONT_BASE);
  }

  // Faults with the first address that falls outside the 4K extent
  private check(addr: number, len: number, detail: string): void {
    if (!Number.isInteger(addr) || addr < 0) throw new MemoryBoundsFault(addr, detail);
    if (len > 0 && addr + len > MEMORY_SIZE) {
      throw new MemoryBoundsFault(Math.max(addr, MEMORY_SIZE), detail);
    }
  }
}
