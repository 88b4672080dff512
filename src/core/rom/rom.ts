import { RomCapacityFault } from '@core/cpu/faults';
import { PROGRAM_START } from '@core/cpu/types';
import { MEMORY_SIZE } from '@core/bus/memory';

export const ROM_CAPACITY = MEMORY_SIZE - PROGRAM_START; // 3584 bytes

export interface Chip8Rom {
  data: Uint8Array;
  name?: string;
}

// Chip-8 programs are headerless; the only check is that they fit above 0x200
export function parseRom(buffer: Uint8Array, name?: string): Chip8Rom {
  if (buffer.length > ROM_CAPACITY) throw new RomCapacityFault(buffer.length, ROM_CAPACITY);
  return { data: buffer.slice(), name };
}
