export type Byte = number; // 0..255
export type Word = number; // 0..65535
export type Addr = number; // 0..0xFFF

export interface CPUState {
  v: Uint8Array; // V0..VF
  i: Word; // index register, 12 significant bits
  pc: Addr;
  stack: Uint16Array; // return addresses
  sp: number; // number of live stack entries (0..16)
  cycles: number;
}

export const REGISTER_COUNT = 16;
export const STACK_DEPTH = 16;
export const PROGRAM_START = 0x200;
export const ADDR_MASK = 0xFFF;
