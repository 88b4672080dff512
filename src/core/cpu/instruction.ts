import type { Addr, Byte } from './types';

// Register index 0..15
export type Reg = number;

// One case per instruction kind. The decoder is the only producer; the engine
// matches exhaustively, so an unknown opcode cannot reach execution.
export type Instruction =
  | { op: 'cls' }
  | { op: 'ret' }
  | { op: 'jp'; addr: Addr }
  | { op: 'call'; addr: Addr }
  | { op: 'seImm'; x: Reg; nn: Byte }
  | { op: 'sneImm'; x: Reg; nn: Byte }
  | { op: 'seReg'; x: Reg; y: Reg }
  | { op: 'ldImm'; x: Reg; nn: Byte }
  | { op: 'addImm'; x: Reg; nn: Byte }
  | { op: 'ldReg'; x: Reg; y: Reg }
  | { op: 'or'; x: Reg; y: Reg }
  | { op: 'and'; x: Reg; y: Reg }
  | { op: 'xor'; x: Reg; y: Reg }
  | { op: 'addReg'; x: Reg; y: Reg }
  | { op: 'sub'; x: Reg; y: Reg }
  | { op: 'shr'; x: Reg; y: Reg }
  | { op: 'subn'; x: Reg; y: Reg }
  | { op: 'shl'; x: Reg; y: Reg }
  | { op: 'sneReg'; x: Reg; y: Reg }
  | { op: 'ldI'; addr: Addr }
  | { op: 'jpV0'; addr: Addr }
  | { op: 'rnd'; x: Reg; nn: Byte }
  | { op: 'drw'; x: Reg; y: Reg; n: number }
  | { op: 'skp'; x: Reg }
  | { op: 'sknp'; x: Reg }
  | { op: 'ldVxDt'; x: Reg }
  | { op: 'ldVxKey'; x: Reg }
  | { op: 'ldDtVx'; x: Reg }
  | { op: 'ldStVx'; x: Reg }
  | { op: 'addI'; x: Reg }
  | { op: 'ldFont'; x: Reg }
  | { op: 'bcd'; x: Reg }
  | { op: 'store'; x: Reg }
  | { op: 'load'; x: Reg };
