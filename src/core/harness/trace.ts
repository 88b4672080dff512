import type { Chip8System } from '@core/system/system';
import { Chip8Fault } from '@core/cpu/faults';
import { disasmAt, formatLine } from '@utils/disasm';

const h = (v: number, w: number) => v.toString(16).toUpperCase().padStart(w, '0');

// Register snapshot printed beside each listed instruction
export function formatRegisters(sys: Chip8System): string {
  const s = sys.cpu.state;
  const regs = Array.from(s.v, (v) => h(v, 2)).join(' ');
  return `I:${h(s.i, 3)} SP:${s.sp} DT:${h(sys.timers.delay, 2)} V:${regs}`;
}

// Steps up to `max` instructions, one listing line each (state before the step).
// A fault ends the trace with a `[fault]` line.
export function traceSystem(sys: Chip8System, max: number): string[] {
  const out: string[] = [];
  const read = (a: number) => sys.memory.read(a);
  for (let n = 0; n < max; n++) {
    const pc = sys.cpu.state.pc;
    let listing: string;
    try {
      listing = formatLine(disasmAt(read, pc));
    } catch (e) {
      if (!(e instanceof Chip8Fault)) throw e;
      // PC too close to the end for a whole word; the step reports the fault
      listing = `${h(pc, 3)}  ????  ??`;
    }
    out.push(`${listing.padEnd(30)} ${formatRegisters(sys)}`);
    const fault = sys.stepInstruction();
    if (fault) {
      out.push(`[fault] ${fault.kind}: ${fault.message}`);
      break;
    }
  }
  return out;
}
