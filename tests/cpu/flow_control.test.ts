import { describe, it, expect } from 'vitest';
import { systemWithProgram, steps } from '../helpers/chip8h';
import { StackOverflowFault, StackUnderflowFault } from '@core/cpu/faults';

describe('Jumps, calls and skips', () => {
  it('JP and CALL land on the 12-bit target', () => {
    const { sys, cpu } = systemWithProgram([0x1ABC]);
    sys.cpu.step();
    expect(cpu.state.pc).toBe(0xABC);

    const c = systemWithProgram([0x2456]);
    c.cpu.step();
    expect(c.cpu.state.pc).toBe(0x456);
    expect(c.cpu.state.sp).toBe(1);
    expect(c.cpu.state.stack[0]).toBe(0x202);
  });

  it('masks hand-built operands wider than 12 bits', () => {
    const { cpu } = systemWithProgram([]);
    cpu.execute({ op: 'jp', addr: 0xF234 });
    expect(cpu.state.pc).toBe(0x234);
    cpu.execute({ op: 'call', addr: 0x1FFFE });
    expect(cpu.state.pc).toBe(0xFFE);
    cpu.execute({ op: 'ldI', addr: 0xA321 });
    expect(cpu.state.i).toBe(0x321);
  });

  it('RET resumes after the CALL', () => {
    // 200: CALL 206; 202: LD V1,#01; 204: JP 204; 206: LD V0,#07; 208: RET
    const { sys, cpu } = systemWithProgram([0x2206, 0x6101, 0x1204, 0x6007, 0x00EE]);
    steps(sys, 4);
    expect(cpu.state.v[0]).toBe(7);
    expect(cpu.state.v[1]).toBe(1);
    expect(cpu.state.pc).toBe(0x204);
    expect(cpu.state.sp).toBe(0);
  });

  it('BNNN adds V0 and wraps to 12 bits', () => {
    const { sys, cpu } = systemWithProgram([0x60F0, 0xBF20]);
    steps(sys, 2);
    expect(cpu.state.pc).toBe(0x010);
  });

  it('conditional skips advance by one extra instruction', () => {
    const cases: Array<[number, number, number, number]> = [
      // word, V0, V1, expected pc
      [0x3042, 0x42, 0, 0x204],
      [0x3042, 0x41, 0, 0x202],
      [0x4042, 0x41, 0, 0x204],
      [0x4042, 0x42, 0, 0x202],
      [0x5010, 7, 7, 0x204],
      [0x5010, 7, 8, 0x202],
      [0x9010, 7, 8, 0x204],
      [0x9010, 7, 7, 0x202],
    ];
    for (const [word, a, b, pc] of cases) {
      const { sys, cpu } = systemWithProgram([word]);
      cpu.state.v[0] = a;
      cpu.state.v[1] = b;
      sys.cpu.step();
      expect(cpu.state.pc).toBe(pc);
    }
  });
});

describe('Stack boundary', () => {
  it('allows 16 nested calls and faults on the 17th without mutating state', () => {
    // Each word at 0x200+2k calls the next word: 16 calls then a 17th
    const words: number[] = [];
    for (let k = 0; k < 17; k++) words.push(0x2000 | (0x202 + 2 * k));
    const { sys, cpu } = systemWithProgram(words);
    steps(sys, 16);
    expect(cpu.state.sp).toBe(16);
    expect(cpu.state.pc).toBe(0x220);
    expect(() => sys.cpu.step()).toThrow(StackOverflowFault);
    expect(cpu.state.sp).toBe(16);
    expect(cpu.state.pc).toBe(0x220);
  });

  it('faults on RET with an empty stack', () => {
    const { sys, cpu } = systemWithProgram([0x00EE]);
    let caught: unknown = null;
    try { sys.cpu.step(); } catch (e) { caught = e; }
    expect(caught).toBeInstanceOf(StackUnderflowFault);
    if (caught instanceof StackUnderflowFault) expect(caught.pc).toBe(0x200);
    expect(cpu.state.pc).toBe(0x200);
  });
});
