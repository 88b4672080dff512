import { Chip8System, FRAME_MS } from '@core/system/system';
import type { SystemOptions } from '@core/system/system';
import type { Chip8Fault } from '@core/cpu/faults';
import { crc32 } from '@utils/crc32';

export type FaultPolicy = 'halt' | 'skip';

// Keys held from a given frame onward; later entries for the same key win
export interface KeyEvent {
  frame: number;
  key: number;
  down: boolean;
}

export interface RunOptions extends SystemOptions {
  frames: number;
  onFault?: FaultPolicy;
  keys?: KeyEvent[];
}

export interface RunResult {
  frames: number;
  cycles: number;
  reason: 'done' | 'fault';
  faults: Chip8Fault[];
  soundFrames: number; // frames that ended with the sound timer running
  crc: number; // CRC32 of the binary grid after the last frame
}

export function runRom(buffer: Uint8Array, opts: RunOptions): RunResult {
  const sys = new Chip8System(opts);
  sys.loadRom(buffer);
  return runSystem(sys, opts);
}

export function runSystem(sys: Chip8System, opts: RunOptions): RunResult {
  const policy = opts.onFault ?? 'halt';
  const keys = [...(opts.keys ?? [])].sort((a, b) => a.frame - b.frame);
  const faults: Chip8Fault[] = [];
  let soundFrames = 0;
  let frame = 0;
  let k = 0;
  for (; frame < opts.frames; frame++) {
    while (k < keys.length && keys[k].frame <= frame) {
      sys.keypad.setKey(keys[k].key, keys[k].down);
      k++;
    }
    const res = sys.runFrame(FRAME_MS);
    if (sys.soundActive) soundFrames++;
    if (res.fault) {
      faults.push(res.fault);
      if (policy === 'halt') { frame++; break; }
      sys.skipFaultedInstruction();
    }
  }
  return {
    frames: frame,
    cycles: sys.cpu.state.cycles,
    reason: policy === 'halt' && faults.length > 0 ? 'fault' : 'done',
    faults,
    soundFrames,
    crc: crc32(sys.framebuffer.getPixels()),
  };
}
