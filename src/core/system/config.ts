import { DEFAULT_DECAY, clampDecay } from '@core/display/framebuffer';
import { getEnv } from '@utils/env';

export interface Chip8Config {
  // Instructions executed per rendered frame (emulation speed)
  cyclesPerFrame: number;
  // Per-frame afterglow multiplier for unlit pixels
  decayFactor: number;
}

export const DEFAULT_CYCLES_PER_FRAME = 10;

export const DEFAULT_CONFIG: Readonly<Chip8Config> = {
  cyclesPerFrame: DEFAULT_CYCLES_PER_FRAME,
  decayFactor: DEFAULT_DECAY,
};

export function validateCyclesPerFrame(n: number): number {
  if (!Number.isInteger(n) || n < 1) throw new RangeError(`cyclesPerFrame must be an integer >= 1 (got ${n})`);
  return n;
}

type EnvReader = (name: string) => string | undefined;

// Explicit overrides win over CHIP8_CYCLES_PER_FRAME / CHIP8_DECAY, which win over defaults
export function resolveConfig(overrides: Partial<Chip8Config> = {}, env: EnvReader = getEnv): Chip8Config {
  let cyclesPerFrame = DEFAULT_CONFIG.cyclesPerFrame;
  let decayFactor = DEFAULT_CONFIG.decayFactor;

  const cyc = env('CHIP8_CYCLES_PER_FRAME');
  if (cyc !== undefined) cyclesPerFrame = parseInt(cyc, 10);
  const dec = env('CHIP8_DECAY');
  if (dec !== undefined) decayFactor = parseFloat(dec);

  if (overrides.cyclesPerFrame !== undefined) cyclesPerFrame = overrides.cyclesPerFrame;
  if (overrides.decayFactor !== undefined) decayFactor = overrides.decayFactor;

  return {
    cyclesPerFrame: validateCyclesPerFrame(cyclesPerFrame),
    decayFactor: clampDecay(decayFactor),
  };
}
