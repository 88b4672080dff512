export const SCREEN_WIDTH = 64;
export const SCREEN_HEIGHT = 32;

export const DEFAULT_DECAY = 0.85;
export const MAX_DECAY = 0.99;
// Intensities below this snap to exactly zero so the afterglow terminates
export const INTENSITY_EPSILON = 1e-6;

export function clampDecay(d: number): number {
  if (Number.isNaN(d)) throw new RangeError('Decay factor must be a number');
  if (d <= 0) return 0;
  if (d >= MAX_DECAY) return MAX_DECAY;
  return d;
}

// 64x32 monochrome display. `pixels` is the binary grid the draw instruction
// XORs into; `intensity` is the phosphor model advanced once per frame from the
// current binary grid and its own previous value.
export class Framebuffer {
  private pixels = new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT);
  private intensity = new Float64Array(SCREEN_WIDTH * SCREEN_HEIGHT);
  private decay: number;
  private _dirty = false;
  public frame = 0;

  constructor(decayFactor: number = DEFAULT_DECAY) {
    this.decay = clampDecay(decayFactor);
  }

  get decayFactor(): number { return this.decay; }

  // Only the rate going forward changes; intensities are left alone
  setDecayFactor(d: number): void {
    this.decay = clampDecay(d);
  }

  reset(): void {
    this.pixels.fill(0);
    this.intensity.fill(0);
    this._dirty = false;
    this.frame = 0;
  }

  clear(): void {
    this.pixels.fill(0);
    this._dirty = true;
  }

  // XOR one sprite row per byte at (x, y), wrapping on both axes.
  // Returns true when a lit pixel was turned off.
  drawSprite(x: number, y: number, rows: Uint8Array): boolean {
    let collision = false;
    const x0 = x % SCREEN_WIDTH;
    const y0 = y % SCREEN_HEIGHT;
    for (let row = 0; row < rows.length; row++) {
      const bits = rows[row];
      if (bits === 0) continue;
      const py = (y0 + row) % SCREEN_HEIGHT;
      for (let col = 0; col < 8; col++) {
        if ((bits & (0x80 >> col)) === 0) continue;
        const idx = py * SCREEN_WIDTH + ((x0 + col) % SCREEN_WIDTH);
        if (this.pixels[idx]) collision = true;
        this.pixels[idx] ^= 1;
      }
    }
    this._dirty = true;
    return collision;
  }

  advanceFrame(): void {
    const px = this.pixels;
    const out = this.intensity;
    const d = this.decay;
    for (let i = 0; i < px.length; i++) {
      if (px[i]) {
        out[i] = 1;
      } else if (out[i] !== 0) {
        const v = out[i] * d;
        out[i] = v < INTENSITY_EPSILON ? 0 : v;
      }
    }
    this.frame++;
  }

  getPixel(x: number, y: number): 0 | 1 {
    return this.pixels[this.index(x, y)] ? 1 : 0;
  }

  getIntensity(x: number, y: number): number {
    return this.intensity[this.index(x, y)];
  }

  // Renderer-facing grid, row-major. Read-only view; do not mutate.
  intensities(): Float64Array { return this.intensity; }

  // Binary grid, row-major
  getPixels(): Uint8Array { return this.pixels; }

  litCount(): number {
    let n = 0;
    for (let i = 0; i < this.pixels.length; i++) n += this.pixels[i];
    return n;
  }

  get dirty(): boolean { return this._dirty; }

  // Returns whether anything was drawn since the last call
  consumeDirty(): boolean {
    const d = this._dirty;
    this._dirty = false;
    return d;
  }

  private index(x: number, y: number): number {
    if (x < 0 || x >= SCREEN_WIDTH || y < 0 || y >= SCREEN_HEIGHT) {
      throw new RangeError(`Pixel (${x}, ${y}) outside ${SCREEN_WIDTH}x${SCREEN_HEIGHT}`);
    }
    return y * SCREEN_WIDTH + x;
  }
}
