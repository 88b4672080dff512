import { SCREEN_HEIGHT, SCREEN_WIDTH } from '@core/display/framebuffer';

export type RGB = [number, number, number];

export interface Palette {
  background: RGB;
  foreground: RGB;
}

// Phosphor green on near-black
export const DEFAULT_PALETTE: Palette = {
  background: [16, 16, 16],
  foreground: [51, 255, 102],
};

const lerp = (a: number, b: number, t: number) => Math.round(a + (b - a) * t);

export const intensityToRgb = (intensity: number, p: Palette = DEFAULT_PALETTE): RGB => {
  const t = intensity <= 0 ? 0 : intensity >= 1 ? 1 : intensity;
  return [
    lerp(p.background[0], p.foreground[0], t),
    lerp(p.background[1], p.foreground[1], t),
    lerp(p.background[2], p.foreground[2], t),
  ];
};

// Expand the 64x32 intensity grid into an RGBA buffer `scale` times larger.
// `out` may be a canvas ImageData buffer or a PNG data buffer.
export const renderRgba = (
  grid: ArrayLike<number>,
  out: Uint8Array | Uint8ClampedArray,
  scale = 1,
  palette: Palette = DEFAULT_PALETTE,
): void => {
  const W = SCREEN_WIDTH * scale;
  for (let y = 0; y < SCREEN_HEIGHT; y++) {
    for (let x = 0; x < SCREEN_WIDTH; x++) {
      const [r, g, b] = intensityToRgb(grid[y * SCREEN_WIDTH + x], palette);
      for (let dy = 0; dy < scale; dy++) {
        const oy = (y * scale + dy) * W;
        for (let dx = 0; dx < scale; dx++) {
          const o = (oy + (x * scale + dx)) << 2;
          out[o + 0] = r;
          out[o + 1] = g;
          out[o + 2] = b;
          out[o + 3] = 255;
        }
      }
    }
  }
};
