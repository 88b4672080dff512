import fs from 'node:fs';
import path from 'node:path';
import { PNG } from 'pngjs';
import { SCREEN_HEIGHT, SCREEN_WIDTH } from '@core/display/framebuffer';
import { DEFAULT_PALETTE, renderRgba } from '@host/palette';
import type { Palette } from '@host/palette';

export const encodePng = (grid: ArrayLike<number>, scale = 4, palette: Palette = DEFAULT_PALETTE): Buffer => {
  const png = new PNG({ width: SCREEN_WIDTH * scale, height: SCREEN_HEIGHT * scale });
  renderRgba(grid, png.data, scale, palette);
  return PNG.sync.write(png);
};

export const writePng = async (outPath: string, grid: ArrayLike<number>, scale = 4, palette: Palette = DEFAULT_PALETTE): Promise<void> => {
  const png = new PNG({ width: SCREEN_WIDTH * scale, height: SCREEN_HEIGHT * scale });
  renderRgba(grid, png.data, scale, palette);
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  const stream = fs.createWriteStream(outPath);
  await new Promise<void>((resolve, reject) => {
    stream.on('finish', () => resolve());
    stream.on('error', (e) => reject(e));
    png.pack().pipe(stream);
  });
};
