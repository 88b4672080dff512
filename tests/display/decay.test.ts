import { describe, it, expect } from 'vitest';
import { Framebuffer, INTENSITY_EPSILON, MAX_DECAY, clampDecay } from '@core/display/framebuffer';

const dot = Uint8Array.of(0x80); // single pixel at the sprite origin

describe('Phosphor decay model', () => {
  it('lit pixels read full intensity on the next frame', () => {
    const fb = new Framebuffer(0.5);
    fb.drawSprite(3, 4, dot);
    expect(fb.getIntensity(3, 4)).toBe(0);
    fb.advanceFrame();
    expect(fb.getIntensity(3, 4)).toBe(1);
  });

  it('an unlit pixel decays as d^n', () => {
    const fb = new Framebuffer(0.5);
    fb.drawSprite(0, 0, dot);
    fb.advanceFrame();
    fb.drawSprite(0, 0, dot); // erase
    for (let n = 1; n <= 6; n++) {
      fb.advanceFrame();
      expect(fb.getIntensity(0, 0)).toBe(0.5 ** n);
    }
  });

  it('decay is monotone, never negative, and reaches exactly zero', () => {
    const d = 0.8;
    const fb = new Framebuffer(d);
    fb.drawSprite(10, 10, dot);
    fb.advanceFrame();
    fb.drawSprite(10, 10, dot);
    let prev = 1;
    let n = 0;
    while (fb.getIntensity(10, 10) > 0 && n < 1000) {
      fb.advanceFrame();
      n++;
      const v = fb.getIntensity(10, 10);
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(prev);
      if (v > 0) expect(v).toBeCloseTo(d ** n, 12);
      prev = v;
    }
    expect(fb.getIntensity(10, 10)).toBe(0);
    // 0.8^n first drops below 1e-6 at n = 62
    expect(n).toBe(Math.ceil(Math.log(INTENSITY_EPSILON) / Math.log(d)));
  });

  it('re-lighting a fading pixel snaps it back to full', () => {
    const fb = new Framebuffer(0.5);
    fb.drawSprite(1, 1, dot);
    fb.advanceFrame();
    fb.drawSprite(1, 1, dot);
    fb.advanceFrame();
    expect(fb.getIntensity(1, 1)).toBe(0.5);
    fb.drawSprite(1, 1, dot);
    fb.advanceFrame();
    expect(fb.getIntensity(1, 1)).toBe(1);
  });

  it('a flickering sprite stays visible through the erase frame', () => {
    const fb = new Framebuffer(0.85);
    const tally: number[] = [];
    for (let f = 0; f < 4; f++) {
      fb.drawSprite(5, 5, dot); // toggles on/off each frame
      fb.advanceFrame();
      tally.push(fb.getIntensity(5, 5));
    }
    expect(tally[0]).toBe(1);
    expect(tally[1]).toBeCloseTo(0.85, 12);
    expect(tally[2]).toBe(1);
  });

  it('decay factor 0 gives the raw on/off image', () => {
    const fb = new Framebuffer(0);
    fb.drawSprite(0, 0, dot);
    fb.advanceFrame();
    fb.drawSprite(0, 0, dot);
    fb.advanceFrame();
    expect(fb.getIntensity(0, 0)).toBe(0);
  });

  it('changing the factor mid-fade keeps the current intensity', () => {
    const fb = new Framebuffer(0.5);
    fb.drawSprite(0, 0, dot);
    fb.advanceFrame();
    fb.drawSprite(0, 0, dot);
    fb.advanceFrame();
    fb.setDecayFactor(0.25);
    expect(fb.getIntensity(0, 0)).toBe(0.5);
    fb.advanceFrame();
    expect(fb.getIntensity(0, 0)).toBe(0.125);
  });

  it('clamps the factor into range', () => {
    expect(clampDecay(-1)).toBe(0);
    expect(clampDecay(1)).toBe(MAX_DECAY);
    expect(clampDecay(7)).toBe(MAX_DECAY);
    expect(clampDecay(0.3)).toBe(0.3);
    expect(() => clampDecay(Number.NaN)).toThrow(RangeError);
  });

  it('tracks drawing through the dirty flag', () => {
    const fb = new Framebuffer();
    expect(fb.consumeDirty()).toBe(false);
    fb.drawSprite(0, 0, dot);
    expect(fb.consumeDirty()).toBe(true);
    expect(fb.consumeDirty()).toBe(false);
    fb.clear();
    expect(fb.dirty).toBe(true);
  });
});
