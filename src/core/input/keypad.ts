export type Key = number; // 0x0..0xF

export const KEY_COUNT = 16;

// Hex keypad as a 16-bit mask, bit n = key n held. Written by the host input
// layer, only read by the engine.
export class Keypad {
  private state = 0;

  setKey(key: Key, down: boolean): void {
    const bit = 1 << (key & 0x0F);
    this.state = down ? (this.state | bit) : (this.state & ~bit & 0xFFFF);
  }

  isDown(key: Key): boolean {
    return (this.state & (1 << (key & 0x0F))) !== 0;
  }

  // Lowest-numbered held key, or null
  firstDown(): Key | null {
    if (this.state === 0) return null;
    for (let k = 0; k < KEY_COUNT; k++) {
      if (this.state & (1 << k)) return k;
    }
    return null;
  }

  get mask(): number { return this.state; }

  reset(): void { this.state = 0; }
}
