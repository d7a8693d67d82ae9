import type { Nibble } from '@core/cpu/types';

export const KEY_COUNT = 16;

// 16-key hex keypad. Only the host writes key state; the CPU reads it.
export class Keypad {
  private pressed = new Array<boolean>(KEY_COUNT).fill(false);
  private armed = false;
  // Keys that went up->down while armed, in arrival order
  private edges: Nibble[] = [];

  setKey(key: Nibble, down: boolean): void {
    const k = key & 0x0F;
    if (down && !this.pressed[k] && this.armed) this.edges.push(k);
    this.pressed[k] = down;
  }

  isPressed(key: Nibble): boolean {
    return this.pressed[key & 0x0F];
  }

  releaseAll(): void {
    this.pressed.fill(false);
  }

  // Start watching for a fresh press; keys already held do not count
  armWait(): void {
    this.armed = true;
    this.edges = [];
  }

  get waiting(): boolean { return this.armed; }

  // First key pressed since armWait(); disarms once a key is reported
  takePress(): Nibble | null {
    const key = this.edges.shift();
    if (key === undefined) return null;
    this.armed = false;
    this.edges = [];
    return key;
  }

  disarm(): void {
    this.armed = false;
    this.edges = [];
  }

  // Bitmask of held keys, bit n = key n
  read(): number {
    let v = 0;
    for (let i = 0; i < KEY_COUNT; i++) if (this.pressed[i]) v |= 1 << i;
    return v;
  }
}
