import type { Word } from './types';

export const STACK_DEPTH = 16;

export class CallStack {
  private slots = new Uint16Array(STACK_DEPTH);
  private sp = 0;

  get depth(): number { return this.sp; }

  // false when all slots are taken
  push(addr: Word): boolean {
    if (this.sp >= STACK_DEPTH) return false;
    this.slots[this.sp++] = addr & 0xFFFF;
    return true;
  }

  pop(): Word | null {
    if (this.sp === 0) return null;
    return this.slots[--this.sp];
  }

  // Oldest first
  entries(): Word[] {
    return Array.from(this.slots.subarray(0, this.sp));
  }

  reset(): void {
    this.slots.fill(0);
    this.sp = 0;
  }
}
