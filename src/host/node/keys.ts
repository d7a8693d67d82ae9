import type { Keypad } from '@core/input/keypad';
import type { KeySource } from '@host/types';
import type { KeyPress } from './config';

/**
 * Key input for headless runs. `held` keys stay down from the first poll.
 * Each press goes down on its frame and up again on the next poll, so it
 * reads as a fresh press to a pending FX0A wait.
 */
export class ScriptedKeys implements KeySource {
  private polls = 0;
  private down = new Set<number>();

  constructor(private readonly held: readonly number[], private readonly presses: readonly KeyPress[] = []) {}

  poll(keypad: Keypad): void {
    const frame = this.polls++;
    for (const k of this.down) {
      if (!this.held.includes(k)) keypad.setKey(k, false);
    }
    this.down.clear();
    for (const k of this.held) keypad.setKey(k, true);
    for (const p of this.presses) {
      if (p.frame !== frame) continue;
      keypad.setKey(p.key, true);
      this.down.add(p.key);
    }
  }
}
