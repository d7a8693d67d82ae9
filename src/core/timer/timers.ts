import type { RegisterFile } from '@core/cpu/registers';

export const TIMER_HZ = 60;
export const TIMER_INTERVAL_MS = 1000 / TIMER_HZ;

// Counts the delay and sound timers down toward zero, one unit per tick
export class TimerTicker {
  ticks = 0;

  constructor(private regs: RegisterFile) {}

  tick(): void {
    const r = this.regs;
    if (r.dt > 0) r.dt = r.dt - 1;
    if (r.st > 0) r.st = r.st - 1;
    this.ticks++;
  }

  get soundActive(): boolean {
    return this.regs.st > 0;
  }
}
