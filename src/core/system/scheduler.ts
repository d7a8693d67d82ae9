import type { Chip8System } from './system';
import { TIMER_INTERVAL_MS } from '@core/timer/timers';

export interface SchedulerOptions {
  // CPU steps per host frame; the step itself has no intrinsic duration
  stepsPerFrame?: number;
  timerIntervalMs?: number;
}

export interface FrameResult {
  steps: number;
  timerTicked: boolean;
}

export const DEFAULT_STEPS_PER_FRAME = 10;

/**
 * Canonical host loop body. Runs a fixed batch of CPU steps, then lets the
 * timers advance by wall-clock time through a fixed-timestep accumulator:
 * at most one tick per frame, with at most one interval of backlog carried.
 */
export class FrameScheduler {
  readonly stepsPerFrame: number;
  readonly timerIntervalMs: number;
  private accMs = 0;
  frames = 0;

  constructor(private sys: Chip8System, opts: SchedulerOptions = {}) {
    this.stepsPerFrame = Math.max(1, Math.floor(opts.stepsPerFrame ?? DEFAULT_STEPS_PER_FRAME));
    this.timerIntervalMs = opts.timerIntervalMs ?? TIMER_INTERVAL_MS;
  }

  runFrame(elapsedMs: number): FrameResult {
    let steps = 0;
    for (; steps < this.stepsPerFrame; steps++) {
      if (this.sys.halted) break;
      this.sys.stepInstruction();
    }
    this.frames++;
    return { steps, timerTicked: this.advanceTime(elapsedMs) };
  }

  private advanceTime(elapsedMs: number): boolean {
    if (Number.isFinite(elapsedMs) && elapsedMs > 0) this.accMs += elapsedMs;
    if (this.accMs < this.timerIntervalMs) return false;
    this.sys.tickTimers();
    this.accMs = Math.min(this.accMs - this.timerIntervalMs, this.timerIntervalMs);
    return true;
  }

  get pendingMs(): number { return this.accMs; }
}
