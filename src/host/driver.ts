import type { Chip8System } from '@core/system/system';
import { FrameScheduler, type FrameResult, type SchedulerOptions } from '@core/system/scheduler';
import type { FrameSink, KeySource, ToneSink } from './types';

export interface HostCollaborators {
  video?: FrameSink;
  audio?: ToneSink;
  input?: KeySource;
}

// One host frame: input poll, CPU batch + timer, present, tone edge
export class HostDriver {
  readonly scheduler: FrameScheduler;
  private toneOn = false;

  constructor(private sys: Chip8System, private io: HostCollaborators = {}, opts: SchedulerOptions = {}) {
    this.scheduler = new FrameScheduler(sys, opts);
  }

  frame(elapsedMs: number): FrameResult {
    this.io.input?.poll(this.sys.keypad);
    const res = this.scheduler.runFrame(elapsedMs);
    this.io.video?.present(this.sys.frame());
    const on = this.sys.soundActive;
    if (on !== this.toneOn) {
      this.toneOn = on;
      this.io.audio?.setTone(on);
    }
    return res;
  }
}
