import { Chip8System } from '@core/system/system';
import { FrameScheduler } from '@core/system/scheduler';
import { TIMER_INTERVAL_MS } from '@core/timer/timers';
import { isMachineFault } from '@core/system/errors';
import type { Keypad } from '@core/input/keypad';
import type { RandomSource } from '@core/cpu/types';
import type { Frame } from '@core/video/display';

export interface RunResult {
  frames: number;
  steps: number;
  // loop: the program jumped onto itself; wait: stuck in FX0A with no input coming
  reason: 'fault' | 'loop' | 'wait' | 'timeout';
  message?: string;
  frame: Frame;
  system: Chip8System;
}

export interface RunOpts {
  maxFrames: number;
  stepsPerFrame?: number;
  random?: RandomSource;
  // Called before each frame so a script can press and release keys
  input?: (frame: number, keypad: Keypad) => void;
}

// Run a program image with simulated 60 Hz frames until it faults, parks itself or runs out of frames
export function runProgram(image: Uint8Array, opts: RunOpts): RunResult {
  const sys = new Chip8System(image, { random: opts.random });
  const sched = new FrameScheduler(sys, { stepsPerFrame: opts.stepsPerFrame });
  const done = (reason: RunResult['reason'], message?: string): RunResult => ({
    frames: sched.frames,
    steps: sys.cpu.state.steps,
    reason,
    message,
    frame: sys.frame(),
    system: sys,
  });

  while (sched.frames < opts.maxFrames) {
    opts.input?.(sched.frames, sys.keypad);
    const pcBefore = sys.cpu.state.pc;
    try {
      sched.runFrame(TIMER_INTERVAL_MS);
    } catch (e) {
      if (isMachineFault(e)) return done('fault', e.message);
      throw e;
    }
    const s = sys.cpu.state;
    if (s.awaitingKey === null && s.pc === pcBefore && isSelfJump(sys)) return done('loop');
    if (s.awaitingKey !== null && !opts.input) return done('wait');
  }
  return done('timeout');
}

// 1NNN whose target is its own address
const isSelfJump = (sys: Chip8System): boolean => {
  const pc = sys.cpu.state.pc;
  const word = sys.bus.read16(pc);
  return (word & 0xF000) === 0x1000 && (word & 0x0FFF) === pc;
};
