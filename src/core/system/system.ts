import { Memory } from '@core/bus/memory';
import { CPU } from '@core/cpu/cpu';
import { PROGRAM_CAPACITY, type RandomSource } from '@core/cpu/types';
import { Display, type Frame } from '@core/video/display';
import { Keypad } from '@core/input/keypad';
import { TimerTicker } from '@core/timer/timers';
import { LoadFault, isMachineFault, type MachineFault } from './errors';
import { debugLog } from '@utils/log';
import { hex4 } from '@utils/hex';

export interface SystemOptions {
  // Byte source for CXNN; defaults to Math.random
  random?: RandomSource;
}

/**
 * One running machine: memory with the font and program loaded, registers,
 * stack, display, keypad and timers. The host drives it through
 * stepInstruction() and tickTimers().
 */
export class Chip8System {
  readonly bus = new Memory();
  readonly display = new Display();
  readonly keypad = new Keypad();
  readonly cpu: CPU;
  readonly timers: TimerTicker;
  private readonly image: Uint8Array;

  constructor(program: Uint8Array, opts: SystemOptions = {}) {
    if (program.length > PROGRAM_CAPACITY) throw new LoadFault(program.length, PROGRAM_CAPACITY);
    this.image = program.slice();
    this.cpu = new CPU(this.bus, this.display, this.keypad, opts.random);
    this.timers = new TimerTicker(this.cpu.regs);
    this.bus.loadProgram(this.image);
    debugLog('load', `${this.image.length} bytes at $0200`);
  }

  // Back to the power-on state with the same program image
  reset(): void {
    this.bus.reset();
    this.bus.loadProgram(this.image);
    this.display.clear();
    this.keypad.releaseAll();
    this.cpu.reset();
    this.timers.ticks = 0;
  }

  stepInstruction(): void {
    try {
      this.cpu.step();
    } catch (e) {
      if (isMachineFault(e)) debugLog('fault', `${e.message} steps=${this.cpu.state.steps}`);
      throw e;
    }
  }

  tickTimers(): void {
    this.timers.tick();
  }

  get fault(): MachineFault | null { return this.cpu.fault; }
  get halted(): boolean { return this.cpu.halted; }
  get awaitingKey(): boolean { return this.cpu.state.awaitingKey !== null; }
  get soundActive(): boolean { return this.timers.soundActive; }

  frame(): Frame {
    return this.display.snapshot();
  }

  describe(): string {
    const s = this.cpu.state;
    const v = Array.from(s.v, (b, n) => `V${n.toString(16).toUpperCase()}=${b.toString(16).toUpperCase().padStart(2, '0')}`).join(' ');
    return `PC=$${hex4(s.pc)} I=$${hex4(s.i)} DT=${s.dt} ST=${s.st} SP=${this.cpu.stack.depth} ${v}`;
  }
}
