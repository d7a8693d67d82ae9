import { ADDRESS_MASK, type CPUState, type RandomSource, type Word } from './types';
import { decode, type AluOp, type Instruction } from './decode';
import { RegisterFile } from './registers';
import { CallStack } from './stack';
import type { Memory } from '@core/bus/memory';
import type { Display } from '@core/video/display';
import type { Keypad } from '@core/input/keypad';
import { glyphAddress } from '@core/font/font';
import { StackFault, isMachineFault, type MachineFault } from '@core/system/errors';

const defaultRandom: RandomSource = () => Math.floor(Math.random() * 256) & 0xFF;

export class CPU {
  readonly regs = new RegisterFile();
  readonly stack = new CallStack();
  // First fatal fault; once set the CPU no longer makes progress
  private _fault: MachineFault | null = null;

  constructor(
    private bus: Memory,
    private display: Display,
    private keypad: Keypad,
    private readonly random: RandomSource = defaultRandom,
  ) {}

  get state(): CPUState { return this.regs.state; }
  get fault(): MachineFault | null { return this._fault; }
  get halted(): boolean { return this._fault !== null; }

  reset(): void {
    this.regs.reset();
    this.stack.reset();
    this.keypad.disarm();
    this._fault = null;
  }

  step(): void {
    if (this._fault) return;
    const s = this.regs.state;

    // FX0A pending: hold PC until a key goes down, then store it and resume next step
    if (s.awaitingKey !== null) {
      const key = this.keypad.takePress();
      if (key === null) return;
      this.regs.set(s.awaitingKey, key);
      s.awaitingKey = null;
      s.steps++;
      return;
    }

    const pc = this.regs.pc;
    const word = this.bus.read16(pc);
    this.regs.pc = (pc + 2) & ADDRESS_MASK;
    try {
      this.execute(decode(word, pc), word, pc);
    } catch (e) {
      if (isMachineFault(e)) this._fault = e;
      throw e;
    }
    s.steps++;
  }

  private skipIf(cond: boolean): void {
    if (cond) this.regs.pc = (this.regs.pc + 2) & ADDRESS_MASK;
  }

  private execute(ins: Instruction, word: Word, pc: Word): void {
    const r = this.regs;
    switch (ins.op) {
      case 'cls': this.display.clear(); break;
      case 'ret': {
        const addr = this.stack.pop();
        if (addr === null) throw new StackFault('underflow', word, pc);
        r.pc = addr;
        break;
      }
      case 'jp': r.pc = ins.addr; break;
      case 'call':
        if (!this.stack.push(r.pc)) throw new StackFault('overflow', word, pc);
        r.pc = ins.addr;
        break;
      case 'se_imm': this.skipIf(r.get(ins.x) === ins.nn); break;
      case 'sne_imm': this.skipIf(r.get(ins.x) !== ins.nn); break;
      case 'se_reg': this.skipIf(r.get(ins.x) === r.get(ins.y)); break;
      case 'sne_reg': this.skipIf(r.get(ins.x) !== r.get(ins.y)); break;
      case 'ld_imm': r.set(ins.x, ins.nn); break;
      case 'add_imm': r.set(ins.x, r.get(ins.x) + ins.nn); break; // VF untouched
      case 'alu': this.alu(ins.fn, ins.x, ins.y); break;
      case 'ld_i': r.i = ins.addr; break;
      case 'jp_v0': r.pc = (ins.addr + r.get(0)) & ADDRESS_MASK; break;
      case 'rnd': r.set(ins.x, this.random() & ins.nn); break;
      case 'drw': {
        // Coordinates are read before VF is overwritten
        const x = r.get(ins.x);
        const y = r.get(ins.y);
        const rows = this.bus.readBlock(r.i, ins.n);
        r.setFlag(this.display.drawSprite(x, y, rows));
        break;
      }
      case 'skp': this.skipIf(this.keypad.isPressed(r.get(ins.x))); break;
      case 'sknp': this.skipIf(!this.keypad.isPressed(r.get(ins.x))); break;
      case 'ld_vx_dt': r.set(ins.x, r.dt); break;
      case 'ld_vx_key':
        r.state.awaitingKey = ins.x;
        this.keypad.armWait();
        break;
      case 'ld_dt_vx': r.dt = r.get(ins.x); break;
      case 'ld_st_vx': r.st = r.get(ins.x); break;
      case 'add_i': r.i = r.i + r.get(ins.x); break;
      case 'ld_font': r.i = glyphAddress(r.get(ins.x)); break;
      case 'bcd': {
        const v = r.get(ins.x);
        this.bus.write(r.i, Math.floor(v / 100));
        this.bus.write(r.i + 1, Math.floor(v / 10) % 10);
        this.bus.write(r.i + 2, v % 10);
        break;
      }
      case 'store':
        for (let k = 0; k <= ins.x; k++) this.bus.write(r.i + k, r.get(k));
        r.i = r.i + ins.x + 1;
        break;
      case 'load':
        for (let k = 0; k <= ins.x; k++) r.set(k, this.bus.read(r.i + k));
        r.i = r.i + ins.x + 1;
        break;
    }
  }

  // 8XYn family. The flag is written last so that X = F ends up holding the flag.
  private alu(fn: AluOp, x: number, y: number): void {
    const r = this.regs;
    const vx = r.get(x);
    const vy = r.get(y);
    switch (fn) {
      case 'mov': r.set(x, vy); break;
      case 'or': r.set(x, vx | vy); break;
      case 'and': r.set(x, vx & vy); break;
      case 'xor': r.set(x, vx ^ vy); break;
      case 'add': r.set(x, vx + vy); r.setFlag(vx + vy > 0xFF); break;
      case 'sub': r.set(x, vx - vy); r.setFlag(vx >= vy); break;
      case 'shr': r.set(x, vy >> 1); r.setFlag((vy & 0x01) !== 0); break;
      case 'subn': r.set(x, vy - vx); r.setFlag(vy >= vx); break;
      case 'shl': r.set(x, vy << 1); r.setFlag((vy & 0x80) !== 0); break;
    }
  }
}
