import { ADDRESS_MASK, PROGRAM_START, type Byte, type CPUState, type Nibble, type Word } from './types';

export const VF = 0xF;

export const initialState = (): CPUState => ({
  v: new Uint8Array(16),
  i: 0,
  pc: PROGRAM_START,
  dt: 0,
  st: 0,
  awaitingKey: null,
  steps: 0,
});

// Thin accessors over CPUState that keep every register inside its width
export class RegisterFile {
  state: CPUState = initialState();

  reset(): void {
    this.state = initialState();
  }

  get(x: Nibble): Byte { return this.state.v[x & 0xF]; }
  set(x: Nibble, value: number): void { this.state.v[x & 0xF] = value & 0xFF; }
  setFlag(on: boolean): void { this.state.v[VF] = on ? 1 : 0; }

  get i(): Word { return this.state.i; }
  set i(value: number) { this.state.i = value & ADDRESS_MASK; }

  get pc(): Word { return this.state.pc; }
  set pc(value: number) { this.state.pc = value & 0xFFFF; }

  get dt(): Byte { return this.state.dt; }
  set dt(value: number) { this.state.dt = value & 0xFF; }

  get st(): Byte { return this.state.st; }
  set st(value: number) { this.state.st = value & 0xFF; }
}
