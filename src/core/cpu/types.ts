export type Byte = number; // 0..255
export type Word = number; // 0..65535
export type Nibble = number; // 0..15

// 12-bit address space
export const MEMORY_SIZE = 0x1000;
export const ADDRESS_MASK = 0x0FFF;
export const PROGRAM_START = 0x200;
export const PROGRAM_CAPACITY = MEMORY_SIZE - PROGRAM_START;

export interface CPUState {
  v: Uint8Array; // V0..VF
  i: Word; // index register
  pc: Word;
  dt: Byte; // delay timer
  st: Byte; // sound timer
  // Target register of a pending FX0A, null when running
  awaitingKey: Nibble | null;
  steps: number;
}

export type RandomSource = () => Byte;
