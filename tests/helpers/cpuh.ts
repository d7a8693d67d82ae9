import { Chip8System, type SystemOptions } from '@core/system/system';

// Big-endian bytes for a list of 16-bit instruction words
export function wordsToBytes(words: number[]): Uint8Array {
  const out = new Uint8Array(words.length * 2);
  words.forEach((w, n) => {
    out[n * 2] = (w >> 8) & 0xFF;
    out[n * 2 + 1] = w & 0xFF;
  });
  return out;
}

export function machineWithProgram(words: number[], opts: SystemOptions = {}) {
  const sys = new Chip8System(wordsToBytes(words), opts);
  return { sys, cpu: sys.cpu, regs: sys.cpu.regs, bus: sys.bus };
}

export function stepN(sys: Chip8System, n: number): void {
  for (let i = 0; i < n; i++) sys.stepInstruction();
}
