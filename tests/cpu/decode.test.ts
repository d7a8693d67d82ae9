import { describe, it, expect } from 'vitest';
import { decode, tryDecode } from '@core/cpu/decode';
import { DecodeFault } from '@core/system/errors';
import { machineWithProgram } from '../helpers/cpuh';

describe('Instruction decoding', () => {
  it('splits nibbles and bytes out of the word', () => {
    expect(tryDecode(0xD125)).toEqual({ op: 'drw', x: 1, y: 2, n: 5 });
    expect(tryDecode(0x7AFF)).toEqual({ op: 'add_imm', x: 0xA, nn: 0xFF });
    expect(tryDecode(0xB3C0)).toEqual({ op: 'jp_v0', addr: 0x3C0 });
    expect(tryDecode(0x8AB6)).toEqual({ op: 'alu', fn: 'shr', x: 0xA, y: 0xB });
    expect(tryDecode(0xF733)).toEqual({ op: 'bcd', x: 7 });
  });

  it('rejects every word outside the instruction table', () => {
    let unknown = 0;
    for (let w = 0; w <= 0xFFFF; w++) if (tryDecode(w) === null) unknown++;
    // 0NNN: 4094, 5XYn: 3840, 8XYn: 1792, 9XYn: 3840, EXnn: 4064, FXnn: 3952
    expect(unknown).toBe(21582);
  });

  it.each([0x0000, 0x0123, 0x00E1, 0x5121, 0x8128, 0x812F, 0x9ABF, 0xE100, 0xE19F, 0xF000, 0xF130, 0xFF75])(
    'word $%s is a decode fault',
    (word) => {
      expect(() => decode(word, 0x300)).toThrow(DecodeFault);
    },
  );

  it('reports the word and its address and halts the machine', () => {
    const { sys, cpu } = machineWithProgram([0x6001, 0x8ABF]);
    sys.stepInstruction();
    let caught: unknown = null;
    try { sys.stepInstruction(); } catch (e) { caught = e; }
    if (!(caught instanceof DecodeFault)) throw new Error('expected DecodeFault');
    const fault = caught;
    expect(fault.opcode).toBe(0x8ABF);
    expect(fault.pc).toBe(0x202);
    expect(fault.kind).toBe('decode');
    expect(fault.message).toBe('Unknown instruction at $0202 (word $8ABF)');
    expect(sys.halted).toBe(true);
    expect(sys.fault).toBe(fault);

    // Further steps make no progress
    const pc = cpu.state.pc;
    sys.stepInstruction();
    expect(cpu.state.pc).toBe(pc);
    expect(cpu.state.steps).toBe(1);
  });
});
