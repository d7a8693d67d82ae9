import type { Byte, Nibble, Word } from './types';
import { DecodeFault } from '@core/system/errors';

export type AluOp = 'mov' | 'or' | 'and' | 'xor' | 'add' | 'sub' | 'shr' | 'subn' | 'shl';

const ALU_OPS: Record<number, AluOp> = {
  0x0: 'mov', 0x1: 'or', 0x2: 'and', 0x3: 'xor', 0x4: 'add',
  0x5: 'sub', 0x6: 'shr', 0x7: 'subn', 0xE: 'shl',
};

export type Instruction =
  | { op: 'cls' }
  | { op: 'ret' }
  | { op: 'jp'; addr: Word }
  | { op: 'call'; addr: Word }
  | { op: 'se_imm'; x: Nibble; nn: Byte }
  | { op: 'sne_imm'; x: Nibble; nn: Byte }
  | { op: 'se_reg'; x: Nibble; y: Nibble }
  | { op: 'sne_reg'; x: Nibble; y: Nibble }
  | { op: 'ld_imm'; x: Nibble; nn: Byte }
  | { op: 'add_imm'; x: Nibble; nn: Byte }
  | { op: 'alu'; fn: AluOp; x: Nibble; y: Nibble }
  | { op: 'ld_i'; addr: Word }
  | { op: 'jp_v0'; addr: Word }
  | { op: 'rnd'; x: Nibble; nn: Byte }
  | { op: 'drw'; x: Nibble; y: Nibble; n: Nibble }
  | { op: 'skp'; x: Nibble }
  | { op: 'sknp'; x: Nibble }
  | { op: 'ld_vx_dt'; x: Nibble }
  | { op: 'ld_vx_key'; x: Nibble }
  | { op: 'ld_dt_vx'; x: Nibble }
  | { op: 'ld_st_vx'; x: Nibble }
  | { op: 'add_i'; x: Nibble }
  | { op: 'ld_font'; x: Nibble }
  | { op: 'bcd'; x: Nibble }
  | { op: 'store'; x: Nibble }
  | { op: 'load'; x: Nibble };

export type Opcode = Instruction['op'];

// Decode a word; null when it matches no known pattern
export function tryDecode(word: Word): Instruction | null {
  const x = (word >> 8) & 0xF;
  const y = (word >> 4) & 0xF;
  const n = word & 0xF;
  const nn = word & 0xFF;
  const addr = word & 0xFFF;

  switch (word >> 12) {
    case 0x0:
      if (word === 0x00E0) return { op: 'cls' };
      if (word === 0x00EE) return { op: 'ret' };
      return null; // 0NNN machine-code calls are not supported
    case 0x1: return { op: 'jp', addr };
    case 0x2: return { op: 'call', addr };
    case 0x3: return { op: 'se_imm', x, nn };
    case 0x4: return { op: 'sne_imm', x, nn };
    case 0x5: return n === 0 ? { op: 'se_reg', x, y } : null;
    case 0x6: return { op: 'ld_imm', x, nn };
    case 0x7: return { op: 'add_imm', x, nn };
    case 0x8: {
      const fn = ALU_OPS[n];
      return fn ? { op: 'alu', fn, x, y } : null;
    }
    case 0x9: return n === 0 ? { op: 'sne_reg', x, y } : null;
    case 0xA: return { op: 'ld_i', addr };
    case 0xB: return { op: 'jp_v0', addr };
    case 0xC: return { op: 'rnd', x, nn };
    case 0xD: return { op: 'drw', x, y, n };
    case 0xE:
      if (nn === 0x9E) return { op: 'skp', x };
      if (nn === 0xA1) return { op: 'sknp', x };
      return null;
    case 0xF:
      switch (nn) {
        case 0x07: return { op: 'ld_vx_dt', x };
        case 0x0A: return { op: 'ld_vx_key', x };
        case 0x15: return { op: 'ld_dt_vx', x };
        case 0x18: return { op: 'ld_st_vx', x };
        case 0x1E: return { op: 'add_i', x };
        case 0x29: return { op: 'ld_font', x };
        case 0x33: return { op: 'bcd', x };
        case 0x55: return { op: 'store', x };
        case 0x65: return { op: 'load', x };
        default: return null;
      }
    default:
      return null;
  }
}

export function decode(word: Word, pc: Word): Instruction {
  const ins = tryDecode(word & 0xFFFF);
  if (!ins) throw new DecodeFault(word & 0xFFFF, pc);
  return ins;
}
