import { tryDecode, type Instruction } from '@core/cpu/decode';
import type { Byte, Word } from '@core/cpu/types';
import { hex2, hex3, hex4 } from '@utils/hex';

export type ReadByteFn = (addr: Word) => Byte;

export interface Disasm {
  pc: Word;
  word: Word;
  mnemonic: string;
  operands: string;
  known: boolean;
}

const V = (n: number): string => `V${n.toString(16).toUpperCase()}`;

const ALU_MNEMONIC = {
  mov: 'LD', or: 'OR', and: 'AND', xor: 'XOR', add: 'ADD',
  sub: 'SUB', shr: 'SHR', subn: 'SUBN', shl: 'SHL',
} as const;

function render(ins: Instruction): [string, string] {
  switch (ins.op) {
    case 'cls': return ['CLS', ''];
    case 'ret': return ['RET', ''];
    case 'jp': return ['JP', `$${hex3(ins.addr)}`];
    case 'call': return ['CALL', `$${hex3(ins.addr)}`];
    case 'se_imm': return ['SE', `${V(ins.x)}, $${hex2(ins.nn)}`];
    case 'sne_imm': return ['SNE', `${V(ins.x)}, $${hex2(ins.nn)}`];
    case 'se_reg': return ['SE', `${V(ins.x)}, ${V(ins.y)}`];
    case 'sne_reg': return ['SNE', `${V(ins.x)}, ${V(ins.y)}`];
    case 'ld_imm': return ['LD', `${V(ins.x)}, $${hex2(ins.nn)}`];
    case 'add_imm': return ['ADD', `${V(ins.x)}, $${hex2(ins.nn)}`];
    case 'alu': return [ALU_MNEMONIC[ins.fn], `${V(ins.x)}, ${V(ins.y)}`];
    case 'ld_i': return ['LD', `I, $${hex3(ins.addr)}`];
    case 'jp_v0': return ['JP', `V0, $${hex3(ins.addr)}`];
    case 'rnd': return ['RND', `${V(ins.x)}, $${hex2(ins.nn)}`];
    case 'drw': return ['DRW', `${V(ins.x)}, ${V(ins.y)}, ${ins.n}`];
    case 'skp': return ['SKP', V(ins.x)];
    case 'sknp': return ['SKNP', V(ins.x)];
    case 'ld_vx_dt': return ['LD', `${V(ins.x)}, DT`];
    case 'ld_vx_key': return ['LD', `${V(ins.x)}, K`];
    case 'ld_dt_vx': return ['LD', `DT, ${V(ins.x)}`];
    case 'ld_st_vx': return ['LD', `ST, ${V(ins.x)}`];
    case 'add_i': return ['ADD', `I, ${V(ins.x)}`];
    case 'ld_font': return ['LD', `F, ${V(ins.x)}`];
    case 'bcd': return ['LD', `B, ${V(ins.x)}`];
    case 'store': return ['LD', `[I], ${V(ins.x)}`];
    case 'load': return ['LD', `${V(ins.x)}, [I]`];
  }
}

export function disasmWord(word: Word, pc: Word = 0): Disasm {
  const ins = tryDecode(word & 0xFFFF);
  if (!ins) return { pc, word, mnemonic: 'DW', operands: `$${hex4(word)}`, known: false };
  const [mnemonic, operands] = render(ins);
  return { pc, word, mnemonic, operands, known: true };
}

export function disasmAt(read: ReadByteFn, pc: Word): Disasm {
  const word = ((read(pc & 0xFFF) & 0xFF) << 8) | (read((pc + 1) & 0xFFF) & 0xFF);
  return disasmWord(word, pc & 0xFFF);
}

// "0200  00E0  CLS"
export function formatLine(d: Disasm): string {
  const text = d.operands ? `${d.mnemonic} ${d.operands}` : d.mnemonic;
  return `${hex4(d.pc)}  ${hex4(d.word)}  ${text}`;
}

// Linear sweep over a program image as it sits at $0200
export function disasmImage(image: Uint8Array, base: Word = 0x200): Disasm[] {
  const out: Disasm[] = [];
  for (let off = 0; off + 1 < image.length; off += 2) {
    out.push(disasmWord((image[off] << 8) | image[off + 1], base + off));
  }
  return out;
}
