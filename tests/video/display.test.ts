import { describe, it, expect } from 'vitest';
import { Display, SCREEN_HEIGHT, SCREEN_WIDTH } from '@core/video/display';
import { FONT } from '@core/font/font';
import { machineWithProgram, stepN } from '../helpers/cpuh';

describe('Display buffer', () => {
  it('drawing the same sprite twice restores the grid and reports a collision', () => {
    const d = new Display();
    const glyph = FONT.subarray(0, 5);
    expect(d.drawSprite(10, 4, glyph)).toBe(false);
    expect(d.litCount()).toBe(14);
    expect(d.drawSprite(10, 4, glyph)).toBe(true);
    expect(d.litCount()).toBe(0);
  });

  it('reports a collision only when a lit cell is switched off', () => {
    const d = new Display();
    d.drawSprite(0, 0, Uint8Array.of(0xF0));
    expect(d.drawSprite(4, 0, Uint8Array.of(0xF0))).toBe(false);
    expect(d.drawSprite(3, 0, Uint8Array.of(0x80))).toBe(true);
    expect(d.getPixel(3, 0)).toBe(false);
  });

  it('clips sprites at the right and bottom edges', () => {
    const d = new Display();
    d.drawSprite(60, 0, Uint8Array.of(0xFF));
    expect(d.litCount()).toBe(4);
    expect(d.getPixel(63, 0)).toBe(true);
    expect(d.getPixel(0, 0)).toBe(false);

    d.clear();
    d.drawSprite(0, 30, Uint8Array.of(0x80, 0x80, 0x80, 0x80));
    expect(d.litCount()).toBe(2);
    expect(d.getPixel(0, 31)).toBe(true);
    expect(d.getPixel(0, 0)).toBe(false);
  });

  it('wraps the sprite origin modulo the grid size', () => {
    const d = new Display();
    d.drawSprite(SCREEN_WIDTH + 3, SCREEN_HEIGHT + 2, Uint8Array.of(0x80));
    expect(d.getPixel(3, 2)).toBe(true);
    expect(d.litCount()).toBe(1);
  });

  it('snapshot is a copy', () => {
    const d = new Display();
    d.drawSprite(0, 0, Uint8Array.of(0x80));
    const snap = d.snapshot();
    d.clear();
    expect(snap.width).toBe(64);
    expect(snap.height).toBe(32);
    expect(snap.pixels[0]).toBe(1);
    expect(d.getPixel(0, 0)).toBe(false);
  });
});

describe('DXYN', () => {
  it('clear, load, index, draw: the "0" glyph lands at (5,5)', () => {
    const { sys, regs, cpu } = machineWithProgram([0x00E0, 0x6005, 0xA000, 0xD005]);
    stepN(sys, 3);
    expect(regs.get(0)).toBe(5);
    expect(cpu.state.i).toBe(0x000);
    expect(sys.display.litCount()).toBe(0);

    sys.stepInstruction();
    const rows: string[] = [];
    for (let y = 5; y < 10; y++) {
      let line = '';
      for (let x = 5; x < 13; x++) line += sys.display.getPixel(x, y) ? '#' : '.';
      rows.push(line);
    }
    expect(rows).toEqual([
      '####....',
      '#..#....',
      '#..#....',
      '#..#....',
      '####....',
    ]);
    expect(sys.display.litCount()).toBe(14);
    expect(regs.get(0xF)).toBe(0);
  });

  it('sets VF on the second identical draw', () => {
    const { sys, regs } = machineWithProgram([0xA000, 0xD005, 0xD005]);
    stepN(sys, 2);
    expect(regs.get(0xF)).toBe(0);
    sys.stepInstruction();
    expect(regs.get(0xF)).toBe(1);
    expect(sys.display.litCount()).toBe(0);
  });

  it('reads coordinates before VF takes the collision flag', () => {
    // VF = 10 is used as the x coordinate, then replaced by the flag
    const { sys, regs } = machineWithProgram([0x6F0A, 0xA000, 0xDFF1]);
    stepN(sys, 3);
    expect(sys.display.getPixel(10, 10)).toBe(true);
    expect(regs.get(0xF)).toBe(0);
  });

  it('N = 0 draws nothing and clears VF', () => {
    const { sys, regs } = machineWithProgram([0x6F01, 0xA000, 0xD000]);
    stepN(sys, 3);
    expect(sys.display.litCount()).toBe(0);
    expect(regs.get(0xF)).toBe(0);
  });

  it('00E0 clears the grid', () => {
    const { sys } = machineWithProgram([0xA000, 0xD005, 0x00E0]);
    stepN(sys, 2);
    expect(sys.display.litCount()).toBe(14);
    sys.stepInstruction();
    expect(sys.display.litCount()).toBe(0);
  });
});
