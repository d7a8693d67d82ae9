export const SCREEN_WIDTH = 64;
export const SCREEN_HEIGHT = 32;

// Read-only view handed to renderers: one byte per cell, row-major, 0 or 1
export interface Frame {
  readonly width: number;
  readonly height: number;
  readonly pixels: Uint8Array;
}

export class Display {
  private cells = new Uint8Array(SCREEN_WIDTH * SCREEN_HEIGHT);

  clear(): void {
    this.cells.fill(0);
  }

  getPixel(x: number, y: number): boolean {
    return this.cells[(y % SCREEN_HEIGHT) * SCREEN_WIDTH + (x % SCREEN_WIDTH)] === 1;
  }

  /**
   * XOR an 8-pixel-wide sprite onto the grid. The origin wraps modulo the
   * grid size; rows and columns that run past the right or bottom edge are
   * dropped. Returns true when any lit cell was switched off.
   */
  drawSprite(x: number, y: number, rows: Uint8Array): boolean {
    const x0 = x % SCREEN_WIDTH;
    const y0 = y % SCREEN_HEIGHT;
    let collided = false;
    for (let r = 0; r < rows.length; r++) {
      const py = y0 + r;
      if (py >= SCREEN_HEIGHT) break;
      const bits = rows[r];
      for (let c = 0; c < 8; c++) {
        const px = x0 + c;
        if (px >= SCREEN_WIDTH) break;
        if ((bits & (0x80 >> c)) === 0) continue;
        const idx = py * SCREEN_WIDTH + px;
        if (this.cells[idx] === 1) collided = true;
        this.cells[idx] ^= 1;
      }
    }
    return collided;
  }

  snapshot(): Frame {
    return { width: SCREEN_WIDTH, height: SCREEN_HEIGHT, pixels: this.cells.slice() };
  }

  litCount(): number {
    let n = 0;
    for (let i = 0; i < this.cells.length; i++) n += this.cells[i];
    return n;
  }
}
