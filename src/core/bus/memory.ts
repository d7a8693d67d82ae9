import { ADDRESS_MASK, MEMORY_SIZE, PROGRAM_CAPACITY, PROGRAM_START, type Byte, type Word } from '@core/cpu/types';
import { FONT, FONT_BASE } from '@core/font/font';
import { LoadFault } from '@core/system/errors';

export interface BusDevice {
  read(addr: Word): Byte;
  write(addr: Word, value: Byte): void;
}

export class Memory implements BusDevice {
  private ram = new Uint8Array(MEMORY_SIZE);

  constructor() {
    this.loadFont();
  }

  read(addr: Word): Byte {
    return this.ram[addr & ADDRESS_MASK];
  }

  write(addr: Word, value: Byte): void {
    this.ram[addr & ADDRESS_MASK] = value & 0xFF;
  }

  // Big-endian instruction word; the second byte wraps inside the 12-bit space
  read16(addr: Word): Word {
    return (this.read(addr) << 8) | this.read((addr + 1) & ADDRESS_MASK);
  }

  readBlock(addr: Word, len: number): Uint8Array {
    const out = new Uint8Array(len);
    for (let n = 0; n < len; n++) out[n] = this.read(addr + n);
    return out;
  }

  loadProgram(image: Uint8Array): void {
    if (image.length > PROGRAM_CAPACITY) throw new LoadFault(image.length, PROGRAM_CAPACITY);
    this.ram.set(image, PROGRAM_START);
  }

  reset(): void {
    this.ram.fill(0);
    this.loadFont();
  }

  private loadFont(): void {
    this.ram.set(FONT, FONT_BASE);
  }
}
