#!/usr/bin/env tsx
import { PROGRAM_CAPACITY } from '@core/cpu/types';
import { listRoms, readRom } from '@host/node/roms';
import { disasmImage } from '@utils/disasm';

(function main() {
  const arg = process.argv.find(a => a.startsWith('--dir='));
  const dir = arg ? arg.slice('--dir='.length) : (process.env.CHIP8_ROM_DIR || 'roms');
  let total = 0, fits = 0;
  for (const file of listRoms(dir)) {
    total++;
    const image = readRom(file);
    const ok = image.length <= PROGRAM_CAPACITY;
    if (ok) fits++;
    // Sprite data mixed into code shows up here too, so this is only a hint
    const unknown = disasmImage(image).filter(d => !d.known).length;
    // eslint-disable-next-line no-console
    console.log(`${ok ? '[OK]' : '[--]'} ${file}  bytes=${image.length} undecodable_words=${unknown}`);
  }
  // eslint-disable-next-line no-console
  console.log(`\nScanned ${total} ROMs; ${fits}/${total} fit in ${PROGRAM_CAPACITY} bytes`);
})();
