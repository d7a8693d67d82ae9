import fs from 'node:fs';
import path from 'node:path';

export const ROM_EXTENSIONS = ['.ch8', '.c8', '.rom'];

export function listRoms(dir: string): string[] {
  let names: string[];
  try {
    names = fs.readdirSync(dir);
  } catch {
    return [];
  }
  return names
    .filter((n) => ROM_EXTENSIONS.includes(path.extname(n).toLowerCase()))
    .sort((a, b) => a.toLowerCase().localeCompare(b.toLowerCase()))
    .map((n) => path.join(dir, n));
}

// Explicit path if it exists, else a name inside romDir, else the first ROM found there
export function selectRom(romDir: string, wanted: string | null): string | null {
  if (wanted) {
    if (fs.existsSync(wanted)) return wanted;
    const inDir = path.join(romDir, wanted);
    return fs.existsSync(inDir) ? inDir : null;
  }
  return listRoms(romDir)[0] ?? null;
}

export function readRom(file: string): Uint8Array {
  return new Uint8Array(fs.readFileSync(file));
}

// Numbered listing with the picked ROM marked by '*'
export function romMenu(candidates: string[], picked: string | null): string[] {
  return candidates.map((file, n) => `${file === picked ? '*' : ' '} ${n + 1}. ${file}`);
}
