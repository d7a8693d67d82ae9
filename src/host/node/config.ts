import { DEFAULT_STEPS_PER_FRAME } from '@core/system/scheduler';

export interface RunConfig {
  rom: string | null;
  romDir: string;
  frames: number;
  stepsPerFrame: number;
  seed: number | null;
  png: string | null;
  scale: number;
  // Keys held for the whole run
  keys: number[];
  // Keys tapped down for a single frame, e.g. to answer a key wait
  presses: KeyPress[];
}

export interface KeyPress {
  frame: number;
  key: number;
}

type Env = Record<string, string | undefined>;

const getEnv = (env: Env, name: string): string | null => {
  const v = env[name];
  return v && v.length > 0 ? v : null;
};

const toInt = (raw: string | null, fallback: number, radix = 10): number => {
  if (raw === null) return fallback;
  const v = parseInt(raw, radix);
  return Number.isFinite(v) && v >= 0 ? v : fallback;
};

const parseKeys = (raw: string | null): number[] => {
  if (!raw) return [];
  return raw.split(',')
    .map((s) => s.trim())
    .filter((s) => /^[0-9a-fA-F]$/.test(s))
    .map((s) => parseInt(s, 16));
};

// "30:5,90:a" -> key 5 tapped on frame 30, key A on frame 90
const parsePresses = (raw: string | null): KeyPress[] => {
  if (!raw) return [];
  const out: KeyPress[] = [];
  for (const part of raw.split(',')) {
    const m = /^\s*(\d+):([0-9a-fA-F])\s*$/.exec(part);
    if (m) out.push({ frame: parseInt(m[1], 10), key: parseInt(m[2], 16) });
  }
  return out.sort((a, b) => a.frame - b.frame);
};

// CLI flags (--name=value) win over CHIP8_* environment variables
export function parseConfig(argv: string[], env: Env = process.env): RunConfig {
  const flags = new Map<string, string>();
  for (const a of argv) {
    const m = /^--([a-z-]+)=(.*)$/.exec(a);
    if (m) flags.set(m[1], m[2]);
  }
  const pick = (flag: string, envName: string): string | null => {
    const f = flags.get(flag);
    return f !== undefined && f.length > 0 ? f : getEnv(env, envName);
  };
  const seedRaw = pick('seed', 'CHIP8_SEED');
  return {
    rom: pick('rom', 'CHIP8_ROM'),
    romDir: pick('dir', 'CHIP8_ROM_DIR') ?? 'roms',
    frames: toInt(pick('frames', 'CHIP8_FRAMES'), 120),
    stepsPerFrame: Math.max(1, toInt(pick('steps', 'CHIP8_STEPS_PER_FRAME'), DEFAULT_STEPS_PER_FRAME)),
    seed: seedRaw === null ? null : toInt(seedRaw, 0),
    png: pick('png', 'CHIP8_PNG'),
    scale: Math.max(1, toInt(pick('scale', 'CHIP8_SCALE'), 8)),
    keys: parseKeys(pick('keys', 'CHIP8_KEYS')),
    presses: parsePresses(pick('press', 'CHIP8_PRESS')),
  };
}
