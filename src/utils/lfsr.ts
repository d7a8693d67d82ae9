import type { RandomSource } from '@core/cpu/types';

// 16-bit Galois LFSR (taps 16,14,13,11), period 65535. A zero seed would lock up, so it is remapped.
export function lfsrRandom(seed: number): RandomSource {
  let state = seed & 0xFFFF || 0xACE1;
  const stepBit = (): void => {
    const lsb = state & 1;
    state >>>= 1;
    if (lsb) state ^= 0xB400;
  };
  return () => {
    for (let k = 0; k < 8; k++) stepBit();
    return state & 0xFF;
  };
}
