/* eslint-disable no-console */
// Core debug output is off unless CHIP8_DEBUG=1
export const debugEnabled = (): boolean => {
  const env = typeof process !== 'undefined' ? process.env : undefined;
  return env?.CHIP8_DEBUG === '1';
};

export const debugLog = (tag: string, msg: string): void => {
  if (debugEnabled()) console.log(`[${tag}] ${msg}`);
};
