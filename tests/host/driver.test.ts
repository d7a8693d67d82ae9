import { describe, it, expect } from 'vitest';
import { HostDriver } from '@host/driver';
import { TIMER_INTERVAL_MS } from '@core/timer/timers';
import type { Frame } from '@core/video/display';
import { ScriptedKeys } from '@host/node/keys';
import { machineWithProgram } from '../helpers/cpuh';

describe('Host driver', () => {
  it('polls input, presents frames and signals tone edges', () => {
    const { sys } = machineWithProgram([0x6003, 0xF018, 0x1204]);
    const tones: boolean[] = [];
    const frames: Frame[] = [];
    let polls = 0;
    const driver = new HostDriver(sys, {
      video: { present: (f) => frames.push(f) },
      audio: { setTone: (on) => tones.push(on) },
      input: { poll: () => { polls++; } },
    });
    for (let i = 0; i < 3; i++) driver.frame(TIMER_INTERVAL_MS);
    expect(tones).toEqual([true, false]);
    expect(frames.length).toBe(3);
    expect(polls).toBe(3);
  });

  it('input collaborators drive the key test instructions', () => {
    // Skip over the VF load while key 6 is held
    const { sys, regs } = machineWithProgram([0x6006, 0xE09E, 0x6F01, 0x1206]);
    const driver = new HostDriver(sys, { input: { poll: (kp) => kp.setKey(6, true) } }, { stepsPerFrame: 4 });
    driver.frame(0);
    expect(regs.get(0xF)).toBe(0);
  });

  it('a scheduled press answers a pending key wait', () => {
    const { sys, regs } = machineWithProgram([0xF50A, 0x1202]);
    const driver = new HostDriver(sys, { input: new ScriptedKeys([], [{ frame: 2, key: 5 }]) });
    driver.frame(TIMER_INTERVAL_MS);
    driver.frame(TIMER_INTERVAL_MS);
    expect(sys.awaitingKey).toBe(true);
    driver.frame(TIMER_INTERVAL_MS);
    expect(sys.awaitingKey).toBe(false);
    expect(regs.get(5)).toBe(5);
    expect(sys.keypad.isPressed(5)).toBe(true);
    driver.frame(TIMER_INTERVAL_MS);
    expect(sys.keypad.isPressed(5)).toBe(false);
  });

  it('a key held from the start does not answer a key wait', () => {
    const { sys } = machineWithProgram([0xF50A, 0x1202]);
    const driver = new HostDriver(sys, { input: new ScriptedKeys([5]) });
    for (let i = 0; i < 5; i++) driver.frame(TIMER_INTERVAL_MS);
    expect(sys.awaitingKey).toBe(true);
  });

  it('a press on a held key is ignored but the key stays down', () => {
    const { sys } = machineWithProgram([0x1200]);
    const driver = new HostDriver(sys, { input: new ScriptedKeys([3], [{ frame: 0, key: 3 }]) });
    driver.frame(TIMER_INTERVAL_MS);
    driver.frame(TIMER_INTERVAL_MS);
    expect(sys.keypad.isPressed(3)).toBe(true);
  });
});
