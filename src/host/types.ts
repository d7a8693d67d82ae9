import type { Frame } from '@core/video/display';
import type { Keypad } from '@core/input/keypad';

// Receives the 64x32 cells once per host frame; scaling and colour are its business
export interface FrameSink {
  present(frame: Frame): void;
}

// Told when the sound timer goes from zero to non-zero and back
export interface ToneSink {
  setTone(on: boolean): void;
}

// Maps host key events onto the hex keypad before each frame
export interface KeySource {
  poll(keypad: Keypad): void;
}
