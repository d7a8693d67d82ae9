import type { Frame } from '@core/video/display';
import type { FrameSink } from '@host/types';

export const frameToAscii = (frame: Frame, on = '#', off = '.'): string[] => {
  const lines: string[] = [];
  for (let y = 0; y < frame.height; y++) {
    let line = '';
    for (let x = 0; x < frame.width; x++) line += frame.pixels[y * frame.width + x] ? on : off;
    lines.push(line);
  }
  return lines;
};

// Keeps the latest frame as text; the runner prints it at the end
export class AsciiSink implements FrameSink {
  last: string[] = [];

  present(frame: Frame): void {
    this.last = frameToAscii(frame);
  }
}
