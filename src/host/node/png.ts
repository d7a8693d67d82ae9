import fs from 'node:fs';
import path from 'node:path';
import { PNG } from 'pngjs';
import type { Frame } from '@core/video/display';

export type RGB = [number, number, number];

export interface PngStyle {
  scale?: number;
  on?: RGB;
  off?: RGB;
}

export const frameToPng = (frame: Frame, style: PngStyle = {}): PNG => {
  const scale = Math.max(1, Math.floor(style.scale ?? 8));
  const on = style.on ?? [255, 165, 0];
  const off = style.off ?? [0, 0, 0];
  const W = frame.width * scale, H = frame.height * scale;
  const png = new PNG({ width: W, height: H });
  for (let y = 0; y < frame.height; y++) {
    for (let x = 0; x < frame.width; x++) {
      const [r, g, b] = frame.pixels[y * frame.width + x] ? on : off;
      for (let dy = 0; dy < scale; dy++) {
        const oy = (y * scale + dy) * W;
        for (let dx = 0; dx < scale; dx++) {
          const o = (oy + x * scale + dx) << 2;
          png.data[o + 0] = r;
          png.data[o + 1] = g;
          png.data[o + 2] = b;
          png.data[o + 3] = 255;
        }
      }
    }
  }
  return png;
};

export const writePng = async (outPath: string, frame: Frame, style: PngStyle = {}): Promise<void> => {
  fs.mkdirSync(path.dirname(path.resolve(outPath)), { recursive: true });
  const stream = fs.createWriteStream(outPath);
  await new Promise<void>((resolve, reject) => {
    stream.on('finish', () => resolve());
    stream.on('error', (e) => reject(e));
    frameToPng(frame, style).pack().pipe(stream);
  });
};
