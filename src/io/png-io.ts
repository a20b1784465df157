import * as fs from 'fs/promises';
import * as path from 'node:path';
import { PNG } from 'pngjs';
import { type RasterCanvas } from '../classes/canvas.js';

/**
 * Encodes a canvas as PNG bytes, upscaled by an integer factor (nearest neighbour).
 * Canvas rows are stored bottom-up (y up); PNG rows top-down, so rows are flipped.
 */
export function encodePng(canvas: RasterCanvas, scale: number = 1): Buffer {
  if (!Number.isInteger(scale) || scale < 1) {
    throw new RangeError(`PNG scale must be a positive integer (got ${String(scale)}).`);
  }

  const width = canvas.width * scale;
  const height = canvas.height * scale;
  const png = new PNG({ width, height });

  for (let y = 0; y < height; y++) {
    const srcRow = canvas.height - 1 - Math.floor(y / scale);
    for (let x = 0; x < width; x++) {
      const src = (srcRow * canvas.width + Math.floor(x / scale)) * 4;
      const dst = (y * width + x) * 4;
      png.data[dst] = canvas.data[src];
      png.data[dst + 1] = canvas.data[src + 1];
      png.data[dst + 2] = canvas.data[src + 2];
      png.data[dst + 3] = canvas.data[src + 3];
    }
  }

  return PNG.sync.write(png);
}

/**
 * Writes a canvas to a PNG file, creating parent directories as needed.
 */
export async function savePngFile(filePath: string, canvas: RasterCanvas, scale: number = 1): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, encodePng(canvas, scale));
}
