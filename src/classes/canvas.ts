import { type Color } from '../types/color.js';

/**
 * RGBA pixel buffer addressed in world-space integer coordinates (y up).
 *
 * Pixel (0, 0) of the buffer covers world pixel (originX, originY); rows are
 * stored bottom-up, so PNG encoding flips them.
 */
export class RasterCanvas {
    readonly data: Uint8Array;

    constructor(
        readonly width: number,
        readonly height: number,
        readonly originX: number = 0,
        readonly originY: number = 0,
        background: Readonly<Color> = [0, 0, 0, 0],
    ) {
        if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
            throw new RangeError(`Canvas dimensions must be positive integers (got ${String(width)}×${String(height)}).`);
        }
        this.data = new Uint8Array(width * height * 4);
        for (let i = 0; i < width * height; i++) {
            this.data.set(background, i * 4);
        }
    }

    /**
     * Writes a pixel at world coordinates. Pixels outside the canvas are dropped.
     */
    putPixel(worldX: number, worldY: number, color: Readonly<Color>): void {
        const x = worldX - this.originX;
        const y = worldY - this.originY;
        if (x < 0 || x >= this.width || y < 0 || y >= this.height) return;
        this.data.set(color, (y * this.width + x) * 4);
    }

    /**
     * Reads a pixel at world coordinates, or null outside the canvas.
     */
    getPixel(worldX: number, worldY: number): Color | null {
        const x = worldX - this.originX;
        const y = worldY - this.originY;
        if (x < 0 || x >= this.width || y < 0 || y >= this.height) return null;
        const i = (y * this.width + x) * 4;
        return [this.data[i], this.data[i + 1], this.data[i + 2], this.data[i + 3]];
    }
}
