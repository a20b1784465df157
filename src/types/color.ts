/**
 * RGBA render colors for hitboxes.
 */

/**
 * An RGBA color tuple.
 * Each channel is an integer between 0 and 255 (inclusive).
 */
export type Color = [number, number, number, number];

/**
 * Named colors available to `hitbox set_color` and scene files.
 */
export const NAMED_COLORS = {
  RED: [255, 0, 0, 255],
  ORANGE: [255, 167, 0, 255],
  YELLOW: [255, 255, 0, 255],
  GREEN: [0, 255, 0, 255],
  CYAN: [0, 255, 255, 255],
  BLUE: [0, 0, 255, 255],
  PURPLE: [167, 0, 255, 255],
  MAGENTA: [255, 0, 255, 255],
  WHITE: [255, 255, 255, 255],
  GRAY: [128, 128, 128, 255],
  BLACK: [0, 0, 0, 255],
} as const satisfies Record<string, Readonly<Color>>;

export type ColorName = keyof typeof NAMED_COLORS;

export const DEFAULT_HITBOX_COLOR: Readonly<Color> = NAMED_COLORS.WHITE;

/**
 * Returns true if the channel value is a valid 8-bit color channel (integer 0-255).
 */
function isValidChannel(val: number): boolean {
  return Number.isInteger(val) && val >= 0 && val <= 255;
}

/**
 * Returns true if the color is a valid 4-element RGBA tuple with each channel 0-255.
 */
export function isValidColor(color: unknown): color is Color {
  if (!Array.isArray(color) || color.length !== 4) {
    return false;
  }
  return color.every((channel) => typeof channel === 'number' && isValidChannel(channel));
}

function isColorName(name: string): name is ColorName {
  return Object.prototype.hasOwnProperty.call(NAMED_COLORS, name);
}

/**
 * Resolves a color name (case-insensitive) or an RGBA tuple.
 * Returns null when neither form is valid.
 */
export function resolveColor(value: unknown): Color | null {
  if (typeof value === 'string') {
    const key = value.toUpperCase();
    if (!isColorName(key)) return null;
    const [r, g, b, a] = NAMED_COLORS[key];
    return [r, g, b, a];
  }
  if (isValidColor(value)) {
    return [value[0], value[1], value[2], value[3]];
  }
  return null;
}
