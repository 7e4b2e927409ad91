import type { RgbColor } from "../types";

export const WHITE: RgbColor = { r: 255, g: 255, b: 255 };

/**
 * Parse a six-digit hex color, with or without the leading "#"
 *
 * @example
 * parseHexColor("#ff8000") // { r: 255, g: 128, b: 0 }
 */
export function parseHexColor(value: string): RgbColor {
  const match = value.trim().match(/^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i);
  if (!match) {
    throw new Error(`Invalid hex color: ${value}`);
  }

  return {
    r: parseInt(match[1], 16),
    g: parseInt(match[2], 16),
    b: parseInt(match[3], 16),
  };
}
