/**
 * Display color parsing
 */

import type { HexColor, RGB } from '../core/types.js';

export const DEFAULT_COLOR_HEX: HexColor = '#808080';

export const DEFAULT_COLOR: RGB = { r: 128, g: 128, b: 128 };

export interface ParsedColor {
  readonly hex: HexColor;
  readonly rgb: RGB;
}

const HEX_PATTERN = /^[0-9a-fA-F]{6}$/;

/**
 * Parse a 6-digit hex color with optional leading `#` into its canonical
 * lowercase form. Null for anything else, including 3-digit shorthand.
 */
export function parseHexColor(value: unknown): ParsedColor | null {
  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  const digits = trimmed.startsWith('#') ? trimmed.slice(1) : trimmed;
  if (!HEX_PATTERN.test(digits)) return null;

  const lower = digits.toLowerCase();
  return {
    hex: `#${lower}`,
    rgb: {
      r: parseInt(lower.slice(0, 2), 16),
      g: parseInt(lower.slice(2, 4), 16),
      b: parseInt(lower.slice(4, 6), 16),
    },
  };
}

export function rgbToHex({ r, g, b }: RGB): HexColor {
  const channel = (value: number): string =>
    Math.max(0, Math.min(255, Math.round(value))).toString(16).padStart(2, '0');
  return `#${channel(r)}${channel(g)}${channel(b)}`;
}
