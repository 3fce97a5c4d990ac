/**
 * 8-bit RGBA colors as written in color literals: `#f79143`
 */

export interface RgbaColor {
  r: number;
  g: number;
  b: number;
  a: number;
}

const HEX_RE = /^#?([0-9a-fA-F]{3,4}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/;

/**
 * Parse a hex color with 3, 4, 6 or 8 digits. Short forms repeat each
 * digit, and a missing alpha channel is opaque.
 */
export function parseColor(hex: string): RgbaColor {
  const match = HEX_RE.exec(hex);
  if (!match) {
    throw new Error(`Invalid color: ${hex}`);
  }

  const digits = match[1];
  const short = digits.length <= 4;
  const channels: number[] = [];
  for (let i = 0; i < digits.length; i += short ? 1 : 2) {
    const pair = short ? digits[i] + digits[i] : digits.slice(i, i + 2);
    channels.push(parseInt(pair, 16));
  }

  const [r, g, b, a = 255] = channels;
  return { r, g, b, a };
}

/**
 * Canonical form: `#rrggbb`, or `#rrggbbaa` when not fully opaque.
 */
export function formatColor(color: RgbaColor): string {
  const channels = color.a === 255
    ? [color.r, color.g, color.b]
    : [color.r, color.g, color.b, color.a];
  return "#" + channels.map((c) => c.toString(16).padStart(2, "0")).join("");
}
