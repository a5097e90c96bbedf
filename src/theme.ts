/**
 * theme.ts — Single source of truth for presentation colours
 *
 * The engine only hands out colour keys; renderers read everything else
 * (gradients, contrast text, fills) from the helpers below so that every
 * chart paints a ticker the same way.
 */

// ── Color Palette ──
export const colors = {
  // Neutrals
  textMute: '#94a3b8',
  grey: '#C8C8C8',
  black: '#000000',
  white: '#FFFFFF',

  // Semantic
  green: '#059669',
  lime: '#65a30d',
  amber: '#d97706',
  red: '#dc2626',
  blue: '#3b82f6',
} as const;

// ── Ticker palette (rank order) ──
export const tickerPalette = [
  '#636EFA', '#EF553B', '#00CC96', '#AB63FA', '#FFA15A',
  '#19D3F3', '#FF6692', '#B6E880', '#FF97FF', '#FECB52',
] as const;

// ── Utility functions ──

/** Colour for an average growth rate (fraction); grey when there is no history */
export const growthColor = (rate: number | null) =>
  rate === null ? colors.textMute
    : rate >= 0.05 ? colors.green
    : rate >= 0.02 ? colors.lime
    : rate >= 0 ? colors.amber
    : colors.red;

/** "#abc" / "#aabbcc" → [r, g, b], null if malformed */
export function parseHex(hex: string): [number, number, number] | null {
  let h = hex.trim().replace(/^#/, '');
  if (h.length === 3) h = h.split('').map(c => c + c).join('');
  if (!/^[0-9a-fA-F]{6}$/.test(h)) return null;
  return [parseInt(h.slice(0, 2), 16), parseInt(h.slice(2, 4), 16), parseInt(h.slice(4, 6), 16)];
}

const toHex = (rgb: readonly number[]) =>
  '#' + rgb.map(c => c.toString(16).padStart(2, '0').toUpperCase()).join('');

/** WCAG 2.1 relative luminance, 0 (black) .. 1 (white) */
export function relativeLuminance(hex: string): number | null {
  const rgb = parseHex(hex);
  if (!rgb) return null;
  const [r, g, b] = rgb.map(c => {
    const s = c / 255;
    return s <= 0.03928 ? s / 12.92 : ((s + 0.055) / 1.055) ** 2.4;
  });
  return 0.2126 * (r ?? 0) + 0.7152 * (g ?? 0) + 0.0722 * (b ?? 0);
}

/** Black text on light backgrounds, white on dark ones */
export function contrastText(bg: string): string {
  const lum = relativeLuminance(bg);
  return lum === null || lum > 0.5 ? colors.black : colors.white;
}

/** Lighter shade for gradients: each channel +amount, capped at 255 */
export function lighten(hex: string, amount = 40): string {
  const rgb = parseHex(hex);
  if (!rgb) return colors.grey;
  return toHex(rgb.map(c => Math.min(255, c + amount)));
}

/** "#3b82f6", 0.2 → "rgba(59, 130, 246, 0.2)" */
export function hexToRgba(hex: string, alpha = 1): string {
  const [r, g, b] = parseHex(hex) ?? parseHex(colors.blue) ?? [0, 0, 0];
  return `rgba(${r}, ${g}, ${b}, ${alpha})`;
}
