/**
 * Inferno-style sequential palette for heat-loss shading.
 *
 * Intensity 0 is near-black, 1 is pale yellow. Stops are evenly spaced and
 * interpolated linearly in RGB.
 */

const INFERNO_STOPS = ['#000004', '#420a68', '#932667', '#dd513a', '#fca50a', '#fcffa4'] as const;

/** Above this intensity the fill is light enough to need dark label text. */
const DARK_TEXT_THRESHOLD = 0.6;

function hexToRgb(hex: string): [number, number, number] {
  const n = parseInt(hex.slice(1), 16);
  return [(n >> 16) & 0xff, (n >> 8) & 0xff, n & 0xff];
}

function toHex(channel: number): string {
  return Math.round(channel).toString(16).padStart(2, '0');
}

export function thermalColor(intensity: number): string {
  const t = Math.min(1, Math.max(0, Number.isFinite(intensity) ? intensity : 0));
  const position = t * (INFERNO_STOPS.length - 1);
  const i = Math.min(Math.floor(position), INFERNO_STOPS.length - 2);
  const frac = position - i;

  const from = hexToRgb(INFERNO_STOPS[i]);
  const to = hexToRgb(INFERNO_STOPS[i + 1]);
  const rgb = from.map((c, k) => c + (to[k] - c) * frac);
  return `#${rgb.map(toHex).join('')}`;
}

export function thermalLabelColor(intensity: number): string {
  return intensity > DARK_TEXT_THRESHOLD ? '#1a202c' : '#ffffff';
}
