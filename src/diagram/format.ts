/** Digits kept before trimming; enough to hide FMA/non-FMA rounding noise */
export const NUMBER_PRECISION = 10;

/**
 * Formats a coordinate for SVG output: fixed precision, then trailing zeros and
 * a trailing '.' trimmed, so 68.80000000000001 and 68.8 both print as "68.8".
 */
export function formatNumber(value: number): string {
  if (!Number.isFinite(value)) return '0';
  let s = value.toFixed(NUMBER_PRECISION);
  if (s.includes('.')) {
    s = s.replace(/0+$/, '').replace(/\.$/, '');
  }
  return s === '-0' ? '0' : s;
}

export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Builds a `translate(dx,dy)` transform, or nothing at all for a zero offset.
 */
export function translate(dx: number, dy: number): string | undefined {
  const x = formatNumber(dx);
  const y = formatNumber(dy);
  if (x === '0' && y === '0') return undefined;
  return `translate(${x},${y})`;
}
