/**
 * Format a metric value: whole numbers as-is, otherwise one decimal place
 * @param value - Numeric value (undefined/null/NaN render as '--')
 */
export function formatNumber(value: number | null | undefined): string {
  if (value === null || value === undefined || isNaN(value)) return '--';
  return Number.isInteger(value) ? String(value) : value.toFixed(1);
}

/**
 * Format a signed change, e.g. +12.5 or -3
 */
export function formatDelta(value: number | null): string {
  if (value === null || isNaN(value)) return '--';
  const text = formatNumber(Math.abs(value));
  if (value > 0) return `+${text}`;
  if (value < 0) return `-${text}`;
  return text;
}

/**
 * Format an ISO timestamp as YYYY-MM-DD HH:MM (UTC)
 */
export function formatTimestamp(iso: string): string {
  const date = new Date(iso);
  if (isNaN(date.getTime())) return iso;
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

/**
 * Round to one decimal place
 */
export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Escape text for interpolation into HTML markup
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Format a value with its unit: symbols attach (55%, 8/10), words are spaced (480 N)
 */
export function formatWithUnit(value: number | null | undefined, unit: string): string {
  const text = formatNumber(value);
  if (text === '--' || unit === '') return text;
  return /^[A-Za-z]/.test(unit) ? `${text} ${unit}` : `${text}${unit}`;
}
