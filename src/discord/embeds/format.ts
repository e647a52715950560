/**
 * Shared embed colours and number formatting
 */

export const COLORS = {
  BLURPLE: 0x5865f2,
  GOLD: 0xffd700,
  GREEN: 0x00ff00,
  YELLOW: 0xffff00,
  ORANGE: 0xff6600,
  RED: 0xed4245,
} as const;

const MEDALS = ['🥇', '🥈', '🥉'];

/**
 * Whole number with thousands separators
 */
export function formatNumber(value: number): string {
  return (Math.round(value) || 0).toLocaleString('en-US');
}

/**
 * Signed whole number, e.g. +1,200 / -3 / +0
 */
export function formatSigned(value: number): string {
  const rounded = Math.round(value);
  return `${rounded < 0 ? '-' : '+'}${Math.abs(rounded).toLocaleString('en-US')}`;
}

/**
 * Arrow for a day-over-day change
 */
export function trendArrow(change: number): string {
  if (change > 0) return '📈';
  if (change < 0) return '📉';
  return '➡️';
}

/**
 * Medal for the top three, "n." below that
 */
export function rankMarker(rank: number): string {
  return MEDALS[rank - 1] ?? `${rank}.`;
}

/**
 * " ⭐n" after a level when the user has prestiged
 */
export function prestigeSuffix(prestige: number): string {
  return prestige > 0 ? ` ⭐${prestige}` : '';
}
