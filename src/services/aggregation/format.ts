/**
 * Human-readable hour values
 */

/**
 * Format hours as "2h 30m", rounded to the nearest minute
 */
export function formatHours(hours: number): string {
  const totalMinutes = Math.round(hours * 60);
  if (totalMinutes <= 0) return '0m';
  const h = Math.floor(totalMinutes / 60);
  const m = totalMinutes % 60;
  if (h === 0) return `${m}m`;
  if (m === 0) return `${h}h`;
  return `${h}h ${m}m`;
}

/**
 * Round to one decimal for display
 */
export function roundHours(hours: number): number {
  return Math.round(hours * 10) / 10;
}
