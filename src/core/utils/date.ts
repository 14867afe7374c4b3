/**
 * Date formatting utilities
 */

/**
 * Formats a duration in seconds to a human-readable string
 * @param sec - Duration in seconds
 * @returns Formatted duration string (e.g., "1h30m45s")
 */
export function formatDuration(sec: number): string {
  const s = Math.max(0, Math.floor(sec));
  const h = Math.floor(s / 3600);
  const m = Math.floor((s % 3600) / 60);
  const ss = s % 60;
  return (h ? `${h}h` : "") + (h || m ? `${m}m` : "") + `${ss}s`;
}

export const hoursToMs = (hours: number): number => hours * 3_600_000;
