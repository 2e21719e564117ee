function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a date as `YYYY-MM-DD HH:MM:SS` in local time, the log line prefix.
 * @param date The moment to format
 * @returns Timestamp string without a timezone suffix
 */
export function formatLogTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Human readable duration for log lines, e.g. `850ms`, `12.4s`, `3m 5s`.
 * @param ms Duration in milliseconds
 * @returns Formatted duration string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const rest = Math.round(seconds - minutes * 60);
  return `${minutes}m ${rest}s`;
}
