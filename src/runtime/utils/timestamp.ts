/**
 * Timestamp utilities
 * Consistent local-time timestamps for log lines.
 */

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Format a Date with its local timezone offset
 * @returns Timestamp string like "2025-11-10T19:18:59.832+01:00"
 */
export function formatLocalDate(date: Date = new Date()): string {
  const offset = -date.getTimezoneOffset();
  const offsetSign = offset >= 0 ? '+' : '-';
  const offsetHours = pad(Math.floor(Math.abs(offset) / 60));
  const offsetMinutes = pad(Math.abs(offset) % 60);

  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
    `.${pad(date.getMilliseconds(), 3)}${offsetSign}${offsetHours}:${offsetMinutes}`
  );
}

/**
 * Milliseconds elapsed since `start`, rounded
 */
export function elapsedMs(start: number): number {
  return Math.round(performance.now() - start);
}
