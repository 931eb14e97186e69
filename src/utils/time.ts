/**
 * @summary Format a date as `YYYY-MM-DD HH:00:00` in UTC, rounded down to the hour.
 * @example
 * ```ts
 * roundedTimestamp(new Date(Date.UTC(2024, 0, 2, 3, 45, 6)))
 * // '2024-01-02 03:00:00'
 * ```
 */
export function roundedTimestamp(date: Date = new Date()): string {
  const pad = (value: number): string => String(value).padStart(2, '0')
  const day = `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`
  return `${day} ${pad(date.getUTCHours())}:00:00`
}
