/**
 * UTC calendar arithmetic on YYYY-MM-DD strings.
 * ISO dates compare lexically, so callers use plain string comparison.
 */

const DAY_MS = 86_400_000

export function parseISODate(date: string): Date {
  return new Date(date + 'T00:00:00Z')
}

export function formatISODate(d: Date): string {
  return d.toISOString().slice(0, 10)
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate()
}

/** Build a date, clamping the day to the month's length (Feb 30 → Feb 28/29). */
export function makeDate(year: number, month: number, day: number): string {
  const clamped = Math.min(day, daysInMonth(year, month))
  return formatISODate(new Date(Date.UTC(year, month - 1, clamped)))
}

export function addDays(date: string, days: number): string {
  return formatISODate(new Date(parseISODate(date).getTime() + days * DAY_MS))
}

/** Positive when `to` is after `from`. */
export function daysBetween(from: string, to: string): number {
  return Math.round((parseISODate(to).getTime() - parseISODate(from).getTime()) / DAY_MS)
}

export function yearMonth(date: string): { year: number; month: number } {
  const d = parseISODate(date)
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1 }
}

/** Step a (year, month) pair by `delta` months. */
export function shiftMonth(year: number, month: number, delta: number): { year: number; month: number } {
  const index = year * 12 + (month - 1) + delta
  return { year: Math.floor(index / 12), month: (index % 12) + 1 }
}
