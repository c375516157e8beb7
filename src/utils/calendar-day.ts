/**
 * Calendar day key used by the usage ledger (`YYYY-MM-DD`, server local time).
 */
export function calendarDay(date: Date = new Date()): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Shift a `YYYY-MM-DD` key by whole days.
 */
export function addDays(day: string, days: number): string {
  const [year, month, date] = day.split('-').map(Number);
  return calendarDay(new Date(year, month - 1, date + days));
}
