export const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

export const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'] as const;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function toIsoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function parseIsoDate(iso: string): Date {
  const match = iso.match(ISO_DATE);
  if (!match) {
    throw new Error(`Invalid ISO date: ${iso}`);
  }
  return new Date(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
}

export function addDays(iso: string, days: number): string {
  const date = parseIsoDate(iso);
  date.setDate(date.getDate() + days);
  return toIsoDate(date);
}

export function daysBetween(fromIso: string, toIso: string): number {
  const from = parseIsoDate(fromIso).getTime();
  const to = parseIsoDate(toIso).getTime();
  return Math.round((to - from) / (1000 * 60 * 60 * 24));
}

export interface DateLabels {
  long: string;
  weekdayShort: string;
  weekdayLong: string;
  day: string;
}

/** Text forms a booking calendar commonly renders for a day. */
export function dateLabels(iso: string): DateLabels {
  const date = parseIsoDate(iso);
  const month = MONTHS[date.getMonth()];
  const weekday = WEEKDAYS[date.getDay()];
  const day = String(date.getDate());

  return {
    long: `${month} ${day}, ${date.getFullYear()}`,
    weekdayShort: `${weekday.slice(0, 3)} ${day}`,
    weekdayLong: `${weekday} ${day}`,
    day,
  };
}
