/**
 * Calendar date helpers.
 *
 * Dates are handled as `YYYY-MM-DD` strings (the shape TypeORM hydrates `date`
 * columns into) and computed in UTC, so they compare lexicographically.
 */

export type IsoDate = string;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface CalendarParts {
  year: number;
  month: number; // 1-12
  day: number;
}

export const isIsoDate = (value: string): boolean => {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;

  const year = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10);
  const day = Number.parseInt(match[3], 10);

  return (
    month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month)
  );
};

export const parseIsoDate = (value: IsoDate): CalendarParts => {
  if (!isIsoDate(value)) {
    throw new RangeError(`Invalid calendar date: ${value}`);
  }
  const [year, month, day] = value
    .split('-')
    .map((part) => Number.parseInt(part, 10));
  return { year, month, day };
};

export const formatIsoDate = ({ year, month, day }: CalendarParts): IsoDate => {
  const yyyy = String(year).padStart(4, '0');
  const mm = String(month).padStart(2, '0');
  const dd = String(day).padStart(2, '0');
  return `${yyyy}-${mm}-${dd}`;
};

export const toIsoDate = (date: Date): IsoDate =>
  formatIsoDate({
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
  });

export const todayIsoDate = (now: Date = new Date()): IsoDate => toIsoDate(now);

export const daysInMonth = (year: number, month: number): number =>
  new Date(Date.UTC(year, month, 0)).getUTCDate();

/**
 * Advances a date by whole calendar months. The day of month is clamped to
 * the last day of the target month: 2023-01-31 + 1 → 2023-02-28.
 */
export const addMonthsClamped = (date: IsoDate, months: number): IsoDate => {
  const { year, month, day } = parseIsoDate(date);
  const monthIndex = month - 1 + months;
  const targetYear = year + Math.floor(monthIndex / 12);
  const targetMonth = (((monthIndex % 12) + 12) % 12) + 1;

  return formatIsoDate({
    year: targetYear,
    month: targetMonth,
    day: Math.min(day, daysInMonth(targetYear, targetMonth)),
  });
};

/**
 * First and last instant (UTC) of a calendar year.
 */
export const yearBounds = (year: number): { start: Date; end: Date } => ({
  start: new Date(Date.UTC(year, 0, 1, 0, 0, 0, 0)),
  end: new Date(Date.UTC(year, 11, 31, 23, 59, 59, 999)),
});

/**
 * Inclusive day bounds used by history filters: a start date begins at
 * 00:00:00.000 UTC and an end date runs through 23:59:59.999 UTC.
 */
export const startOfDay = (date: IsoDate): Date => {
  const { year, month, day } = parseIsoDate(date);
  return new Date(Date.UTC(year, month - 1, day, 0, 0, 0, 0));
};

export const endOfDay = (date: IsoDate): Date => {
  const { year, month, day } = parseIsoDate(date);
  return new Date(Date.UTC(year, month - 1, day, 23, 59, 59, 999));
};
