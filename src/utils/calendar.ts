import { ReleaseWeek, WeekCoordinate } from '../types';
import { AppError, ErrorType } from './error-handler';

export const WEEK_ANCHORS = ['contains-jan-1', 'first-saturday'] as const;

/**
 * How week 1 of a year is placed:
 * - `contains-jan-1`: the Saturday-to-Friday week that contains January 1
 * - `first-saturday`: the week starting on the first Saturday on or after January 1
 */
export type WeekAnchor = (typeof WEEK_ANCHORS)[number];

export const WEEKS_PER_YEAR = 52;

const DAY_MS = 24 * 60 * 60 * 1000;
const SATURDAY = 6;

function epochDay(date: Date): number {
  return Math.floor(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()) / DAY_MS);
}

function fromEpochDay(day: number): Date {
  return new Date(day * DAY_MS);
}

/**
 * Format a date as YYYY-MM-DD (UTC calendar day)
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Parse a strict YYYY-MM-DD string into a UTC midnight Date.
 * Returns null for anything else, including month or year precision
 * ("2023-10", "2023") and impossible days ("2023-02-30").
 */
export function parseDayPrecisionDate(value: string): Date | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    return null;
  }
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (Number.isNaN(date.getTime()) || formatDate(date) !== value) {
    return null;
  }
  return date;
}

/**
 * Saturday-to-Friday release calendar. All arithmetic is on UTC calendar days.
 */
export class Calendar {
  constructor(readonly anchor: WeekAnchor = 'contains-jan-1') {}

  /**
   * Epoch day of the Saturday that starts week 1 of `year`
   */
  private weekOneStart(year: number): number {
    const jan1 = Math.floor(Date.UTC(year, 0, 1) / DAY_MS);
    const weekday = fromEpochDay(jan1).getUTCDay();
    if (this.anchor === 'contains-jan-1') {
      return jan1 - ((weekday + 1) % 7);
    }
    return jan1 + ((SATURDAY - weekday + 7) % 7);
  }

  private coordinateOfDay(day: number): WeekCoordinate {
    let year = fromEpochDay(day).getUTCFullYear();
    if (day >= this.weekOneStart(year + 1)) {
      year += 1;
    } else if (day < this.weekOneStart(year)) {
      year -= 1;
    }
    const offset = day - this.weekOneStart(year);
    return { year, week: Math.min(WEEKS_PER_YEAR, Math.floor(offset / 7) + 1) };
  }

  weekOf(date: Date): WeekCoordinate {
    return this.coordinateOfDay(epochDay(date));
  }

  /**
   * First and last day of a week. Week 52 runs up to the day before the next
   * year's week 1, so in years with 53 Saturdays it spans 14 days.
   */
  rangeOf(year: number, week: number): { start: Date; end: Date } {
    if (!Number.isInteger(year) || !Number.isInteger(week) || week < 1 || week > WEEKS_PER_YEAR) {
      throw new AppError(
        ErrorType.ValidationError,
        `Week must be an integer between 1 and ${WEEKS_PER_YEAR} (got ${year}/${week})`,
      );
    }
    const start = this.weekOneStart(year) + (week - 1) * 7;
    const end = week === WEEKS_PER_YEAR ? this.weekOneStart(year + 1) - 1 : start + 6;
    return { start: fromEpochDay(start), end: fromEpochDay(end) };
  }

  currentWeek(now: Date = new Date()): WeekCoordinate {
    return this.weekOf(now);
  }

  releaseWeekOf(date: Date): ReleaseWeek {
    const { year, week } = this.weekOf(date);
    return { year, week, ...this.rangeOf(year, week) };
  }

  releaseWeek(year: number, week: number): ReleaseWeek {
    return { year, week, ...this.rangeOf(year, week) };
  }

  /**
   * The week containing `date` followed by `previous` earlier weeks, most recent first
   */
  weeksEndingAt(date: Date, previous: number = 0): ReleaseWeek[] {
    const weeks: ReleaseWeek[] = [this.releaseWeekOf(date)];
    for (let i = 0; i < previous; i++) {
      const dayBefore = epochDay(weeks[weeks.length - 1].start) - 1;
      weeks.push(this.releaseWeekOf(fromEpochDay(dayBefore)));
    }
    return weeks;
  }

  contains(week: ReleaseWeek, date: Date): boolean {
    const day = epochDay(date);
    return day >= epochDay(week.start) && day <= epochDay(week.end);
  }
}
