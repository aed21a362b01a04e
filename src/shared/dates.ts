import { endOfMonth, format, getDaysInMonth, startOfMonth, subDays, subMonths } from "date-fns";
import { DATE_FORMAT } from "./validation/fields";

export type MonthBounds = {
  /** `YYYY-MM` */
  key: string;
  start: string;
  end: string;
  days: number;
};

export function monthBounds(year: number, month: number): MonthBounds {
  const first = new Date(year, month - 1, 1);
  return {
    key: format(first, "yyyy-MM"),
    start: format(startOfMonth(first), DATE_FORMAT),
    end: format(endOfMonth(first), DATE_FORMAT),
    days: getDaysInMonth(first),
  };
}

export function monthOf(date: Date): MonthBounds {
  return monthBounds(date.getFullYear(), date.getMonth() + 1);
}

/** The `count` months ending with the month of `date`, newest first. */
export function trailingMonths(date: Date, count: number): MonthBounds[] {
  return Array.from({ length: count }, (_, i) => monthOf(subMonths(date, i)));
}

export function today(now: Date = new Date()): string {
  return format(now, DATE_FORMAT);
}

/** The `days` calendar days ending with `now`, as an inclusive range. */
export function trailingDays(now: Date, days: number): { from: string; to: string } {
  return { from: format(subDays(now, days - 1), DATE_FORMAT), to: today(now) };
}
