import { isAfter, isBefore, isValid, parse } from "date-fns";
import { DateRange } from "../types/opposition-interface";

export const US_DATE_FORMAT = "MM/dd/yyyy";

const BOUNDED_DATE = /\b(\d{2}\/\d{2}\/\d{4})\b/;
const UNBOUNDED_DATE = /(\d{2}\/\d{2}\/\d{4})/;

/** First MM/DD/YYYY date standing on word boundaries. */
export function findDate(text: string): string | null {
  return text.match(BOUNDED_DATE)?.[1] ?? null;
}

/** Like findDate, for text where dates run into neighbouring words. */
export function findLooseDate(text: string): string | null {
  return text.match(UNBOUNDED_DATE)?.[1] ?? null;
}

export function parseUsDate(value: string): Date | null {
  const parsed = parse(value, US_DATE_FORMAT, new Date(0));
  return isValid(parsed) ? parsed : null;
}

export function hasDateRange(range?: DateRange): boolean {
  return Boolean(range?.startDate || range?.endDate);
}

/**
 * Inclusive range check on MM/DD/YYYY strings. A date, or a bound, that does
 * not parse puts the value outside the range.
 */
export function isWithinRange(value: string, range: DateRange): boolean {
  const date = parseUsDate(value);
  if (!date) return false;

  if (range.startDate) {
    const start = parseUsDate(range.startDate);
    if (!start || isBefore(date, start)) return false;
  }

  if (range.endDate) {
    const end = parseUsDate(range.endDate);
    if (!end || isAfter(date, end)) return false;
  }

  return true;
}
