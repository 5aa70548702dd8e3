import { format, isValid, parse } from 'date-fns';

export const BR_DATE_FORMAT = 'dd/MM/yyyy';

/**
 * Reads a spreadsheet date as a local calendar date (midnight).
 * Date cells come out of the workbook as UTC midnight, so their UTC
 * fields are the calendar date. Strings must be dd/MM/yyyy.
 */
export function parseDate(value: unknown): Date | null {
  if (value instanceof Date) {
    if (!isValid(value)) {
      return null;
    }
    return new Date(value.getUTCFullYear(), value.getUTCMonth(), value.getUTCDate());
  }
  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();
  if (!/^\d{2}\/\d{2}\/\d{4}$/.test(text)) {
    return null;
  }
  const date = parse(text, BR_DATE_FORMAT, new Date());
  return isValid(date) ? date : null;
}

export function formatDate(date: Date): string {
  return format(date, BR_DATE_FORMAT);
}

/** 31/12 of the given year, local midnight */
export function yearEnd(year: number): Date {
  return new Date(year, 11, 31);
}
