/**
 * Date and statement-period helpers. All calendar arithmetic is done in UTC.
 */

const MS_PER_DAY = 1000 * 60 * 60 * 24;

/** Day zero of the spreadsheet serial date system */
const EXCEL_EPOCH_MS = Date.UTC(1899, 11, 30);

const SERIAL_PATTERN = /^[+-]?\d+(\.\d+)?$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const ZONED_DATE_TIME_PATTERN = /^\d{4}-\d{2}-\d{2}T[\d:.]+(Z|[+-]\d{2}:?\d{2})$/i;
const PERIOD_PATTERN = /^(\d{4})-(\d{2})(-\d{2})?$/;

function fromExcelSerial(serial: number): Date {
  return new Date(EXCEL_EPOCH_MS + Math.round(serial * MS_PER_DAY));
}

function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

/**
 * Parse a date cell: Date objects, ISO strings, or spreadsheet serial numbers.
 * ISO timestamps with a zone are read as that instant; any other text is read
 * as the calendar date it names, at UTC midnight, whatever the host time zone.
 *
 * @returns The date, or null when the value cannot be read as one
 */
export function parseDateValue(value: unknown): Date | null {
  if (value instanceof Date) {
    return isValidDate(value) ? value : null;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? fromExcelSerial(value) : null;
  }

  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();
  if (text.length === 0) {
    return null;
  }

  if (SERIAL_PATTERN.test(text)) {
    return fromExcelSerial(Number(text));
  }

  const iso = ISO_DATE_PATTERN.exec(text);
  if (iso) {
    const date = new Date(Date.UTC(Number(iso[1]), Number(iso[2]) - 1, Number(iso[3])));
    return isValidDate(date) ? date : null;
  }

  const parsed = new Date(text);
  if (!isValidDate(parsed)) {
    return null;
  }
  if (ZONED_DATE_TIME_PATTERN.test(text)) {
    return parsed;
  }
  // The built-in parser reads these in local time
  return new Date(Date.UTC(parsed.getFullYear(), parsed.getMonth(), parsed.getDate()));
}

/**
 * Format a date as its statement period (YYYY-MM, UTC).
 */
export function toPeriod(date: Date): string {
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  return `${date.getUTCFullYear()}-${month}`;
}

/**
 * Parse a statement period: "YYYY-MM", "YYYY-MM-DD", a Date, or a serial date.
 *
 * @returns The period as YYYY-MM, or null if the value is not a valid period
 */
export function parsePeriod(value: unknown): string | null {
  if (typeof value === 'string') {
    const match = PERIOD_PATTERN.exec(value.trim());
    if (match) {
      const month = Number(match[2]);
      return month >= 1 && month <= 12 ? `${match[1]}-${match[2]}` : null;
    }
  }

  const date = parseDateValue(value);
  return date ? toPeriod(date) : null;
}

/**
 * First and last day of a statement period (UTC midnight).
 */
export function periodBounds(period: string): { start: Date; end: Date } {
  const match = PERIOD_PATTERN.exec(period);
  if (!match) {
    throw new RangeError(`Invalid period: ${period}`);
  }
  const year = Number(match[1]);
  const monthIndex = Number(match[2]) - 1;
  return {
    start: new Date(Date.UTC(year, monthIndex, 1)),
    end: new Date(Date.UTC(year, monthIndex + 1, 0)),
  };
}

/**
 * Whole days between two dates, ignoring time of day.
 */
export function daysBetween(a: Date, b: Date): number {
  const utcA = Date.UTC(a.getUTCFullYear(), a.getUTCMonth(), a.getUTCDate());
  const utcB = Date.UTC(b.getUTCFullYear(), b.getUTCMonth(), b.getUTCDate());
  return Math.abs(Math.round((utcB - utcA) / MS_PER_DAY));
}

/**
 * Days from a date to the nearest edge of a period; zero when inside it.
 */
export function daysOutsidePeriod(date: Date, period: string): number {
  const { start, end } = periodBounds(period);
  if (date.getTime() < start.getTime()) {
    return daysBetween(date, start);
  }
  if (date.getTime() > end.getTime() && daysBetween(date, end) > 0) {
    return daysBetween(date, end);
  }
  return 0;
}
