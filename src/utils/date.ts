/**
 * Calendar-date helpers. Fact tables and unified rows carry dates as
 * yyyy-MM-dd strings, which sort and compare lexically.
 */

import { format, isValid, parse, subDays } from 'date-fns';
import { z } from 'zod';

export const ISO_DATE_FORMAT = 'yyyy-MM-dd';

export interface DateRange {
    /** Inclusive */
    start: string;
    /** Inclusive */
    end: string;
}

/**
 * Strict yyyy-MM-dd check. Rejects impossible dates like 2025-02-30.
 */
export function isIsoDate(value: string): boolean {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
        return false;
    }
    const parsed = parse(value, ISO_DATE_FORMAT, new Date(0));
    return isValid(parsed) && format(parsed, ISO_DATE_FORMAT) === value;
}

/**
 * UTC calendar date of an instant.
 */
export function utcIsoDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

/**
 * The last `days` calendar days ending today (UTC), inclusive.
 */
export function defaultDateRange(now: Date, days = 30): DateRange {
    const end = utcIsoDate(now);
    const start = format(subDays(parse(end, ISO_DATE_FORMAT, new Date(0)), days - 1), ISO_DATE_FORMAT);
    return { start, end };
}

export function isWithinRange(date: string, range: DateRange): boolean {
    return date >= range.start && date <= range.end;
}

export const isoDateSchema = z.string().refine(isIsoDate, { message: 'Expected a yyyy-MM-dd date' });

export const dateRangeSchema = z
    .object({ start: isoDateSchema, end: isoDateSchema })
    .refine(range => range.start <= range.end, { message: 'start must not be after end' });
