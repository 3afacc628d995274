/**
 * Date Key Utilities
 *
 * Calendar days travel through the engine as `YYYY-MM-DD` strings so they
 * compare lexically and key maps without timezone drift.
 */

import {
    addDays,
    addMonths,
    differenceInCalendarDays,
    format,
    isValid,
    lastDayOfMonth,
    lastDayOfYear,
    parseISO,
} from 'date-fns';
import { Logger } from './logger';
import { ValidationError } from './errors';
import type { DateKey, Period } from '../services/forecasting/types';

const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export type RangePreset = 'week' | 'month' | 'quarter' | 'year' | 'custom';

export function toDateKey(date: Date): DateKey {
    return format(date, 'yyyy-MM-dd');
}

export function isDateKey(value: string): boolean {
    return DATE_KEY_PATTERN.test(value) && isValid(parseISO(value));
}

export function parseDateKey(value: string, field = 'date'): Date {
    const parsed = parseISO(value);
    if (!DATE_KEY_PATTERN.test(value) || !isValid(parsed)) {
        throw new ValidationError(`${field} must be a valid YYYY-MM-DD date, got '${value}'`, { field });
    }
    return parsed;
}

export function shiftDateKey(key: DateKey, days: number): DateKey {
    return toDateKey(addDays(parseDateKey(key), days));
}

/** Whole calendar days from `from` to `to` (negative if `to` is earlier) */
export function daysBetween(from: DateKey, to: DateKey): number {
    return differenceInCalendarDays(parseDateKey(to), parseDateKey(from));
}

/** Every day from start to end inclusive; empty when end precedes start */
export function eachDateKey(start: DateKey, end: DateKey): DateKey[] {
    const keys: DateKey[] = [];
    const last = parseDateKey(end);
    for (let cursor = parseDateKey(start); cursor <= last; cursor = addDays(cursor, 1)) {
        keys.push(toDateKey(cursor));
    }
    return keys;
}

/**
 * Builds a Period, swapping a reversed range instead of rejecting it.
 */
export function normalizePeriod(start: DateKey, end: DateKey): Period {
    let from = start;
    let to = end;

    if (daysBetween(from, to) < 0) {
        Logger.warn('[Dates] Start date is after end date, swapping', { start, end });
        [from, to] = [to, from];
    }

    return { start: from, end: to, days: daysBetween(from, to) + 1 };
}

/**
 * Resolves optional start/end query parameters.
 * End defaults to today, start to `days` before end.
 */
export function resolveDateRange(
    params: { startDate?: string; endDate?: string; days: number },
    today: Date = new Date()
): Period {
    const end = params.endDate
        ? toDateKey(parseDateKey(params.endDate, 'end_date'))
        : toDateKey(today);
    const start = params.startDate
        ? toDateKey(parseDateKey(params.startDate, 'start_date'))
        : shiftDateKey(end, -params.days);

    return normalizePeriod(start, end);
}

/**
 * Forward-looking period for a named range starting today.
 * `custom` needs explicit dates and is handled by the caller.
 */
export function resolveRangePreset(range: Exclude<RangePreset, 'custom'>, today: Date = new Date()): Period {
    const start = toDateKey(today);

    switch (range) {
        case 'week':
            return normalizePeriod(start, toDateKey(addDays(today, 6)));
        case 'month':
            return normalizePeriod(start, toDateKey(lastDayOfMonth(today)));
        case 'quarter':
            return normalizePeriod(start, toDateKey(lastDayOfMonth(addMonths(today, 3))));
        case 'year':
            return normalizePeriod(start, toDateKey(lastDayOfYear(today)));
    }
}
