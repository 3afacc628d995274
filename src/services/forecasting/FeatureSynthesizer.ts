/**
 * Feature Synthesizer
 *
 * Builds one inference row per date, oldest first. Lag and rolling features
 * read from a working buffer that holds stored history plus every row already
 * committed in the same run, so a forecast for day N sees the predictions
 * made for days N-1, N-7 and so on.
 */

import {
    format,
    getDate,
    getISODay,
    getISOWeek,
    getMonth,
    getQuarter,
    getYear,
    isLastDayOfMonth,
} from 'date-fns';
import type { FeatureConfig } from '../../config/forecasting';
import { eachDateKey, parseDateKey, shiftDateKey } from '../../utils/dates';
import { WorkingBuffer } from './WorkingBuffer';
import type { DailySalesRow, DateKey, FeatureManifest, FeatureVector } from './types';

/** Resolves a synthesized row to per-category values (typically a prediction) */
export type DayResolver = (vector: FeatureVector) => Promise<Record<string, number>>;

export const lagColumn = (category: string, lag: number) => `${category}_lag_${lag}`;
export const rollingAvgColumn = (category: string, window: number) => `${category}_rolling_avg_${window}`;
export const rollingStdColumn = (category: string, window: number) => `${category}_rolling_std_${window}`;

export function specialMonthColumn(month: number): string {
    return `is_${format(new Date(2000, month - 1, 1), 'MMMM').toLowerCase()}`;
}

/**
 * Calendar scalars for a date. Day of week counts Monday as 0;
 * week of year is the ISO week.
 */
export function calendarFeatures(date: Date, specialMonth: number): Record<string, number> {
    const month = getMonth(date) + 1;
    const dayOfWeek = getISODay(date) - 1;

    return {
        year: getYear(date),
        month,
        day: getDate(date),
        day_of_week: dayOfWeek,
        is_weekend: dayOfWeek >= 5 ? 1 : 0,
        week_of_year: getISOWeek(date),
        quarter: getQuarter(date),
        is_month_start: getDate(date) === 1 ? 1 : 0,
        is_month_end: isLastDayOfMonth(date) ? 1 : 0,
        [specialMonthColumn(specialMonth)]: month === specialMonth ? 1 : 0,
    };
}

function mean(values: number[]): number {
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Population standard deviation */
function std(values: number[]): number {
    const avg = mean(values);
    return Math.sqrt(values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / values.length);
}

export class FeatureSynthesizer {
    private readonly columnIndex: ReadonlyMap<string, number>;

    constructor(
        private readonly manifest: FeatureManifest,
        private readonly categories: readonly string[],
        private readonly config: FeatureConfig
    ) {
        this.columnIndex = new Map(manifest.map((name, i) => [name, i]));
    }

    get featureCount(): number {
        return this.manifest.length;
    }

    /**
     * Synthesizes vectors for every date in [start, end].
     *
     * Each date is committed to the buffer before the next one is built. With
     * a resolver, its values are what later dates see; without one the
     * committed row carries no category values.
     */
    async synthesize(
        start: DateKey,
        end: DateKey,
        history: readonly DailySalesRow[],
        resolveDay?: DayResolver
    ): Promise<FeatureVector[]> {
        const buffer = new WorkingBuffer(history);
        const vectors: FeatureVector[] = [];

        for (const date of eachDateKey(start, end)) {
            const vector = this.buildVector(date, buffer);
            const values = resolveDay ? await resolveDay(vector) : undefined;
            buffer.commit(date, values);
            vectors.push(vector);
        }

        return vectors;
    }

    buildVector(date: DateKey, buffer: WorkingBuffer): FeatureVector {
        return { date, values: this.project(this.buildFeatureRecord(date, buffer)) };
    }

    /** All features this synthesizer knows how to compute, by name */
    buildFeatureRecord(date: DateKey, buffer: WorkingBuffer): Record<string, number> {
        const { lagDays, rollingWindows, specialMonth, missingValueDefault } = this.config;
        const record = calendarFeatures(parseDateKey(date), specialMonth);

        const longestWindow = Math.max(0, ...rollingWindows);

        for (const category of this.categories) {
            for (const lag of lagDays) {
                record[lagColumn(category, lag)] =
                    buffer.valueAt(shiftDateKey(date, -lag), category) ?? missingValueDefault;
            }

            // trailing[i] is the value i + 1 days back, or undefined when absent
            const trailing: (number | undefined)[] = [];
            for (let back = 1; back <= longestWindow; back++) {
                trailing.push(buffer.valueAt(shiftDateKey(date, -back), category));
            }

            for (const window of rollingWindows) {
                const available = trailing
                    .slice(0, window)
                    .filter((v): v is number => v !== undefined);
                record[rollingAvgColumn(category, window)] = available.length > 0 ? mean(available) : missingValueDefault;
                record[rollingStdColumn(category, window)] = available.length > 0 ? std(available) : missingValueDefault;
            }
        }

        return record;
    }

    /** Restricts and orders a record to the manifest; unknown columns become 0 */
    project(record: Record<string, number>): number[] {
        const row = new Array<number>(this.manifest.length).fill(0);
        for (const [name, value] of Object.entries(record)) {
            const index = this.columnIndex.get(name);
            if (index !== undefined) row[index] = value;
        }
        return row;
    }
}
