import { ValidationError } from '../../utils/errors';
import { isDateKey } from '../../utils/dates';
import { toDailyRows } from './rows';
import type { DailySalesRow, DateKey, HistoricalStore, SalesPoint } from '../forecasting/types';

/**
 * Historical store held in process memory. Used when no database is
 * configured and as the store behind tests.
 */
export class InMemoryHistoricalStore implements HistoricalStore {
    private readonly rows: readonly DailySalesRow[];
    private readonly categories: readonly string[];

    constructor(points: readonly SalesPoint[] = []) {
        const seen = new Set<string>();
        for (const point of points) {
            if (!isDateKey(point.date)) {
                throw new ValidationError(`Invalid sales date '${point.date}'`, { field: 'date' });
            }
            const key = `${point.date}|${point.category}`;
            if (seen.has(key)) {
                throw new ValidationError(`Duplicate sales point for ${point.category} on ${point.date}`, {
                    context: { date: point.date, category: point.category },
                });
            }
            seen.add(key);
        }

        this.rows = Object.freeze(toDailyRows(points));
        this.categories = Object.freeze(Array.from(new Set(points.map((p) => p.category))).sort());
    }

    /** Builds a store from dense rows, e.g. `{ date, values: { Books: 12 } }` */
    static fromDailyRows(rows: readonly DailySalesRow[]): InMemoryHistoricalStore {
        return new InMemoryHistoricalStore(
            rows.flatMap((row) =>
                Object.entries(row.values).map(([category, amount]) => ({ date: row.date, category, amount }))
            )
        );
    }

    async getRange(start: DateKey, end: DateKey): Promise<DailySalesRow[]> {
        return this.rows
            .filter((row) => row.date >= start && row.date <= end)
            .map((row) => ({ date: row.date, values: { ...row.values } }));
    }

    async listCategories(): Promise<string[]> {
        return [...this.categories];
    }
}
