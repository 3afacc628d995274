import type { DailySalesRow, SalesPoint } from '../forecasting/types';

/**
 * Folds sales points into one dense row per date, ascending by date.
 * Amounts for the same (date, category) are summed.
 */
export function toDailyRows(points: Iterable<SalesPoint>): DailySalesRow[] {
    const byDate = new Map<string, Record<string, number>>();

    for (const point of points) {
        let values = byDate.get(point.date);
        if (!values) {
            values = {};
            byDate.set(point.date, values);
        }
        values[point.category] = (values[point.category] ?? 0) + point.amount;
    }

    return Array.from(byDate, ([date, values]) => ({ date, values }))
        .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}
