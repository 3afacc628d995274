/**
 * PostgreSQL Historical Store
 *
 * Reads normalized `sales_points` rows (one per date and category) and folds
 * them into dense daily rows. See sql/schema.sql.
 */

import type { Pool } from 'pg';
import { Logger } from '../../utils/logger';
import { toDailyRows } from './rows';
import type { DailySalesRow, DateKey, HistoricalStore } from '../forecasting/types';

type SalesPointRow = {
    date: string;
    category: string;
    amount: number;
};

const RANGE_QUERY = `
    SELECT to_char(sale_date, 'YYYY-MM-DD') AS date,
           category,
           SUM(amount)::float8 AS amount
      FROM sales_points
     WHERE sale_date BETWEEN $1::date AND $2::date
     GROUP BY sale_date, category
     ORDER BY sale_date, category`;

const CATEGORIES_QUERY = `SELECT DISTINCT category FROM sales_points ORDER BY category`;

export class PgHistoricalStore implements HistoricalStore {
    constructor(private readonly db: Pick<Pool, 'query'>) {}

    async getRange(start: DateKey, end: DateKey): Promise<DailySalesRow[]> {
        const result = await this.db.query<SalesPointRow>(RANGE_QUERY, [start, end]);
        Logger.debug('[Store] Loaded sales range', { start, end, points: result.rows.length });
        return toDailyRows(result.rows.map((row) => ({
            date: row.date,
            category: row.category,
            amount: Number(row.amount),
        })));
    }

    async listCategories(): Promise<string[]> {
        const result = await this.db.query<{ category: string }>(CATEGORIES_QUERY);
        return result.rows.map((row) => row.category);
    }
}
