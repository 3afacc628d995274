/**
 * Category Ranker
 *
 * Aggregates per-category amounts and ranks them. Percentages are always
 * shares of the grand total across every category, not only the top N.
 */

import { formatCurrency, formatPercentage } from '../../utils/format';
import type { CategoryTotal, DailySalesRow, GrowthRate, RankedCategory, Ranking } from './types';

/** Sums daily rows into one amount per category */
export function aggregateRows(rows: Iterable<DailySalesRow>): Map<string, number> {
    const totals = new Map<string, number>();
    for (const row of rows) {
        for (const [category, amount] of Object.entries(row.values)) {
            totals.set(category, (totals.get(category) ?? 0) + amount);
        }
    }
    return totals;
}

function compareTotals(a: CategoryTotal, b: CategoryTotal): number {
    if (b.amount !== a.amount) return b.amount - a.amount;
    return a.category < b.category ? -1 : a.category > b.category ? 1 : 0;
}

/**
 * Every category with its share of the grand total, sorted by amount
 * descending and then by name ascending.
 */
export function categoryShares(totals: ReadonlyMap<string, number>): CategoryTotal[] {
    let grandTotal = 0;
    for (const amount of totals.values()) grandTotal += amount;

    return Array.from(totals, ([category, amount]) => ({
        category,
        amount,
        percentage: grandTotal === 0 ? 0 : (amount / grandTotal) * 100,
    })).sort(compareTotals);
}

export function rankCategories(totals: ReadonlyMap<string, number>, topN: number): Ranking {
    let totalAmount = 0;
    for (const amount of totals.values()) totalAmount += amount;

    const topCategories: RankedCategory[] = categoryShares(totals)
        .slice(0, Math.max(0, topN))
        .map((entry) => ({
            ...entry,
            amountFormatted: formatCurrency(entry.amount),
            percentageFormatted: formatPercentage(entry.percentage),
        }));

    return {
        totalAmount,
        totalAmountFormatted: formatCurrency(totalAmount),
        topCategories,
    };
}

export function calculateGrowthRate(current: number, baseline: number): GrowthRate {
    if (baseline === 0) {
        return current > 0 ? { kind: 'infinite' } : { kind: 'finite', percentage: 0 };
    }
    return { kind: 'finite', percentage: ((current - baseline) / baseline) * 100 };
}

export function formatGrowthRate(growth: GrowthRate): string {
    return growth.kind === 'infinite' ? 'N/A' : formatPercentage(growth.percentage);
}
