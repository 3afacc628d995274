import { describe, it, expect } from 'vitest';
import {
    aggregateRows,
    calculateGrowthRate,
    categoryShares,
    formatGrowthRate,
    rankCategories,
} from '../CategoryRanker';

describe('aggregateRows', () => {
    it('sums each category across dates', () => {
        const totals = aggregateRows([
            { date: '2024-01-01', values: { Books: 10, Beauty: 5 } },
            { date: '2024-01-02', values: { Books: 15 } },
        ]);

        expect(Object.fromEntries(totals)).toEqual({ Books: 25, Beauty: 5 });
    });
});

describe('rankCategories', () => {
    const totals = new Map([
        ['Books', 50],
        ['Electronics', 100],
        ['Beauty', 50],
    ]);

    it('orders by amount then by name', () => {
        expect(categoryShares(totals).map((entry) => entry.category)).toEqual(['Electronics', 'Beauty', 'Books']);
    });

    it('computes percentages against the full grand total', () => {
        const ranking = rankCategories(totals, 2);

        expect(ranking.totalAmount).toBe(200);
        expect(ranking.totalAmountFormatted).toBe('$200.00');
        expect(ranking.topCategories).toEqual([
            {
                category: 'Electronics',
                amount: 100,
                percentage: 50,
                amountFormatted: '$100.00',
                percentageFormatted: '50.00%',
            },
            {
                category: 'Beauty',
                amount: 50,
                percentage: 25,
                amountFormatted: '$50.00',
                percentageFormatted: '25.00%',
            },
        ]);
    });

    it('shares of every category sum to 100', () => {
        const uneven = new Map([['Books', 1], ['Beauty', 2], ['Toys', 4]]);
        const sum = categoryShares(uneven).reduce((acc, entry) => acc + entry.percentage, 0);
        expect(sum).toBeCloseTo(100, 10);
    });

    it('returns every category when top N exceeds the count', () => {
        expect(rankCategories(totals, 10).topCategories).toHaveLength(3);
    });

    it('reports zero percentages when nothing sold', () => {
        const ranking = rankCategories(new Map([['Books', 0], ['Beauty', 0]]), 5);

        expect(ranking.totalAmount).toBe(0);
        expect(ranking.topCategories.map((entry) => entry.percentage)).toEqual([0, 0]);
        expect(ranking.topCategories.map((entry) => entry.category)).toEqual(['Beauty', 'Books']);
    });

    it('handles an empty period', () => {
        expect(rankCategories(new Map(), 5)).toEqual({
            totalAmount: 0,
            totalAmountFormatted: '$0.00',
            topCategories: [],
        });
    });
});

describe('calculateGrowthRate', () => {
    it('measures change against the baseline', () => {
        expect(calculateGrowthRate(150, 100)).toEqual({ kind: 'finite', percentage: 50 });
        expect(calculateGrowthRate(50, 100)).toEqual({ kind: 'finite', percentage: -50 });
    });

    it('is zero when both periods are empty', () => {
        expect(calculateGrowthRate(0, 0)).toEqual({ kind: 'finite', percentage: 0 });
    });

    it('is infinite from a zero baseline', () => {
        expect(calculateGrowthRate(10, 0)).toEqual({ kind: 'infinite' });
    });

    it('formats infinite growth as N/A', () => {
        expect(formatGrowthRate({ kind: 'infinite' })).toBe('N/A');
        expect(formatGrowthRate({ kind: 'finite', percentage: 50 })).toBe('50.00%');
    });
});
