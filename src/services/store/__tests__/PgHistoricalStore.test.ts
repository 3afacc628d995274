import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PgHistoricalStore } from '../PgHistoricalStore';

vi.mock('../../../utils/logger', () => ({
    Logger: {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    }
}));

describe('PgHistoricalStore', () => {
    const query = vi.fn();
    const store = new PgHistoricalStore({ query });

    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('queries the inclusive range and folds rows per date', async () => {
        query.mockResolvedValue({
            rows: [
                { date: '2024-01-01', category: 'Beauty', amount: 4 },
                { date: '2024-01-01', category: 'Books', amount: 10.5 },
                { date: '2024-01-03', category: 'Books', amount: 30 },
            ],
        });

        const rows = await store.getRange('2024-01-01', '2024-01-03');

        expect(query).toHaveBeenCalledWith(expect.stringContaining('FROM sales_points'), ['2024-01-01', '2024-01-03']);
        expect(rows).toEqual([
            { date: '2024-01-01', values: { Beauty: 4, Books: 10.5 } },
            { date: '2024-01-03', values: { Books: 30 } },
        ]);
    });

    it('coerces numeric strings from the driver', async () => {
        query.mockResolvedValue({ rows: [{ date: '2024-01-02', category: 'Books', amount: '12.25' }] });

        await expect(store.getRange('2024-01-02', '2024-01-02')).resolves.toEqual([
            { date: '2024-01-02', values: { Books: 12.25 } },
        ]);
    });

    it('lists distinct categories', async () => {
        query.mockResolvedValue({ rows: [{ category: 'Beauty' }, { category: 'Books' }] });

        await expect(store.listCategories()).resolves.toEqual(['Beauty', 'Books']);
        expect(query).toHaveBeenCalledWith(expect.stringContaining('SELECT DISTINCT category'));
    });

    it('propagates query failures', async () => {
        query.mockRejectedValue(new Error('connection terminated'));

        await expect(store.getRange('2024-01-01', '2024-01-02')).rejects.toThrow('connection terminated');
    });
});
