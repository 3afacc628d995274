import type { DailySalesRow, DateKey } from './types';

interface BufferEntry {
    source: 'history' | 'synthesized';
    /** Undefined for a synthesized date whose values were never resolved */
    values?: Readonly<Record<string, number>>;
}

/**
 * Append-only, date-indexed view over stored history plus rows committed
 * during the current synthesis run.
 *
 * Synthesized dates must be committed in strictly ascending order, which is
 * what lets a later day's lags read values produced earlier in the same run.
 * A stored date is never overwritten.
 */
export class WorkingBuffer {
    private readonly entries = new Map<DateKey, BufferEntry>();
    private lastCommitted: DateKey | null = null;

    constructor(history: readonly DailySalesRow[] = []) {
        for (const row of history) {
            this.entries.set(row.date, { source: 'history', values: row.values });
        }
    }

    commit(date: DateKey, values?: Record<string, number>): void {
        if (this.lastCommitted !== null && date <= this.lastCommitted) {
            throw new Error(`Synthesized rows must be committed in order: ${date} after ${this.lastCommitted}`);
        }
        this.lastCommitted = date;

        if (this.entries.get(date)?.source === 'history') return;
        this.entries.set(date, { source: 'synthesized', values: values ? { ...values } : undefined });
    }

    /**
     * Value of a category on a date, or undefined when the date is not in the
     * combined view. A known date without the category reads as zero sales.
     */
    valueAt(date: DateKey, category: string): number | undefined {
        const entry = this.entries.get(date);
        if (!entry || !entry.values) return undefined;
        return entry.values[category] ?? 0;
    }

    has(date: DateKey): boolean {
        return this.entries.has(date);
    }

    get size(): number {
        return this.entries.size;
    }
}
