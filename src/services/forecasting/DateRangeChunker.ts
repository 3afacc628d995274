import { daysBetween, shiftDateKey } from '../../utils/dates';
import type { DateKey } from './types';

export interface DateChunk {
    start: DateKey;
    end: DateKey;
}

export interface ChunkOptions {
    /** Split runs longer than this many days; unbounded when omitted */
    maxChunkDays?: number;
}

/**
 * Groups missing dates into maximal contiguous runs.
 *
 * Input order is irrelevant and duplicates collapse. Any gap of a day or
 * more starts a new chunk, so every chunk is internally contiguous and the
 * union of chunk days equals the input set.
 */
export function chunkMissingDates(dates: Iterable<DateKey>, options: ChunkOptions = {}): DateChunk[] {
    const sorted = Array.from(new Set(dates)).sort();
    if (sorted.length === 0) return [];

    const maxDays = options.maxChunkDays && options.maxChunkDays > 0
        ? options.maxChunkDays
        : Number.POSITIVE_INFINITY;

    const chunks: DateChunk[] = [];
    let start = sorted[0];
    let previous = sorted[0];
    let length = 1;

    for (const date of sorted.slice(1)) {
        const contiguous = daysBetween(previous, date) === 1;
        if (contiguous && length < maxDays) {
            previous = date;
            length++;
            continue;
        }
        chunks.push({ start, end: previous });
        start = date;
        previous = date;
        length = 1;
    }
    chunks.push({ start, end: previous });

    return chunks;
}

export function chunkLength(chunk: DateChunk): number {
    return daysBetween(chunk.start, chunk.end) + 1;
}

/** Expands a chunk back into its individual dates */
export function chunkDates(chunk: DateChunk): DateKey[] {
    const days = chunkLength(chunk);
    return Array.from({ length: days }, (_, i) => shiftDateKey(chunk.start, i));
}
