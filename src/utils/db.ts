/**
 * PostgreSQL connection pool.
 *
 * Created lazily so the service can run without a database; the pool is
 * only opened when DATABASE_URL is set and a store asks for it.
 *
 * @module utils/db
 */

import { Pool } from 'pg';
import { Logger } from './logger';

const maxPoolSize = parseInt(process.env.DATABASE_POOL_SIZE || '10', 10);

let pool: Pool | null = null;

export function isDatabaseConfigured(): boolean {
    return Boolean(process.env.DATABASE_URL);
}

export function getPool(): Pool {
    if (pool) return pool;

    pool = new Pool({
        connectionString: process.env.DATABASE_URL,
        max: maxPoolSize,
        idleTimeoutMillis: 10000,
        connectionTimeoutMillis: 30000,
    });

    pool.on('error', (err) => {
        Logger.error('[DB Pool] Unexpected connection error', { error: err.message });
    });

    pool.on('connect', () => {
        const current = pool;
        if (!current) return;
        const { totalCount, idleCount, waitingCount } = current;
        const utilization = ((totalCount - idleCount) / maxPoolSize) * 100;

        if (utilization >= 80) {
            Logger.warn('[DB Pool] High connection utilization', {
                utilization: `${utilization.toFixed(1)}%`,
                activeConnections: totalCount - idleCount,
                waitingRequests: waitingCount,
                maxPoolSize,
            });
        }
    });

    return pool;
}

/** Pool statistics for the health endpoint; null when no pool was opened */
export function getPoolStats() {
    if (!pool) return null;

    const { totalCount, idleCount, waitingCount } = pool;
    const activeCount = totalCount - idleCount;
    const utilization = maxPoolSize > 0 ? (activeCount / maxPoolSize) * 100 : 0;

    return {
        totalConnections: totalCount,
        activeConnections: activeCount,
        idleConnections: idleCount,
        waitingRequests: waitingCount,
        maxPoolSize,
        utilizationPercent: Math.round(utilization * 10) / 10,
        isHealthy: utilization < 80 && waitingCount === 0,
    };
}

export async function closePool(): Promise<void> {
    if (!pool) return;
    const closing = pool;
    pool = null;
    await closing.end();
}
