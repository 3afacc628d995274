/**
 * Health Route - Fastify Plugin
 * Liveness plus model and connection pool status
 */

import { FastifyPluginAsync } from 'fastify';
import { getPoolStats, isDatabaseConfigured } from '../utils/db';

export interface HealthRouteOptions {
    isModelLoaded: () => boolean;
}

/**
 * Formats uptime seconds into a human-readable string
 */
export function formatUptime(seconds: number): string {
    const days = Math.floor(seconds / 86400);
    const hours = Math.floor((seconds % 86400) / 3600);
    const minutes = Math.floor((seconds % 3600) / 60);
    const secs = Math.floor(seconds % 60);

    const parts: string[] = [];
    if (days > 0) parts.push(`${days}d`);
    if (hours > 0) parts.push(`${hours}h`);
    if (minutes > 0) parts.push(`${minutes}m`);
    if (secs > 0 || parts.length === 0) parts.push(`${secs}s`);

    return parts.join(' ');
}

export function createHealthRoutes(options: HealthRouteOptions): FastifyPluginAsync {
    return async (fastify) => {
        fastify.get('/', async () => {
            const pool = getPoolStats();
            const modelLoaded = options.isModelLoaded();

            return {
                status: modelLoaded ? 'ok' : 'degraded',
                timestamp: new Date().toISOString(),
                uptime: Math.floor(process.uptime()),
                uptimeFormatted: formatUptime(process.uptime()),
                model: { loaded: modelLoaded },
                database: {
                    configured: isDatabaseConfigured(),
                    pool,
                },
            };
        });
    };
}
