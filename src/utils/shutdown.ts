import type { FastifyInstance } from 'fastify';
import { Logger } from './logger';
import { closePool } from './db';
import { SHUTDOWN_LIMITS } from '../config/limits';


export function initGracefulShutdown(app: FastifyInstance): void {
    let isShuttingDown = false;

    const shutdown = async (signal: string) => {
        if (isShuttingDown) return;
        isShuttingDown = true;

        Logger.info(`[Shutdown] Received ${signal}, starting graceful shutdown...`);

        // hard timeout in case shutdown hangs
        const forceExitTimeout = setTimeout(() => {
            Logger.warn('[Shutdown] Forced exit due to timeout');
            process.exit(1);
        }, SHUTDOWN_LIMITS.SHUTDOWN_TIMEOUT_MS);


        try {
            await app.close();
            Logger.info('[Shutdown] HTTP server closed');
        } catch (error) {
            Logger.error('[Shutdown] Failed to close HTTP server', { error });
        }


        try {
            await closePool();
            Logger.info('[Shutdown] Database connection closed');
        } catch (error) {
            Logger.error('[Shutdown] Failed to close database', { error });
        }

        clearTimeout(forceExitTimeout);
        Logger.info('[Shutdown] Graceful shutdown complete');
        process.exit(0);
    };


    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));

    Logger.info('[Shutdown] Graceful shutdown handlers registered');
}
