import crypto from 'crypto';
import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { RATE_LIMITS } from './config/limits';
import { registerRoutes, type RouteDeps } from './config/routes';
import { Logger, fastifyLoggerConfig } from './utils/logger';
import { isForecastServiceError, toErrorResponse } from './utils/errors';

export interface BuildAppOptions extends RouteDeps {
    /** Fastify's own logger; off in tests */
    logger?: boolean;
}

function parseCorsOrigins(): string[] {
    return process.env.CORS_ORIGINS
        ? process.env.CORS_ORIGINS.split(',').map((value) => value.trim()).filter(Boolean)
        : [];
}

/**
 * Builds the Fastify instance with plugins, hooks and routes registered.
 * Listening is left to the caller.
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
    const fastify = Fastify({
        logger: options.logger === false ? false : fastifyLoggerConfig,
        disableRequestLogging: true,
        trustProxy: true,
        // Reuse an upstream correlation id (load balancer, dashboard) when present
        genReqId: (req) => {
            const existingId = req.headers['x-request-id'];
            return typeof existingId === 'string' && existingId.length > 0
                ? existingId
                : `req-${Date.now()}-${crypto.randomBytes(4).toString('hex')}`;
        },
    });

    const allowedOrigins = parseCorsOrigins();
    await fastify.register(cors, {
        // No allowlist configured: reflect any origin
        origin: allowedOrigins.length > 0 ? allowedOrigins : true,
        methods: ['GET', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'x-request-id'],
    });

    await fastify.register(rateLimit, {
        max: RATE_LIMITS.MAX_REQUESTS,
        timeWindow: RATE_LIMITS.WINDOW,
        allowList: (req) => (req.url || '').startsWith('/health'),
        errorResponseBuilder: () => ({
            error: 'Too many requests, please try again later.',
            code: 'RATE_LIMITED',
            isRecoverable: true,
        }),
    });

    await fastify.register(helmet, {
        contentSecurityPolicy: {
            directives: {
                defaultSrc: ["'self'"],
                scriptSrc: ["'self'"],
                objectSrc: ["'none'"],
                upgradeInsecureRequests: [],
            }
        },
        dnsPrefetchControl: { allow: false },
        referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
        hsts: { maxAge: 31536000, includeSubDomains: true },
    });

    fastify.addHook('onRequest', async (request, reply) => {
        reply.header('x-request-id', request.id);
    });

    fastify.addHook('onResponse', async (request, reply) => {
        if (!request.url.includes('/health')) {
            Logger.http(`${request.method} ${request.url}`, {
                status: reply.statusCode,
                duration: `${Math.round(reply.elapsedTime)}ms`,
                requestId: request.id,
            });
        }
    });

    // Disable caching for API responses
    fastify.addHook('onSend', async (_request, reply, payload) => {
        reply.header('Cache-Control', 'no-store, no-cache, must-revalidate, proxy-revalidate');
        reply.header('Pragma', 'no-cache');
        reply.header('Expires', '0');
        return payload;
    });

    // Global Error Handler
    fastify.setErrorHandler((error: FastifyError, request, reply) => {
        if (isForecastServiceError(error)) {
            return reply.status(error.statusCode).send({ ...toErrorResponse(error), requestId: request.id });
        }

        const statusCode = error.statusCode || 500;
        const isClientError = statusCode >= 400 && statusCode < 500;

        if (isClientError) {
            Logger.warn('Client Error', {
                error: error.message, path: request.url, method: request.method, statusCode,
            });
        } else {
            Logger.error('Server Error', {
                error: error.message, stack: error.stack, path: request.url,
                method: request.method, requestId: request.id,
            });
        }

        return reply.status(statusCode).send({
            error: isClientError ? error.message : 'Internal Server Error',
            code: isClientError ? error.code : 'INTERNAL_ERROR',
            isRecoverable: isClientError,
            requestId: request.id,
        });
    });

    fastify.setNotFoundHandler((request, reply) => {
        return reply.status(404).send({
            error: `Route ${request.method} ${request.url} not found`,
            code: 'NOT_FOUND',
            isRecoverable: false,
        });
    });

    await registerRoutes(fastify, options);

    return fastify;
}
