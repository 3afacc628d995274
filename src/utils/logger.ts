import pino from 'pino';

// Custom levels: `http` sits between debug and info for access lines
const customLevels = {
    error: 50,
    warn: 40,
    info: 30,
    http: 25,
    debug: 20,
};

type LevelName = keyof typeof customLevels;

const isDev = process.env.NODE_ENV === 'development';
const level = process.env.LOG_LEVEL || (isDev ? 'debug' : 'info');

type LogMeta = Record<string, unknown>;

const prettyTransport = {
    target: 'pino-pretty',
    options: {
        colorize: true,
        translateTime: 'yyyy-mm-dd HH:MM:ss:l',
        ignore: 'pid,hostname',
    },
};

const createPinoLogger = () => {
    if (isDev) {
        return pino<LevelName>({
            level,
            customLevels,
            useOnlyCustomLevels: false,
            transport: prettyTransport,
        });
    }

    // Single-line JSON on stdout; collection is left to the container runtime
    return pino<LevelName>({
        level,
        customLevels,
        useOnlyCustomLevels: false,
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: {
            level: (label) => ({ level: label }),
        },
    });
};

const pinoInstance = createPinoLogger();

/** Fastify 5 takes a logger config object, not an instance */
export const fastifyLoggerConfig = isDev
    ? {
        level,
        customLevels,
        useOnlyCustomLevels: false,
        transport: prettyTransport,
    }
    : {
        level,
        customLevels,
        useOnlyCustomLevels: false,
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: {
            level: (label: string) => ({ level: label }),
        },
    };

type LogFn = (message: string, meta?: LogMeta) => void;

export interface AppLogger {
    error: LogFn;
    warn: LogFn;
    info: LogFn;
    http: LogFn;
    debug: LogFn;
}

function wrap(target: pino.Logger<LevelName>): AppLogger {
    const emit = (lvl: LevelName): LogFn => (message, meta) => {
        if (meta) {
            target[lvl](meta, message);
        } else {
            target[lvl](message);
        }
    };

    return {
        error: emit('error'),
        warn: emit('warn'),
        info: emit('info'),
        http: emit('http'),
        debug: emit('debug'),
    };
}

/**
 * Winston-style wrapper around pino.
 *
 * Call sites read `Logger.info('message', { meta })`; pino wants the
 * meta object first, so the wrapper swaps the arguments.
 */
export const Logger: AppLogger = wrap(pinoInstance);
