type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
    debug: LogMethod;
    info: LogMethod;
    warn: LogMethod;
    error: LogMethod;
    child: (childContext: Record<string, unknown>) => Logger;
}

type LogMethod = (...args: unknown[]) => void;

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const resolveMinLevel = (): LogLevel => {
    const configured = process.env.LOG_LEVEL;
    if (configured === 'debug' || configured === 'info' || configured === 'warn' || configured === 'error') {
        return configured;
    }
    return process.env.NODE_ENV === 'test' ? 'warn' : 'info';
};

const isFields = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);

const formatContext = (context?: Record<string, unknown>) => {
    if (!context || Object.keys(context).length === 0) {
        return '';
    }

    const parts = Object.entries(context).map(([key, value]) => `${key}=${serialize(value)}`);
    return `[${parts.join(' ')}] `;
};

const serialize = (value: unknown) => {
    if (value === null || value === undefined) {
        return String(value);
    }
    if (value instanceof Error) {
        return value.message;
    }
    if (typeof value === 'object') {
        try {
            return JSON.stringify(value);
        } catch {
            return '[object]';
        }
    }
    return String(value);
};

const createLogger = (context?: Record<string, unknown>): Logger => {
    const prefix = formatContext(context);
    const minLevel = resolveMinLevel();

    const write =
        (level: LogLevel): LogMethod =>
        (...args: unknown[]) => {
            if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) {
                return;
            }

            const writer = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;

            if (args.length === 0) {
                writer(prefix.trimEnd());
                return;
            }

            // ({ key: value }, 'message') puts the fields in the prefix so they stay greppable
            if (isFields(args[0]) && typeof args[1] === 'string') {
                const fields = formatContext(args[0]);
                writer(`${prefix}${fields}${args[1]}`, ...args.slice(2));
                return;
            }

            if (typeof args[0] === 'string') {
                writer(`${prefix}${args[0]}`, ...args.slice(1));
                return;
            }

            writer(prefix, ...args);
        };

    const child = (childContext: Record<string, unknown>) => createLogger({ ...(context ?? {}), ...childContext });

    return {
        debug: write('debug'),
        info: write('info'),
        warn: write('warn'),
        error: write('error'),
        child,
    };
};

export const createContextLogger = (context: Record<string, unknown>) => createLogger(context);

export const logger = createLogger();
