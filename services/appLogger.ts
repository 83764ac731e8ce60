import type { LogLevel } from '../schemas/parserConfig';

type LogMetadata = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

let minimumLevel: LogLevel = 'info';

const isProduction = (): boolean => process.env.NODE_ENV === 'production';

// Report text and anything derived from it stays out of the logs.
const REDACT_KEYS = [/rawtext/i, /text$/i, /content/i, /context/i, /snippet/i, /birthdate/i, /patientid/i];

const redactValue = (value: unknown): unknown => {
    if (typeof value === 'string') {
        // Keep small strings (labels, ids) but redact longer payloads.
        if (value.length > 120 || value.includes('\n')) {
            return '[REDACTED]';
        }
        return value;
    }

    if (Array.isArray(value)) {
        return value.map((v) => redactValue(v));
    }

    if (value !== null && typeof value === 'object') {
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(value)) {
            if (REDACT_KEYS.some((re) => re.test(k))) {
                out[k] = '[REDACTED]';
            } else {
                out[k] = redactValue(v);
            }
        }
        return out;
    }

    return value;
};

const redactMetadata = (metadata: LogMetadata): LogMetadata => {
    const out: LogMetadata = {};
    for (const [k, v] of Object.entries(metadata)) {
        out[k] = REDACT_KEYS.some((re) => re.test(k)) ? '[REDACTED]' : redactValue(v);
    }
    return out;
};

const shouldLog = (level: LogLevel, minimum: LogLevel): boolean => {
    if (isProduction() && (level === 'debug' || level === 'info')) return false;
    return LEVEL_ORDER[level] >= LEVEL_ORDER[minimum];
};

const emit = (level: LogLevel, message: string, metadata?: LogMetadata, minimum: LogLevel = minimumLevel): void => {
    if (!shouldLog(level, minimum)) return;

    const entry = {
        timestamp: new Date().toISOString(),
        level,
        message: redactValue(message),
        ...(metadata ? redactMetadata(metadata) : {}),
    };

    if (level === 'error') {
        console.error(JSON.stringify(entry));
    } else if (level === 'warn') {
        console.warn(JSON.stringify(entry));
    } else if (level === 'info') {
        console.info(JSON.stringify(entry));
    } else {
        console.log(JSON.stringify(entry));
    }
};

export const setLogLevel = (level: LogLevel): void => {
    minimumLevel = level;
};

export const getLogLevel = (): LogLevel => minimumLevel;

export const appLogger = {
    debug(message: string, metadata?: LogMetadata) {
        emit('debug', message, metadata);
    },
    info(message: string, metadata?: LogMetadata) {
        emit('info', message, metadata);
    },
    warn(message: string, metadata?: LogMetadata) {
        emit('warn', message, metadata);
    },
    error(message: string, metadata?: LogMetadata) {
        emit('error', message, metadata);
    },
    /** Emit against an explicit minimum level instead of the process-wide one */
    log(level: LogLevel, message: string, metadata?: LogMetadata, minimum?: LogLevel) {
        emit(level, message, metadata, minimum);
    },
};
