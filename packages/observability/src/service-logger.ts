/**
 * Structured service logger.
 *
 * Wraps the base JSON logger with:
 * - service name and correlation id on every line
 * - level filtering (debug outside production)
 * - secret redaction and phone number masking
 */

import { log as baseLog, type LogLevel } from './logger.js';

export type ExtendedLogLevel = LogLevel | 'debug';

export interface ServiceLoggerConfig {
    /** Service name injected into every log line. */
    service: string;
    /** Minimum log level (default: 'info' in production, 'debug' elsewhere). */
    minLevel?: ExtendedLogLevel;
    /** Fields to redact from metadata (default: password, token, secret, etc.). */
    redactFields?: string[];
    /** Fields whose values are masked as phone numbers. */
    phoneFields?: string[];
}

export interface ServiceLogger {
    setCorrelationId(id: string | undefined): void;
    debug(message: string, metadata?: Record<string, unknown>): void;
    info(message: string, metadata?: Record<string, unknown>): void;
    warn(message: string, metadata?: Record<string, unknown>): void;
    error(message: string, metadata?: Record<string, unknown>): void;
}

const LOG_LEVEL_ORDER: Record<ExtendedLogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
};

const DEFAULT_REDACT_FIELDS = [
    'password',
    'token',
    'secret',
    'signature',
    'authorization',
    'cookie',
    'accessToken',
    'access_token',
    'apiKey',
    'api_key'
];

const DEFAULT_PHONE_FIELDS = ['phone', 'senderPhone', 'recipientPhone', 'beneficiaryPhone', 'customerPhone'];

/** Keeps the first five and last four characters: `+237600123456` becomes `+2376***3456`. */
export function maskPhoneNumber(phone: string): string {
    if (phone.length < 8) {
        return phone;
    }
    return `${phone.slice(0, 5)}***${phone.slice(-4)}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function redactMetadata(
    metadata: Record<string, unknown>,
    redactFields: string[],
    phoneFields: string[]
): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata)) {
        if (redactFields.some((f) => key.toLowerCase().includes(f.toLowerCase()))) {
            result[key] = '[REDACTED]';
        } else if (typeof value === 'string' && phoneFields.some((f) => f.toLowerCase() === key.toLowerCase())) {
            result[key] = maskPhoneNumber(value);
        } else if (isRecord(value)) {
            result[key] = redactMetadata(value, redactFields, phoneFields);
        } else {
            result[key] = value;
        }
    }
    return result;
}

export function createServiceLogger(config: ServiceLoggerConfig): ServiceLogger {
    const env = process.env.NODE_ENV ?? 'development';
    const minLevel = config.minLevel ?? (env === 'production' ? 'info' : 'debug');
    const minLevelOrder = LOG_LEVEL_ORDER[minLevel];
    const redactFields = config.redactFields ?? DEFAULT_REDACT_FIELDS;
    const phoneFields = config.phoneFields ?? DEFAULT_PHONE_FIELDS;

    let currentCorrelationId: string | undefined;

    function emit(level: ExtendedLogLevel, message: string, metadata?: Record<string, unknown>): void {
        if (LOG_LEVEL_ORDER[level] < minLevelOrder) return;

        const enriched: Record<string, unknown> = {
            service: config.service,
            ...(currentCorrelationId ? { correlationId: currentCorrelationId } : {}),
            ...(metadata ? redactMetadata(metadata, redactFields, phoneFields) : {})
        };

        // base logger has no debug channel
        baseLog(level === 'debug' ? 'info' : level, message, enriched);
    }

    return {
        setCorrelationId(id: string | undefined): void {
            currentCorrelationId = id;
        },
        debug(message, metadata) {
            emit('debug', message, metadata);
        },
        info(message, metadata) {
            emit('info', message, metadata);
        },
        warn(message, metadata) {
            emit('warn', message, metadata);
        },
        error(message, metadata) {
            emit('error', message, metadata);
        }
    };
}
