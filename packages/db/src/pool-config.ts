/**
 * Connection settings for the postgres.js client.
 *
 * Read from the environment with production-leaning defaults.
 */

export interface DbConfig {
    /** Max connections held by the client (default: 20 in production, 5 elsewhere). */
    maxConnections: number;
    /** Close idle connections after this many seconds. */
    idleTimeoutSeconds: number;
    connectTimeoutSeconds: number;
    /** Recycle connections after this many seconds. */
    maxLifetimeSeconds: number;
    /** Server-side statement timeout in ms, appended to the connection string. */
    statementTimeoutMs: number;
    /** Use named prepared statements (disable behind transaction-mode poolers). */
    prepareStatements: boolean;
}

function readNumber(input: NodeJS.ProcessEnv, key: string, fallback: number): number {
    const raw = input[key];
    if (raw === undefined || raw.length === 0) {
        return fallback;
    }
    const parsed = Number(raw);
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export function loadDbConfig(input: NodeJS.ProcessEnv = process.env): DbConfig {
    const isProd = (input.NODE_ENV ?? 'development') === 'production';

    return {
        maxConnections: readNumber(input, 'DB_POOL_MAX', isProd ? 20 : 5),
        idleTimeoutSeconds: readNumber(input, 'DB_IDLE_TIMEOUT_SECONDS', 30),
        connectTimeoutSeconds: readNumber(input, 'DB_CONNECT_TIMEOUT_SECONDS', 5),
        maxLifetimeSeconds: readNumber(input, 'DB_MAX_LIFETIME_SECONDS', 30 * 60),
        statementTimeoutMs: readNumber(input, 'DB_STATEMENT_TIMEOUT_MS', 30_000),
        prepareStatements: input.DB_PREPARE_STATEMENTS !== 'false'
    };
}
