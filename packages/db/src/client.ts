import { loadRuntimeConfig } from '@mobiremit/config';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema/index.js';
import { loadDbConfig } from './pool-config.js';

type QueryRow = Record<string, unknown>;
type PostgresSql = postgres.Sql;
/** Shared by the pool and by the handle `sql.begin` passes to its callback. */
type SqlExecutor = Pick<PostgresSql, 'unsafe'>;

let singletonSql: PostgresSql | undefined;
let singletonDb: PostgresJsDatabase<typeof schema> | undefined;

export interface QueryResult<Row extends QueryRow = QueryRow> {
  rows: Row[];
  rowCount: number;
}

export type QueryFn = <Row extends QueryRow = QueryRow>(sql: string, params?: unknown[]) => Promise<QueryResult<Row>>;

export interface TransactionContext {
  sql: postgres.TransactionSql;
  query: QueryFn;
}

function normalizeParam(param: unknown): unknown {
  if (param instanceof Date) {
    return param.toISOString();
  }

  if (Array.isArray(param)) {
    return JSON.stringify(param);
  }

  if (
    param !== null &&
    typeof param === 'object' &&
    !(param instanceof Buffer) &&
    !(param instanceof ArrayBuffer) &&
    !ArrayBuffer.isView(param)
  ) {
    return JSON.stringify(param);
  }

  return param;
}

export function normalizeQueryParams(params: unknown[] = []): unknown[] {
  return params.map((param) => normalizeParam(param));
}

function withStatementTimeout(connectionString: string, statementTimeoutMs: number): string {
  if (!URL.canParse(connectionString)) {
    return connectionString;
  }
  const url = new URL(connectionString);
  if (!url.searchParams.has('statement_timeout')) {
    url.searchParams.set('statement_timeout', String(statementTimeoutMs));
  }
  return url.toString();
}

function createQueryFn(sql: SqlExecutor): QueryFn {
  return async <Row extends QueryRow = QueryRow>(queryText: string, params: unknown[] = []): Promise<QueryResult<Row>> => {
    const rows = await sql.unsafe<Row[]>(queryText, normalizeQueryParams(params) as never[]);
    return {
      rows: [...rows],
      rowCount: typeof rows.count === 'number' ? rows.count : rows.length
    };
  };
}

export function getSql(): PostgresSql {
  if (singletonSql) {
    return singletonSql;
  }

  const runtime = loadRuntimeConfig();
  const config = loadDbConfig();
  const connectionString = withStatementTimeout(runtime.DATABASE_URL, config.statementTimeoutMs);

  singletonSql = postgres(connectionString, {
    max: config.maxConnections,
    idle_timeout: config.idleTimeoutSeconds,
    connect_timeout: config.connectTimeoutSeconds,
    max_lifetime: config.maxLifetimeSeconds,
    prepare: config.prepareStatements
  });

  return singletonSql;
}

export function getDb(): PostgresJsDatabase<typeof schema> {
  if (!singletonDb) {
    singletonDb = drizzle(getSql(), { schema });
  }
  return singletonDb;
}

export async function query<Row extends QueryRow = QueryRow>(
  queryText: string,
  params: unknown[] = []
): Promise<QueryResult<Row>> {
  return createQueryFn(getSql())<Row>(queryText, params);
}

/**
 * Runs `fn` inside one database transaction. Rows locked with `for update`
 * stay locked until the callback settles; a thrown error rolls everything back.
 */
export async function withTransaction<T>(fn: (tx: TransactionContext) => Promise<T>): Promise<T> {
  const sql = getSql();
  const result = await sql.begin(async (transactionSql) => {
    const value = await fn({ sql: transactionSql, query: createQueryFn(transactionSql) });
    return { value };
  });
  return result.value;
}

export async function dbHealthcheck(): Promise<boolean> {
  const result = await query<{ ok: number }>('select 1 as ok');
  return result.rows[0]?.ok === 1;
}

export async function closeDb(): Promise<void> {
  if (singletonSql) {
    await singletonSql.end({ timeout: 5 });
    singletonSql = undefined;
    singletonDb = undefined;
  }
}
