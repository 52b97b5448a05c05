export {
  closeDb,
  dbHealthcheck,
  getDb,
  getSql,
  normalizeQueryParams,
  query,
  withTransaction,
  type QueryFn,
  type QueryResult,
  type TransactionContext
} from './client.js';
export { loadDbConfig, type DbConfig } from './pool-config.js';
export * as schema from './schema/index.js';
