import { describe, expect, it } from 'vitest';
import { loadDbConfig } from '../src/pool-config.js';

describe('loadDbConfig', () => {
  it('uses a larger pool in production', () => {
    expect(loadDbConfig({ NODE_ENV: 'production' }).maxConnections).toBe(20);
    expect(loadDbConfig({ NODE_ENV: 'test' }).maxConnections).toBe(5);
  });

  it('falls back on unparseable values', () => {
    const config = loadDbConfig({ DB_STATEMENT_TIMEOUT_MS: 'soon', DB_PREPARE_STATEMENTS: 'false' });
    expect(config.statementTimeoutMs).toBe(30_000);
    expect(config.prepareStatements).toBe(false);
  });
});
