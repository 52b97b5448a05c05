import { afterEach, describe, expect, it } from 'vitest';
import { setLogSink, type LogEntry } from '../src/logger.js';
import { createServiceLogger, maskPhoneNumber } from '../src/service-logger.js';

describe('maskPhoneNumber', () => {
  it('keeps the first five and last four characters', () => {
    expect(maskPhoneNumber('+237600123456')).toBe('+2376***3456');
  });

  it('leaves short values untouched', () => {
    expect(maskPhoneNumber('1234567')).toBe('1234567');
  });
});

describe('createServiceLogger', () => {
  const entries: LogEntry[] = [];

  afterEach(() => {
    entries.length = 0;
    setLogSink();
  });

  it('redacts secrets and masks phone numbers in nested metadata', () => {
    setLogSink((_line, entry) => entries.push(entry));
    const logger = createServiceLogger({ service: 'transfer-api', minLevel: 'info' });

    logger.info('deposit initiated', {
      reference: 'TRF-0123456789AB',
      senderPhone: '+237600123456',
      provider: { access_token: 'test-secret', beneficiaryPhone: '+221770001122' }
    });

    expect(entries).toHaveLength(1);
    expect(entries[0]?.metadata).toEqual({
      service: 'transfer-api',
      reference: 'TRF-0123456789AB',
      senderPhone: '+2376***3456',
      provider: { access_token: '[REDACTED]', beneficiaryPhone: '+2217***1122' }
    });
  });

  it('drops lines below the configured level', () => {
    setLogSink((_line, entry) => entries.push(entry));
    const logger = createServiceLogger({ service: 'transfer-api', minLevel: 'warn' });

    logger.debug('noise');
    logger.info('still noise');
    logger.warn('kept');

    expect(entries.map((entry) => entry.message)).toEqual(['kept']);
  });

  it('attaches the correlation id', () => {
    setLogSink((_line, entry) => entries.push(entry));
    const logger = createServiceLogger({ service: 'transfer-api', minLevel: 'debug' });
    logger.setCorrelationId('req-1');

    logger.debug('trace');

    expect(entries[0]).toMatchObject({ level: 'info', metadata: { service: 'transfer-api', correlationId: 'req-1' } });
  });
});
