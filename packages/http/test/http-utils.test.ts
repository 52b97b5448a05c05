import { ApiError, ERRORS } from '@mobiremit/domain';
import Fastify from 'fastify';
import { describe, expect, it } from 'vitest';
import { clientIp } from '../src/client-ip.js';
import { deny, errorEnvelope, sendApiError } from '../src/errors.js';
import { registerServiceMetrics } from '../src/metrics.js';

describe('errorEnvelope', () => {
  it('includes request id and details payload', () => {
    const envelope = errorEnvelope({ id: 'req_1' }, 'INVALID_PAYLOAD', 'Invalid payload.', { field: 'amount' });
    expect(envelope).toEqual({
      error: {
        code: 'INVALID_PAYLOAD',
        message: 'Invalid payload.',
        requestId: 'req_1',
        details: { field: 'amount' }
      }
    });
  });

  it('omits details when none are given', () => {
    expect(errorEnvelope({ id: 'req_2' }, 'TRANSFER_NOT_FOUND', 'Transfer not found.')).toEqual({
      error: { code: 'TRANSFER_NOT_FOUND', message: 'Transfer not found.', requestId: 'req_2' }
    });
  });
});

describe('deny and sendApiError', () => {
  it('replies with the status and envelope', async () => {
    const app = Fastify({ logger: false, genReqId: () => 'req_deny' });
    app.get('/deny', async (request, reply) => deny({ request, reply, code: 'FORBIDDEN', message: 'No.', status: 403 }));
    app.get('/api-error', async (request, reply) =>
      sendApiError(request, reply, new ApiError(ERRORS.LIMIT_EXCEEDED, { scope: 'daily' }, 'Daily limit exceeded.'))
    );

    const denied = await app.inject({ method: 'GET', url: '/deny' });
    expect(denied.statusCode).toBe(403);
    expect(denied.json()).toEqual({ error: { code: 'FORBIDDEN', message: 'No.', requestId: 'req_deny' } });

    const limited = await app.inject({ method: 'GET', url: '/api-error' });
    expect(limited.statusCode).toBe(400);
    expect(limited.json()).toEqual({
      error: { code: 'LIMIT_EXCEEDED', message: 'Daily limit exceeded.', requestId: 'req_deny', details: { scope: 'daily' } }
    });

    await app.close();
  });
});

describe('clientIp', () => {
  it('takes the first forwarded hop', () => {
    expect(clientIp({ headers: { 'x-forwarded-for': '203.0.113.7, 10.0.0.2' }, ip: '10.0.0.2' })).toBe('203.0.113.7');
  });

  it('falls back to the socket address', () => {
    expect(clientIp({ headers: {}, ip: '198.51.100.4' })).toBe('198.51.100.4');
  });

  it('returns null when nothing is known', () => {
    expect(clientIp({ headers: { 'x-forwarded-for': ' ' }, ip: '' })).toBeNull();
  });
});

describe('registerServiceMetrics', () => {
  it('counts requests by route and exposes the registry', async () => {
    const app = Fastify({ logger: false });
    registerServiceMetrics(app, 'http-test');
    app.get('/ping', async () => ({ ok: true }));

    await app.inject({ method: 'GET', url: '/ping' });
    await app.inject({ method: 'GET', url: '/missing' });

    const response = await app.inject({ method: 'GET', url: '/metrics' });
    expect(response.statusCode).toBe(200);
    expect(response.body).toContain('http_test_request_total{method="GET",route="/ping",status="200"} 1');
    expect(response.body).toContain('http_test_error_total{code="404"} 1');

    await app.close();
  });
});
