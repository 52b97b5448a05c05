import { describe, expect, it, vi } from 'vitest';
import { AwdPayClient } from '../src/awdpay/client.js';
import { AwdPayApiError, AwdPayTokenError } from '../src/awdpay/errors.js';
import type { AwdPayClientConfig } from '../src/awdpay/types.js';

const config: AwdPayClientConfig = {
  baseUrl: 'https://api.awdpay.test/',
  apiVersion: '/api/v2/',
  keycloakBaseUrl: 'https://auth.awdpay.test',
  keycloakRealm: 'awdpay',
  clientId: 'client-id',
  clientSecret: 'test-secret',
  callbackBaseUrl: 'https://transfers.example.test/'
};

const TOKEN_URL = 'https://auth.awdpay.test/realms/awdpay/protocol/openid-connect/token';

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function routedFetch(routes: Record<string, () => Response | Promise<Response>>) {
  return vi.fn<typeof fetch>(async (input) => {
    const url = String(input);
    const route = routes[url];
    if (!route) {
      throw new Error(`Unexpected request to ${url}`);
    }
    return route();
  });
}

function tokenRoute(): Response {
  return jsonResponse(200, { access_token: 'tok-1', expires_in: 300 });
}

function callsTo(fetchMock: ReturnType<typeof routedFetch>, url: string) {
  return fetchMock.mock.calls.filter(([input]) => String(input) === url);
}

describe('AwdPayClient', () => {
  it('initiates a deposit with the phase callback and order reference', async () => {
    const fetchMock = routedFetch({
      [TOKEN_URL]: tokenRoute,
      'https://api.awdpay.test/api/v2/classic/deposit/initiate': () => jsonResponse(200, { depositRef: 'DEP-778' })
    });
    const client = new AwdPayClient(config, { fetchImpl: fetchMock });

    const result = await client.initiateDeposit({
      reference: 'TRF-0123456789AB',
      amount: 20_000,
      currency: 'XAF',
      gatewayName: 'mtn',
      country: 'CM',
      senderPhone: '+237600000001',
      customerName: 'Awa Sender',
      description: 'School fees'
    });

    expect(result.depositReference).toBe('DEP-778');

    const [, init] = callsTo(fetchMock, 'https://api.awdpay.test/api/v2/classic/deposit/initiate')[0] ?? [];
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({ authorization: 'Bearer tok-1' });
    expect(JSON.parse(String(init?.body))).toEqual({
      amount: 20_000,
      currency: 'XAF',
      gatewayName: 'mtn',
      customerName: 'Awa Sender',
      customerEmail: '',
      customerPhone: '+237600000001',
      country: 'CM',
      callbackUrl: 'https://transfers.example.test/webhooks/awdpay/deposit/',
      metadata: { order_id: 'TRF-0123456789AB', description: 'School fees' }
    });
  });

  it('requests the token with the client-credentials grant and reuses it', async () => {
    const fetchMock = routedFetch({
      [TOKEN_URL]: tokenRoute,
      'https://api.awdpay.test/api/v2/wallet/balance': () => jsonResponse(200, { balance: 1_000_000 }),
      'https://api.awdpay.test/public/gateways/deposit/list': () => jsonResponse(200, { gateways: [] })
    });
    const client = new AwdPayClient(config, { fetchImpl: fetchMock });

    await client.getWalletBalance();
    await client.listDepositGateways();

    const tokenCalls = callsTo(fetchMock, TOKEN_URL);
    expect(tokenCalls).toHaveLength(1);
    expect(String(tokenCalls[0]?.[1]?.body)).toBe('grant_type=client_credentials&client_id=client-id&client_secret=test-secret');
  });

  it('falls back to the internal reference when the withdrawal response carries none', async () => {
    const fetchMock = routedFetch({
      [TOKEN_URL]: tokenRoute,
      'https://api.awdpay.test/api/v2/withdraw/initiate': () => jsonResponse(200, { status: 'accepted' })
    });
    const client = new AwdPayClient(config, { fetchImpl: fetchMock });

    const result = await client.initiateWithdrawal({
      reference: 'TRF-0123456789AB',
      amount: 20_000,
      currency: 'XOF',
      gatewayName: 'orange-sn',
      country: 'SN',
      beneficiaryPhone: '+221770000002'
    });

    expect(result.withdrawalReference).toBe('TRF-0123456789AB');
    const [, init] = callsTo(fetchMock, 'https://api.awdpay.test/api/v2/withdraw/initiate')[0] ?? [];
    expect(JSON.parse(String(init?.body))).toMatchObject({
      trxId: 'TRF-0123456789AB',
      callbackUrl: 'https://transfers.example.test/webhooks/awdpay/withdrawal/',
      metadata: { withdrawal_id: 'TRF-0123456789AB', description: '' }
    });
  });

  it('reads the withdrawal reference from a nested data object', async () => {
    const fetchMock = routedFetch({
      [TOKEN_URL]: tokenRoute,
      'https://api.awdpay.test/api/v2/withdraw/initiate': () => jsonResponse(200, { data: { ref: 'WD-55' } })
    });
    const client = new AwdPayClient(config, { fetchImpl: fetchMock });

    const result = await client.initiateWithdrawal({
      reference: 'TRF-0123456789AB',
      amount: 100,
      currency: 'XOF',
      gatewayName: 'wave-sn',
      country: 'SN',
      beneficiaryPhone: '+221770000002'
    });

    expect(result.withdrawalReference).toBe('WD-55');
  });

  it('accepts a success status whose body is not a JSON object', async () => {
    const fetchMock = routedFetch({
      [TOKEN_URL]: tokenRoute,
      'https://api.awdpay.test/api/v2/classic/deposit/initiate': () => new Response('OK', { status: 200 })
    });
    const client = new AwdPayClient(config, { fetchImpl: fetchMock });

    const result = await client.initiateDeposit({
      reference: 'TRF-0123456789AB',
      amount: 20_000,
      currency: 'XAF',
      gatewayName: 'mtn',
      country: 'CM',
      senderPhone: '+237600000001'
    });

    expect(result).toEqual({ depositReference: 'TRF-0123456789AB', raw: {} });
  });

  it('lists payout gateways under the versioned path', async () => {
    const fetchMock = routedFetch({
      [TOKEN_URL]: tokenRoute,
      'https://api.awdpay.test/api/v2/withdraw/list': () => jsonResponse(200, { gateways: [{ name: 'wave-sn' }] })
    });
    const client = new AwdPayClient(config, { fetchImpl: fetchMock });

    await expect(client.listWithdrawalGateways()).resolves.toEqual({ gateways: [{ name: 'wave-sn' }] });
    const [, init] = callsTo(fetchMock, 'https://api.awdpay.test/api/v2/withdraw/list')[0] ?? [];
    expect(init?.method).toBe('GET');
  });

  it('maps error statuses to a definitive API failure', async () => {
    const fetchMock = routedFetch({
      [TOKEN_URL]: tokenRoute,
      'https://api.awdpay.test/api/v2/deposit/deposits/DEP-1': () => jsonResponse(422, { message: 'Unknown deposit' })
    });
    const client = new AwdPayClient(config, { fetchImpl: fetchMock });

    const error = await client.getDepositStatus('DEP-1').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AwdPayApiError);
    expect(error).toMatchObject({ message: 'Unknown deposit', kind: 'http', status: 422, ambiguous: false });
  });

  it('uses the status line when the error body has no message', async () => {
    const fetchMock = routedFetch({
      [TOKEN_URL]: tokenRoute,
      'https://api.awdpay.test/api/v2/withdraw/withdrawals/WD-1': () => new Response('bad gateway', { status: 502 })
    });
    const client = new AwdPayClient(config, { fetchImpl: fetchMock });

    await expect(client.getWithdrawalStatus('WD-1')).rejects.toMatchObject({ message: 'HTTP 502', body: 'bad gateway' });
  });

  it('marks timeouts as ambiguous', async () => {
    const fetchMock = routedFetch({
      [TOKEN_URL]: tokenRoute,
      'https://api.awdpay.test/api/v2/wallet/balance': () => {
        throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
      }
    });
    const client = new AwdPayClient(config, { fetchImpl: fetchMock });

    await expect(client.getWalletBalance()).rejects.toMatchObject({ kind: 'timeout', ambiguous: true, status: null });
  });

  it('raises a token error when the grant is refused', async () => {
    const fetchMock = routedFetch({
      [TOKEN_URL]: () => jsonResponse(401, { error: 'invalid_client' })
    });
    const client = new AwdPayClient(config, { fetchImpl: fetchMock });

    const error = await client.getWalletBalance().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AwdPayTokenError);
    expect(error).toMatchObject({ status: 401, body: { error: 'invalid_client' } });
  });

  it('drops the cached token after the API answers 401', async () => {
    let balanceCalls = 0;
    const fetchMock = routedFetch({
      [TOKEN_URL]: tokenRoute,
      'https://api.awdpay.test/api/v2/wallet/balance': () => {
        balanceCalls += 1;
        return balanceCalls === 1 ? jsonResponse(401, { message: 'Token revoked' }) : jsonResponse(200, { balance: 5 });
      }
    });
    const client = new AwdPayClient(config, { fetchImpl: fetchMock });

    await expect(client.getWalletBalance()).rejects.toMatchObject({ status: 401 });
    await expect(client.getWalletBalance()).resolves.toEqual({ balance: 5 });
    expect(callsTo(fetchMock, TOKEN_URL)).toHaveLength(2);
  });
});
