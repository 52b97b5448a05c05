import { AwdPayApiError, AwdPayClient, type PaymentProviderClient } from '@mobiremit/adapters';
import { DEPOSIT_PROMPT_DELAYED_MESSAGE, DEPOSIT_PROMPT_MESSAGE, UnsupportedProviderError } from '@mobiremit/domain';
import { describe, expect, it, vi } from 'vitest';
import { LimitAccountant } from '../src/modules/limits/index.js';
import {
  AmountOutOfRangeError,
  CorridorNotSupportedError,
  DepositInitiationError,
  KycProfileRequiredError,
  LimitExceededError,
  TransferNotFoundError,
  TransferService,
  type CreateTransferInput
} from '../src/modules/transfers/index.js';
import { CM_TO_CI, createFakeProvider, silentLogger, StaticCatalog } from './support/fakes.js';
import { InMemoryTransferStore } from './support/in-memory-store.js';

const NOW = new Date('2026-03-10T09:00:00.000Z');

function input(overrides: Partial<CreateTransferInput> = {}): CreateTransferInput {
  return {
    userId: 'user-1',
    senderPhone: '+237670000001',
    senderName: 'Awa Sender',
    recipientName: 'Kofi Receiver',
    recipientPhone: '+2250700000002',
    amount: 20_000,
    fundingProvider: 'mtn_cm',
    payoutProvider: 'orange_ci',
    deviceId: 'device-1',
    ipAddress: '203.0.113.5',
    ...overrides
  };
}

function setup(options: { catalog?: StaticCatalog; clock?: () => Date; provider?: PaymentProviderClient } = {}) {
  const store = new InMemoryTransferStore();
  const provider = createFakeProvider();
  const service = new TransferService({
    store,
    catalog: options.catalog ?? new StaticCatalog(),
    provider: options.provider ?? provider,
    limits: new LimitAccountant(),
    logger: silentLogger(),
    clock: options.clock ?? (() => NOW)
  });
  return { store, provider, service };
}

describe('TransferService.createTransfer', () => {
  it('persists the transfer, initiates the deposit and reserves usage', async () => {
    const { store, provider, service } = setup();

    const result = await service.createTransfer(input());

    expect(result.outcome).toBe('initiated');
    expect(result.message).toBe(DEPOSIT_PROMPT_MESSAGE);
    expect(result.transfer).toMatchObject({
      status: 'DEPOSIT_PENDING',
      amount: 20_000,
      currency: 'XAF',
      serviceFee: 200,
      totalAmount: 20_200,
      destinationAmount: 20_000,
      destinationCurrency: 'XOF',
      corridorId: 'corridor-cm-ci',
      depositGateway: 'mtn',
      depositStatus: 'pending',
      depositReference: `DEP-${result.transfer.reference}`,
      errorCode: null
    });
    expect(result.transfer.reference).toMatch(/^TRF-[0-9A-F]{12}$/);
    expect(result.transfer.depositInitiatedAt?.toISOString()).toBe(NOW.toISOString());

    expect(provider.initiateDeposit).toHaveBeenCalledWith({
      reference: result.transfer.reference,
      amount: 20_000,
      currency: 'XAF',
      gatewayName: 'mtn',
      country: 'CM',
      senderPhone: '+237670000001',
      customerName: 'Awa Sender',
      customerEmail: null,
      description: null
    });

    expect(store.auditEvents(result.transfer.transferId)).toEqual(['created', 'deposit_initiated']);
    expect(store.snapshot('user-1')).toMatchObject({
      periodStart: '2026-03-01',
      periodEnd: '2026-03-31',
      dailyDate: '2026-03-10',
      totalSent: 20_000,
      transferCount: 1,
      dailySent: 20_000,
      dailyCount: 1
    });
  });

  it('records creation context in the first audit entry', async () => {
    const { store, service } = setup();

    const { transfer } = await service.createTransfer(input());
    const [created] = await store.listAudit(transfer.transferId);

    expect(created?.metadata).toEqual({
      device_id: 'device-1',
      kyc_level: 'basic',
      corridor_id: 'corridor-cm-ci',
      fee_source: 'flat_schedule'
    });
    expect(created?.ipAddress).toBe('203.0.113.5');
  });

  it('applies a configured corridor fee instead of the flat schedule', async () => {
    const catalog = new StaticCatalog([{ ...CM_TO_CI, fixedFee: 100, percentageFee: 1.5 }]);
    const { service } = setup({ catalog });

    const { transfer } = await service.createTransfer(input());

    expect(transfer.serviceFee).toBe(400);
    expect(transfer.totalAmount).toBe(20_400);
  });

  it('uses an explicit currency when given', async () => {
    const { service } = setup();

    const { transfer } = await service.createTransfer(input({ currency: 'EUR' }));

    expect(transfer.currency).toBe('EUR');
    expect(transfer.destinationCurrency).toBe('XOF');
  });

  it('rejects an unknown provider code before touching the store', async () => {
    const { store, service } = setup();

    await expect(service.createTransfer(input({ payoutProvider: 'paypal' }))).rejects.toBeInstanceOf(UnsupportedProviderError);
    expect(store.transactionCount).toBe(0);
  });

  it('rejects a country pair without an active corridor', async () => {
    const { service } = setup();

    await expect(service.createTransfer(input({ payoutProvider: 'orange_cm' }))).rejects.toMatchObject({
      code: 'CORRIDOR_NOT_SUPPORTED',
      message: 'No active corridor from CM to CM.'
    });
    await expect(service.createTransfer(input({ payoutProvider: 'orange_cm' }))).rejects.toBeInstanceOf(CorridorNotSupportedError);
  });

  it('enforces corridor bounds', async () => {
    const { service } = setup();

    await expect(service.createTransfer(input({ amount: 200 }))).rejects.toMatchObject({
      code: 'AMOUNT_OUT_OF_RANGE',
      message: 'Minimum amount for this corridor is 500 XAF.',
      details: { minAmount: 500, maxAmount: 1_000_000 }
    });
    await expect(service.createTransfer(input({ amount: 1_000_001 }))).rejects.toBeInstanceOf(AmountOutOfRangeError);
  });

  it('requires a KYC profile', async () => {
    const { service } = setup();

    await expect(service.createTransfer(input({ userId: 'user-2' }))).rejects.toBeInstanceOf(KycProfileRequiredError);
  });

  it('rejects an amount above the per-transaction limit', async () => {
    const { provider, service } = setup();

    await expect(service.createTransfer(input({ amount: 60_000 }))).rejects.toMatchObject({
      code: 'LIMIT_EXCEEDED',
      message: 'Max per transaction for your KYC level is 50000 XAF.',
      details: { scope: 'transaction', limit: 50_000, remaining: 50_000 }
    });
    expect(provider.initiateDeposit).not.toHaveBeenCalled();
  });

  it('rejects a transfer over the daily limit without creating a row', async () => {
    const { store, provider, service } = setup();
    store.putSnapshot({
      userId: 'user-1',
      periodStart: '2026-03-01',
      periodEnd: '2026-03-31',
      totalSent: 90_000,
      transferCount: 3,
      dailyDate: '2026-03-10',
      dailySent: 90_000,
      dailyCount: 3
    });

    const attempt = service.createTransfer(input());

    await expect(attempt).rejects.toBeInstanceOf(LimitExceededError);
    await expect(attempt).rejects.toMatchObject({
      message: 'Daily limit exceeded. Remaining today: 10000 XAF.',
      details: { scope: 'daily', limit: 100_000, remaining: 10_000 }
    });
    expect(store.allTransfers()).toHaveLength(0);
    expect(store.auditCount()).toBe(0);
    expect(provider.initiateDeposit).not.toHaveBeenCalled();
    expect(store.snapshot('user-1')?.dailySent).toBe(90_000);
  });

  it('starts a fresh daily window on a new day', async () => {
    const { store, service } = setup();
    store.putSnapshot({
      userId: 'user-1',
      periodStart: '2026-03-01',
      periodEnd: '2026-03-31',
      totalSent: 90_000,
      transferCount: 3,
      dailyDate: '2026-03-09',
      dailySent: 90_000,
      dailyCount: 3
    });

    await service.createTransfer(input());

    expect(store.snapshot('user-1')).toMatchObject({
      totalSent: 110_000,
      transferCount: 4,
      dailyDate: '2026-03-10',
      dailySent: 20_000,
      dailyCount: 1
    });
  });

  it('serializes concurrent transfers of one user against the daily limit', async () => {
    const catalog = new StaticCatalog([CM_TO_CI], [{ userId: 'user-1', kycLevel: 'advanced', verificationStatus: 'approved' }]);
    const { store, service } = setup({ catalog });

    const results = await Promise.allSettled([
      service.createTransfer(input({ amount: 1_000_000 })),
      service.createTransfer(input({ amount: 1_000_000 })),
      service.createTransfer(input({ amount: 1_000_000 }))
    ]);

    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'fulfilled', 'rejected']);
    const rejected = results[2];
    expect(rejected?.status === 'rejected' ? rejected.reason : null).toBeInstanceOf(LimitExceededError);
    expect(rejected?.status === 'rejected' ? rejected.reason : null).toMatchObject({
      details: { scope: 'daily', limit: 2_000_000, remaining: 0 }
    });
    expect(store.allTransfers()).toHaveLength(2);
    expect(store.snapshot('user-1')).toMatchObject({ dailySent: 2_000_000, dailyCount: 2 });
  });

  it('marks the transfer FAILED when the provider refuses the deposit', async () => {
    const { store, provider, service } = setup();
    provider.initiateDeposit.mockRejectedValueOnce(new AwdPayApiError('Insufficient funds', 'http', 422, { message: 'Insufficient funds' }));

    const attempt = service.createTransfer(input());

    await expect(attempt).rejects.toBeInstanceOf(DepositInitiationError);
    await expect(attempt).rejects.toMatchObject({
      code: 'DEPOSIT_INIT_ERROR',
      status: 502,
      message: 'Deposit could not be initiated: Insufficient funds'
    });

    const [stored] = store.allTransfers();
    expect(stored).toMatchObject({
      status: 'FAILED',
      depositStatus: 'failed',
      errorCode: 'DEPOSIT_INIT_ERROR',
      errorMessage: 'Insufficient funds'
    });
    expect(store.auditEvents(stored?.transferId ?? '')).toEqual(['created', 'failed']);
    expect(store.snapshot('user-1')).toMatchObject({ dailySent: 0, transferCount: 0 });
  });

  it('keeps the transfer pending when the deposit outcome is unknown', async () => {
    const { store, provider, service } = setup();
    provider.initiateDeposit.mockRejectedValueOnce(new AwdPayApiError('Request failed: The operation was aborted due to timeout', 'timeout'));

    const result = await service.createTransfer(input());

    expect(result.outcome).toBe('unconfirmed');
    expect(result.message).toBe(DEPOSIT_PROMPT_DELAYED_MESSAGE);
    expect(result.transfer).toMatchObject({
      status: 'DEPOSIT_PENDING',
      depositStatus: 'unknown',
      depositReference: null,
      errorCode: 'DEPOSIT_INIT_TIMEOUT'
    });
    expect(store.snapshot('user-1')?.dailySent).toBe(20_000);
  });

  it('treats an accepted deposit without a readable body as initiated', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async (request) =>
      String(request).endsWith('/openid-connect/token')
        ? new Response(JSON.stringify({ access_token: 'tok-1', expires_in: 300 }), { status: 200 })
        : new Response('OK', { status: 200 })
    );
    const client = new AwdPayClient(
      {
        baseUrl: 'https://api.awdpay.test',
        apiVersion: 'api/v2',
        keycloakBaseUrl: 'https://auth.awdpay.test',
        keycloakRealm: 'awdpay',
        clientId: 'client-id',
        clientSecret: 'test-secret',
        callbackBaseUrl: 'https://transfers.example.test'
      },
      { fetchImpl }
    );
    const { store, service } = setup({ provider: client });

    const result = await service.createTransfer(input());

    expect(result.outcome).toBe('initiated');
    expect(result.transfer).toMatchObject({
      status: 'DEPOSIT_PENDING',
      depositStatus: 'pending',
      depositReference: result.transfer.reference,
      errorCode: null
    });
    expect(store.snapshot('user-1')).toMatchObject({ dailySent: 20_000, dailyCount: 1 });
  });

  it('rolls back everything when an unexpected error escapes', async () => {
    const { store, provider, service } = setup();
    provider.initiateDeposit.mockRejectedValueOnce(new TypeError('boom'));

    await expect(service.createTransfer(input())).rejects.toThrow('boom');
    expect(store.allTransfers()).toHaveLength(0);
    expect(store.snapshot('user-1')).toBeNull();
  });
});

describe('TransferService queries', () => {
  it('returns a transfer with its audit trail for its owner only', async () => {
    const { service } = setup();
    const { transfer } = await service.createTransfer(input());

    const detail = await service.getTransfer('user-1', transfer.transferId);
    expect(detail.transfer.reference).toBe(transfer.reference);
    expect(detail.auditLogs.map((entry) => entry.event)).toEqual(['created', 'deposit_initiated']);

    await expect(service.getTransfer('user-9', transfer.transferId)).rejects.toBeInstanceOf(TransferNotFoundError);
  });

  it('pages history newest first', async () => {
    let tick = 0;
    const { service } = setup({ clock: () => new Date(NOW.getTime() + 1000 * tick++) });
    for (const amount of [1_000, 2_000, 3_000]) {
      await service.createTransfer(input({ amount }));
    }

    const firstPage = await service.listTransfers('user-1', { limit: 2, offset: 0 });
    expect(firstPage.items.map((transfer) => transfer.amount)).toEqual([3_000, 2_000]);
    expect(firstPage.pagination).toEqual({ total: 3, limit: 2, offset: 0, hasMore: true });

    const secondPage = await service.listTransfers('user-1', { limit: 2, offset: 2 });
    expect(secondPage.items.map((transfer) => transfer.amount)).toEqual([1_000]);
    expect(secondPage.pagination.hasMore).toBe(false);

    const pending = await service.listTransfers('user-1', { status: 'COMPLETED', limit: 20, offset: 0 });
    expect(pending.pagination.total).toBe(0);
  });

  it('reports remaining limits for the KYC tier', async () => {
    const { service } = setup();
    await service.createTransfer(input());

    const overview = await service.getLimits('user-1');

    expect(overview.kycLevel).toBe('basic');
    expect(overview.kycVerified).toBe(true);
    expect(overview.remaining).toEqual({
      perTransactionLimit: 50_000,
      daily: { limit: 100_000, used: 20_000, remaining: 80_000 },
      monthly: { limit: 500_000, used: 20_000, remaining: 480_000 }
    });
  });

  it('reports an empty window for a user without a profile or history', async () => {
    const { service } = setup();

    const overview = await service.getLimits('user-2');

    expect(overview.kycLevel).toBeNull();
    expect(overview.kycVerified).toBe(false);
    expect(overview.remaining).toBeNull();
    expect(overview.snapshot).toMatchObject({ userId: 'user-2', totalSent: 0, dailySent: 0, dailyDate: '2026-03-10' });
  });
});
