import { log } from '@mobiremit/observability';
import { z } from 'zod';
import { AwdPayApiError, AwdPayTokenError } from './errors.js';
import { TokenCache, type FetchedToken } from './token-cache.js';
import type {
  AwdPayClientConfig,
  DepositInitiation,
  InitiateDepositRequest,
  InitiateWithdrawalRequest,
  PaymentProviderClient,
  WithdrawalInitiation
} from './types.js';

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive().default(300)
});

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, '');
}

function parseJson(text: string): unknown {
  if (text.length === 0) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/** First non-empty string among `keys`, looking at the top level then at `data`. */
export function pickReference(body: JsonRecord, keys: readonly string[]): string | null {
  const scopes = [body, ...(isRecord(body.data) ? [body.data] : [])];
  for (const scope of scopes) {
    for (const key of keys) {
      const value = scope[key];
      if (typeof value === 'string' && value.length > 0) {
        return value;
      }
      if (typeof value === 'number') {
        return String(value);
      }
    }
  }
  return null;
}

export interface AwdPayClientOptions {
  fetchImpl?: typeof fetch;
  tokenCache?: TokenCache;
}

/**
 * Client for the AWDPay collection and payout API. Authenticates with a
 * client-credentials grant and never retries: callers decide what a failure
 * means for the transfer.
 */
export class AwdPayClient implements PaymentProviderClient {
  private readonly baseUrl: string;
  private readonly apiVersion: string;
  private readonly callbackBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly tokenTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly tokenCache: TokenCache;

  constructor(
    private readonly config: AwdPayClientConfig,
    options: AwdPayClientOptions = {}
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.apiVersion = trimSlashes(config.apiVersion);
    this.callbackBaseUrl = config.callbackBaseUrl.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? 30_000;
    this.tokenTimeoutMs = config.tokenTimeoutMs ?? 15_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.tokenCache = options.tokenCache ?? new TokenCache();
  }

  get depositCallbackUrl(): string {
    return `${this.callbackBaseUrl}/webhooks/awdpay/deposit/`;
  }

  get withdrawalCallbackUrl(): string {
    return `${this.callbackBaseUrl}/webhooks/awdpay/withdrawal/`;
  }

  async initiateDeposit(request: InitiateDepositRequest): Promise<DepositInitiation> {
    const body = await this.request('POST', this.apiUrl('classic/deposit/initiate'), {
      amount: request.amount,
      currency: request.currency,
      gatewayName: request.gatewayName,
      customerName: request.customerName ?? '',
      customerEmail: request.customerEmail ?? '',
      customerPhone: request.senderPhone,
      country: request.country,
      callbackUrl: this.depositCallbackUrl,
      metadata: {
        order_id: request.reference,
        description: request.description ?? ''
      }
    });

    return {
      depositReference: pickReference(body, ['depositRef', 'reference', 'ref']) ?? request.reference,
      raw: body
    };
  }

  async getDepositStatus(depositReference: string): Promise<JsonRecord> {
    return this.request('GET', this.apiUrl(`deposit/deposits/${encodeURIComponent(depositReference)}`));
  }

  async initiateWithdrawal(request: InitiateWithdrawalRequest): Promise<WithdrawalInitiation> {
    const body = await this.request('POST', this.apiUrl('withdraw/initiate'), {
      amount: request.amount,
      currency: request.currency,
      gatewayName: request.gatewayName,
      beneficiaryPhone: request.beneficiaryPhone,
      country: request.country,
      trxId: request.reference,
      callbackUrl: this.withdrawalCallbackUrl,
      metadata: {
        withdrawal_id: request.reference,
        description: request.description ?? ''
      }
    });

    return {
      withdrawalReference: pickReference(body, ['withdrawRef', 'reference', 'ref']) ?? request.reference,
      raw: body
    };
  }

  async getWithdrawalStatus(withdrawalReference: string): Promise<JsonRecord> {
    return this.request('GET', this.apiUrl(`withdraw/withdrawals/${encodeURIComponent(withdrawalReference)}`));
  }

  async listDepositGateways(): Promise<JsonRecord> {
    return this.request('GET', this.publicUrl('public/gateways/deposit/list'));
  }

  async listWithdrawalGateways(): Promise<JsonRecord> {
    return this.request('GET', this.apiUrl('withdraw/list'));
  }

  async getWalletBalance(): Promise<JsonRecord> {
    return this.request('GET', this.apiUrl('wallet/balance'));
  }

  private apiUrl(path: string): string {
    return `${this.baseUrl}/${this.apiVersion}/${trimSlashes(path)}`;
  }

  private publicUrl(path: string): string {
    return `${this.baseUrl}/${trimSlashes(path)}`;
  }

  private get tokenUrl(): string {
    const keycloak = this.config.keycloakBaseUrl.replace(/\/+$/, '');
    return `${keycloak}/realms/${encodeURIComponent(this.config.keycloakRealm)}/protocol/openid-connect/token`;
  }

  private async accessToken(): Promise<string> {
    return this.tokenCache.getOrRefresh(() => this.fetchToken());
  }

  private async fetchToken(): Promise<FetchedToken> {
    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(this.tokenUrl, {
        method: 'POST',
        headers: { 'content-type': 'application/x-www-form-urlencoded', accept: 'application/json' },
        body: new URLSearchParams({
          grant_type: 'client_credentials',
          client_id: this.config.clientId,
          client_secret: this.config.clientSecret
        }).toString(),
        signal: AbortSignal.timeout(this.tokenTimeoutMs)
      });
      text = await response.text();
    } catch (error) {
      log('error', 'AWDPay token request failed', { error: describeError(error) });
      throw new AwdPayTokenError(`Failed to obtain access token: ${describeError(error)}`);
    }

    const body = parseJson(text);
    if (!response.ok) {
      log('error', 'AWDPay token request rejected', { status: response.status });
      throw new AwdPayTokenError(`Failed to obtain access token: HTTP ${response.status}`, response.status, body);
    }

    const parsed = tokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AwdPayTokenError('Failed to obtain access token: malformed token response', response.status, body);
    }

    log('info', 'AWDPay token acquired', { expiresIn: parsed.data.expires_in });
    return { accessToken: parsed.data.access_token, expiresInSeconds: parsed.data.expires_in };
  }

  private async request(method: 'GET' | 'POST', url: string, payload?: JsonRecord): Promise<JsonRecord> {
    const token = await this.accessToken();

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: {
          authorization: `Bearer ${token}`,
          'content-type': 'application/json',
          accept: 'application/json'
        },
        ...(payload ? { body: JSON.stringify(payload) } : {}),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      text = await response.text();
    } catch (error) {
      const kind = isTimeout(error) ? 'timeout' : 'transport';
      log('error', 'AWDPay request error', { method, url, kind, error: describeError(error) });
      throw new AwdPayApiError(`Request failed: ${describeError(error)}`, kind);
    }

    const body = parseJson(text);

    if (response.status >= 400) {
      if (response.status === 401) {
        this.tokenCache.invalidate();
      }
      log('warn', 'AWDPay API error', { method, url, status: response.status });
      const message = isRecord(body) && typeof body.message === 'string' ? body.message : `HTTP ${response.status}`;
      throw new AwdPayApiError(message, 'http', response.status, body);
    }

    if (!isRecord(body)) {
      log('warn', 'AWDPay accepted the request without a JSON object body', { method, url, status: response.status });
      return {};
    }

    return body;
  }
}
