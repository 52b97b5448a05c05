export interface AwdPayClientConfig {
  baseUrl: string;
  /** Path segment placed before versioned endpoints, e.g. `api/v2`. */
  apiVersion: string;
  keycloakBaseUrl: string;
  keycloakRealm: string;
  clientId: string;
  clientSecret: string;
  /** Public base URL of this service; phase callbacks are appended to it. */
  callbackBaseUrl: string;
  timeoutMs?: number;
  tokenTimeoutMs?: number;
}

export interface InitiateDepositRequest {
  reference: string;
  amount: number;
  currency: string;
  gatewayName: string;
  country: string;
  senderPhone: string;
  customerName?: string;
  customerEmail?: string | null;
  description?: string | null;
}

export interface InitiateWithdrawalRequest {
  reference: string;
  amount: number;
  currency: string;
  gatewayName: string;
  country: string;
  beneficiaryPhone: string;
  description?: string | null;
}

export interface DepositInitiation {
  depositReference: string;
  raw: Record<string, unknown>;
}

export interface WithdrawalInitiation {
  withdrawalReference: string;
  raw: Record<string, unknown>;
}

/** The operations the transfer engine needs from a payment processor. */
export interface PaymentProviderClient {
  initiateDeposit(request: InitiateDepositRequest): Promise<DepositInitiation>;
  getDepositStatus(depositReference: string): Promise<Record<string, unknown>>;
  initiateWithdrawal(request: InitiateWithdrawalRequest): Promise<WithdrawalInitiation>;
  getWithdrawalStatus(withdrawalReference: string): Promise<Record<string, unknown>>;
}
