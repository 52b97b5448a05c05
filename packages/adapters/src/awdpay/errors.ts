export class AwdPayTokenError extends Error {
  readonly code = 'AWDPAY_TOKEN_ERROR';

  constructor(
    message: string,
    readonly status: number | null = null,
    readonly body: unknown = null
  ) {
    super(message);
    this.name = 'AwdPayTokenError';
  }
}

/**
 * `http`: the processor answered with an error status.
 * `timeout` / `transport`: no answer; the request may or may not have been acted on.
 */
export type AwdPayFailureKind = 'http' | 'timeout' | 'transport';

export class AwdPayApiError extends Error {
  readonly code = 'AWDPAY_API_ERROR';

  constructor(
    message: string,
    readonly kind: AwdPayFailureKind,
    readonly status: number | null = null,
    readonly body: unknown = null
  ) {
    super(message);
    this.name = 'AwdPayApiError';
  }

  /** True when the processor's outcome is unknown to us. */
  get ambiguous(): boolean {
    return this.kind === 'timeout' || this.kind === 'transport';
  }
}

export type AwdPayError = AwdPayTokenError | AwdPayApiError;

export function isAwdPayError(error: unknown): error is AwdPayError {
  return error instanceof AwdPayTokenError || error instanceof AwdPayApiError;
}
