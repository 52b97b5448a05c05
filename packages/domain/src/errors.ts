/**
 * Structured API error codes.
 *
 * Every HTTP error body is built from one of these definitions so codes,
 * statuses and default messages stay consistent across routes.
 */

export interface ApiErrorDefinition {
    code: string;
    status: number;
    message: string;
}

/** Structured API error that can be thrown from any route handler. */
export class ApiError extends Error {
    readonly code: string;
    readonly status: number;
    readonly details?: unknown;

    constructor(def: ApiErrorDefinition, details?: unknown, message?: string) {
        super(message ?? def.message);
        this.name = 'ApiError';
        this.code = def.code;
        this.status = def.status;
        this.details = details;
    }

    toJSON(): { error: { code: string; message: string; details?: unknown } } {
        const error: { code: string; message: string; details?: unknown } = {
            code: this.code,
            message: this.message
        };
        if (this.details !== undefined) {
            error.details = this.details;
        }
        return { error };
    }
}

export const ERRORS = {
    // ── Authentication ──
    UNAUTHORIZED: { code: 'UNAUTHORIZED', status: 401, message: 'Authentication required.' },
    FORBIDDEN: { code: 'FORBIDDEN', status: 403, message: 'Insufficient permissions.' },
    INVALID_TOKEN: { code: 'INVALID_TOKEN', status: 401, message: 'Invalid or malformed token.' },

    // ── Rate Limiting ──
    RATE_LIMIT_EXCEEDED: { code: 'RATE_LIMIT_EXCEEDED', status: 429, message: 'Too many requests.' },

    // ── Validation ──
    INVALID_PAYLOAD: { code: 'INVALID_PAYLOAD', status: 400, message: 'Invalid request payload.' },
    UNSUPPORTED_PROVIDER: { code: 'UNSUPPORTED_PROVIDER', status: 400, message: 'Unsupported mobile money provider.' },
    CORRIDOR_NOT_SUPPORTED: { code: 'CORRIDOR_NOT_SUPPORTED', status: 400, message: 'This route is not supported.' },
    AMOUNT_OUT_OF_RANGE: { code: 'AMOUNT_OUT_OF_RANGE', status: 400, message: 'Amount is outside the allowed range for this route.' },
    LIMIT_EXCEEDED: { code: 'LIMIT_EXCEEDED', status: 400, message: 'Transfer amount exceeds your limits.' },
    KYC_PROFILE_REQUIRED: { code: 'KYC_PROFILE_REQUIRED', status: 403, message: 'Complete identity verification before sending money.' },

    // ── Transfers ──
    TRANSFER_NOT_FOUND: { code: 'TRANSFER_NOT_FOUND', status: 404, message: 'Transfer not found.' },
    TRANSFER_STATE_INVALID: { code: 'TRANSFER_STATE_INVALID', status: 409, message: 'Transfer is in an invalid state for this operation.' },

    // ── Provider ──
    DEPOSIT_INIT_ERROR: { code: 'DEPOSIT_INIT_ERROR', status: 502, message: 'The payment provider rejected the deposit request.' },

    // ── Webhooks ──
    WEBHOOK_SIGNATURE_INVALID: { code: 'WEBHOOK_SIGNATURE_INVALID', status: 401, message: 'Invalid webhook signature.' },

    // ── Internal ──
    INTERNAL_ERROR: { code: 'INTERNAL_ERROR', status: 500, message: 'An unexpected internal error occurred.' },
    SERVICE_UNAVAILABLE: { code: 'SERVICE_UNAVAILABLE', status: 503, message: 'Service temporarily unavailable.' }
} as const satisfies Record<string, ApiErrorDefinition>;

export type ErrorCode = keyof typeof ERRORS;
