import { z } from 'zod';

function emptyStringToUndefined(value: unknown): unknown {
  if (typeof value === 'string' && value.length === 0) {
    return undefined;
  }
  return value;
}

const optionalNonEmptyString = z.preprocess(emptyStringToUndefined, z.string().min(1).optional());

const DEV_JWT_SECRET = 'dev-jwt-secret-change-me';
const DEV_WEBHOOK_SECRET = 'dev-webhook-secret-change-me';
const DEV_KEYCLOAK_CLIENT_SECRET = 'dev-client-secret';

const jwtSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  AUTH_JWT_SECRET: z.string().min(1).default(DEV_JWT_SECRET),
  AUTH_JWT_PREVIOUS_SECRET: optionalNonEmptyString,
  AUTH_JWT_ISSUER: z.string().min(1).default('mobiremit-internal'),
  AUTH_JWT_AUDIENCE: z.string().min(1).default('mobiremit-services')
});

const providerSchema = z.object({
  AWDPAY_BASE_URL: z.string().url().default('https://sandbox.awdpay.com'),
  AWDPAY_API_VERSION: z.string().min(1).default('api/v2'),
  AWDPAY_KEYCLOAK_BASE_URL: z.string().url().default('https://auth.sandbox.awdpay.com'),
  AWDPAY_KEYCLOAK_REALM: z.string().min(1).default('awdpay'),
  AWDPAY_KEYCLOAK_CLIENT_ID: z.string().min(1).default('dev-client'),
  AWDPAY_KEYCLOAK_CLIENT_SECRET: z.string().min(1).default(DEV_KEYCLOAK_CLIENT_SECRET),
  AWDPAY_CALLBACK_BASE_URL: z.string().url().default('http://localhost:3010'),
  AWDPAY_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  AWDPAY_TOKEN_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  AWDPAY_TOKEN_REFRESH_MARGIN_SECONDS: z.coerce.number().int().min(0).default(60)
});

const transferApiSchema = jwtSchema
  .merge(providerSchema)
  .extend({
    TRANSFER_API_PORT: z.coerce.number().int().min(1).max(65_535).default(3010),
    TRANSFER_API_HOST: z.string().min(1).default('0.0.0.0'),
    AWDPAY_WEBHOOK_SECRET: z.string().min(1).default(DEV_WEBHOOK_SECRET),
    AWDPAY_WEBHOOK_SIG_HEADER: z.string().min(1).default('x-signature'),
    AWDPAY_WEBHOOK_TS_HEADER: z.string().min(1).default('x-timestamp'),
    AWDPAY_WEBHOOK_TOLERANCE_SECONDS: z.coerce.number().int().positive().default(300),
    TRANSFER_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(30),
    TRANSFER_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000)
  })
  .superRefine((value, context) => {
    if (value.NODE_ENV !== 'production') {
      return;
    }
    if (value.AUTH_JWT_SECRET === DEV_JWT_SECRET) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['AUTH_JWT_SECRET'],
        message: 'AUTH_JWT_SECRET must be set explicitly in production.'
      });
    }
    if (value.AWDPAY_WEBHOOK_SECRET === DEV_WEBHOOK_SECRET) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['AWDPAY_WEBHOOK_SECRET'],
        message: 'AWDPAY_WEBHOOK_SECRET must be set explicitly in production.'
      });
    }
    if (value.AWDPAY_KEYCLOAK_CLIENT_SECRET === DEV_KEYCLOAK_CLIENT_SECRET) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['AWDPAY_KEYCLOAK_CLIENT_SECRET'],
        message: 'AWDPAY_KEYCLOAK_CLIENT_SECRET must be set explicitly in production.'
      });
    }
  });

export type TransferApiServiceEnv = z.infer<typeof transferApiSchema>;

export function loadTransferApiServiceEnv(input: NodeJS.ProcessEnv = process.env): TransferApiServiceEnv {
  return transferApiSchema.parse(input);
}
