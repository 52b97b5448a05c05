import { AwdPayClient, TokenCache, type PaymentProviderClient } from '@mobiremit/adapters';
import { createCustomerAuthenticator, createRateLimiter, type AuthClaims, type RateLimiter } from '@mobiremit/auth';
import { loadTransferApiServiceEnv, type TransferApiServiceEnv } from '@mobiremit/config';
import { dbHealthcheck } from '@mobiremit/db';
import { ApiError, ERRORS, InvalidTransitionError, UnsupportedProviderError } from '@mobiremit/domain';
import { errorEnvelope, registerServiceMetrics, sendApiError } from '@mobiremit/http';
import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import { logger, SERVICE_NAME } from './logger.js';
import { CatalogRepository, type CatalogPort } from './modules/catalog/index.js';
import { LimitAccountant } from './modules/limits/index.js';
import { TransferRepository, TransferService, type TransferStore } from './modules/transfers/index.js';
import { WebhookReconciler } from './modules/webhooks/index.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerTransferRoutes } from './routes/transfers.js';
import { registerWebhookRoutes } from './routes/webhooks.js';

declare module 'fastify' {
  interface FastifyRequest {
    /** Unparsed JSON body, kept for callback signature checks. */
    rawBody?: string;
  }
}

export interface TransferApiDeps {
  env?: TransferApiServiceEnv;
  store?: TransferStore;
  catalog?: CatalogPort;
  provider?: PaymentProviderClient;
  rateLimiter?: RateLimiter;
  readiness?: () => Promise<boolean>;
  clock?: () => Date;
}

class InvalidJsonBodyError extends Error {
  readonly statusCode = 400;

  constructor(cause: unknown) {
    super('Request body is not valid JSON.', { cause });
    this.name = 'InvalidJsonBodyError';
  }
}

function createProviderClient(env: TransferApiServiceEnv): AwdPayClient {
  return new AwdPayClient(
    {
      baseUrl: env.AWDPAY_BASE_URL,
      apiVersion: env.AWDPAY_API_VERSION,
      keycloakBaseUrl: env.AWDPAY_KEYCLOAK_BASE_URL,
      keycloakRealm: env.AWDPAY_KEYCLOAK_REALM,
      clientId: env.AWDPAY_KEYCLOAK_CLIENT_ID,
      clientSecret: env.AWDPAY_KEYCLOAK_CLIENT_SECRET,
      callbackBaseUrl: env.AWDPAY_CALLBACK_BASE_URL,
      timeoutMs: env.AWDPAY_TIMEOUT_MS,
      tokenTimeoutMs: env.AWDPAY_TOKEN_TIMEOUT_MS
    },
    { tokenCache: new TokenCache({ marginSeconds: env.AWDPAY_TOKEN_REFRESH_MARGIN_SECONDS }) }
  );
}

function toApiError(error: unknown): ApiError | null {
  if (error instanceof ApiError) {
    return error;
  }
  if (error instanceof UnsupportedProviderError) {
    return new ApiError(ERRORS.UNSUPPORTED_PROVIDER, { provider: error.providerCode }, error.message);
  }
  if (error instanceof InvalidTransitionError) {
    return new ApiError(ERRORS.TRANSFER_STATE_INVALID, { reference: error.reference, status: error.from }, error.message);
  }
  return null;
}

export async function buildTransferApiApp(deps: TransferApiDeps = {}): Promise<FastifyInstance> {
  const env = deps.env ?? loadTransferApiServiceEnv();
  const app = Fastify({ logger: false, ignoreTrailingSlash: true });

  app.addContentTypeParser('application/json', { parseAs: 'string' }, (request, body: string, done) => {
    try {
      const json: unknown = JSON.parse(body);
      request.rawBody = body;
      done(null, json);
    } catch (error) {
      done(new InvalidJsonBodyError(error), undefined);
    }
  });

  const metrics = registerServiceMetrics(app, SERVICE_NAME);

  app.setErrorHandler((error, request, reply) => {
    const apiError = toApiError(error);
    if (apiError) {
      if (apiError.status >= 500) {
        logger.error('Request failed', { requestId: request.id, code: apiError.code, error: apiError.message });
      }
      return sendApiError(request, reply, apiError);
    }

    const status = error.statusCode;
    if (status !== undefined && status >= 400 && status < 500) {
      return reply.status(status).send(errorEnvelope(request, 'INVALID_PAYLOAD', error.message));
    }

    logger.error('transfer-api unhandled error', {
      requestId: request.id,
      message: error.message,
      stack: error.stack
    });
    return reply.status(500).send(errorEnvelope(request, 'INTERNAL_ERROR', 'Unexpected internal error.'));
  });

  const authenticateCustomer = createCustomerAuthenticator({
    secret: env.AUTH_JWT_SECRET,
    previousSecret: env.AUTH_JWT_PREVIOUS_SECRET,
    issuer: env.AUTH_JWT_ISSUER,
    audience: env.AUTH_JWT_AUDIENCE
  });
  const toCustomerClaims = (request: FastifyRequest): AuthClaims => authenticateCustomer(request.headers.authorization);

  const store = deps.store ?? new TransferRepository();
  const provider = deps.provider ?? createProviderClient(env);

  const service = new TransferService({
    store,
    catalog: deps.catalog ?? new CatalogRepository(),
    provider,
    limits: new LimitAccountant(),
    logger,
    clock: deps.clock
  });

  const reconciler = new WebhookReconciler({
    store,
    provider,
    verifier: {
      secret: env.AWDPAY_WEBHOOK_SECRET,
      signatureHeader: env.AWDPAY_WEBHOOK_SIG_HEADER,
      timestampHeader: env.AWDPAY_WEBHOOK_TS_HEADER,
      toleranceSeconds: env.AWDPAY_WEBHOOK_TOLERANCE_SECONDS
    },
    logger,
    clock: deps.clock
  });

  registerHealthRoutes(app, { serviceName: SERVICE_NAME, readiness: deps.readiness ?? dbHealthcheck, logger });
  registerTransferRoutes(app, {
    service,
    toCustomerClaims,
    rateLimiter:
      deps.rateLimiter ??
      createRateLimiter({ max: env.TRANSFER_RATE_LIMIT_MAX, windowMs: env.TRANSFER_RATE_LIMIT_WINDOW_MS }),
    metrics
  });
  registerWebhookRoutes(app, { reconciler, metrics });

  return app;
}
