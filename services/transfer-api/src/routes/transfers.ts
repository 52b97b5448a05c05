import type { AuthClaims, RateLimiter } from '@mobiremit/auth';
import { MIN_TRANSFER_AMOUNT, SUPPORTED_CURRENCIES, TRANSFER_STATES } from '@mobiremit/domain';
import { clientIp, deny } from '@mobiremit/http';
import type { ServiceMetrics } from '@mobiremit/observability';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { DepositInitiationError, type TransferService } from '../modules/transfers/index.js';
import { presentAuditRecord, presentLimits, presentTransfer, presentTransferSummary } from './presenters.js';

const phoneSchema = z.string().trim().min(6).max(20);

const transferCreateSchema = z.object({
  senderPhone: phoneSchema,
  senderName: z.string().trim().min(1).max(255),
  senderEmail: z.string().email().optional(),
  recipientName: z.string().trim().min(1).max(255),
  recipientPhone: phoneSchema,
  recipientEmail: z.string().email().optional(),
  amount: z.number().finite().min(MIN_TRANSFER_AMOUNT, `Minimum transfer amount is ${MIN_TRANSFER_AMOUNT}.`),
  currency: z.enum(SUPPORTED_CURRENCIES).optional(),
  description: z.string().max(500).optional(),
  fundingProvider: z.string().trim().min(1),
  payoutProvider: z.string().trim().min(1),
  deviceId: z.string().trim().min(1).max(255)
});

const transferListQuerySchema = z.object({
  status: z.enum(TRANSFER_STATES).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0)
});

const transferParamsSchema = z.object({
  transferId: z.string().uuid()
});

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function unauthorized(request: FastifyRequest, reply: FastifyReply, error: unknown): FastifyReply {
  return deny({ request, reply, code: 'UNAUTHORIZED', message: errorMessage(error), status: 401 });
}

function invalid(request: FastifyRequest, reply: FastifyReply, code: string, error: z.ZodError): FastifyReply {
  return deny({
    request,
    reply,
    code,
    message: error.issues[0]?.message ?? 'Invalid request.',
    status: 400,
    details: error.issues
  });
}

export function registerTransferRoutes(
  app: FastifyInstance,
  deps: {
    service: TransferService;
    toCustomerClaims: (request: FastifyRequest) => AuthClaims;
    rateLimiter: RateLimiter;
    metrics: ServiceMetrics;
  }
): void {
  const { service, toCustomerClaims, rateLimiter, metrics } = deps;

  app.post('/v1/transfers', async (request, reply) => {
    let claims: AuthClaims;
    try {
      claims = toCustomerClaims(request);
    } catch (error) {
      return unauthorized(request, reply, error);
    }

    if (!rateLimiter.enforce(request, reply, `transfers:${claims.sub}`)) {
      return reply;
    }

    const parsed = transferCreateSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return invalid(request, reply, 'INVALID_PAYLOAD', parsed.error);
    }

    try {
      const result = await service.createTransfer({
        ...parsed.data,
        userId: claims.sub,
        ipAddress: clientIp(request)
      });
      metrics.transferCount.labels(result.transfer.status).inc();

      return reply.status(result.outcome === 'initiated' ? 201 : 202).send({
        message: result.message,
        transfer: presentTransfer(result.transfer)
      });
    } catch (error) {
      if (error instanceof DepositInitiationError) {
        metrics.transferCount.labels('FAILED').inc();
      }
      throw error;
    }
  });

  app.get('/v1/transfers', async (request, reply) => {
    let claims: AuthClaims;
    try {
      claims = toCustomerClaims(request);
    } catch (error) {
      return unauthorized(request, reply, error);
    }

    const parsed = transferListQuerySchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      return invalid(request, reply, 'INVALID_QUERY', parsed.error);
    }

    const history = await service.listTransfers(claims.sub, parsed.data);
    return reply.send({
      items: history.items.map(presentTransferSummary),
      pagination: history.pagination
    });
  });

  app.get('/v1/transfers/limits', async (request, reply) => {
    let claims: AuthClaims;
    try {
      claims = toCustomerClaims(request);
    } catch (error) {
      return unauthorized(request, reply, error);
    }

    return reply.send(presentLimits(await service.getLimits(claims.sub)));
  });

  app.get('/v1/transfers/:transferId', async (request, reply) => {
    let claims: AuthClaims;
    try {
      claims = toCustomerClaims(request);
    } catch (error) {
      return unauthorized(request, reply, error);
    }

    const params = transferParamsSchema.safeParse(request.params);
    if (!params.success) {
      return deny({ request, reply, code: 'TRANSFER_NOT_FOUND', message: 'Transfer not found.', status: 404 });
    }

    const detail = await service.getTransfer(claims.sub, params.data.transferId);
    return reply.send({
      transfer: presentTransfer(detail.transfer),
      auditLogs: detail.auditLogs.map(presentAuditRecord)
    });
  });
}
