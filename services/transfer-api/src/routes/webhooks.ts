import { clientIp, deny } from '@mobiremit/http';
import type { ServiceMetrics } from '@mobiremit/observability';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { CallbackPhase, WebhookOutcome, WebhookReconciler } from '../modules/webhooks/index.js';

// Processor-facing responses carry fixed messages only.
function sendOutcome(request: FastifyRequest, reply: FastifyReply, outcome: WebhookOutcome): FastifyReply {
  switch (outcome.kind) {
    case 'invalid_payload':
      return deny({ request, reply, code: 'INVALID_PAYLOAD', message: 'Unrecognised callback payload.', status: 400 });
    case 'invalid_signature':
      return deny({ request, reply, code: 'WEBHOOK_SIGNATURE_INVALID', message: 'Invalid webhook signature.', status: 401 });
    case 'not_found':
      return deny({ request, reply, code: 'TRANSFER_NOT_FOUND', message: 'Transfer not found.', status: 404 });
    case 'duplicate':
      return reply.status(200).send({ success: true, message: 'Already processed' });
    case 'ignored':
    case 'applied':
      return reply.status(200).send({ success: true });
  }
}

export function registerWebhookRoutes(
  app: FastifyInstance,
  deps: {
    reconciler: WebhookReconciler;
    metrics: ServiceMetrics;
  }
): void {
  const { reconciler, metrics } = deps;

  const record = (phase: CallbackPhase, outcome: WebhookOutcome): void => {
    metrics.webhookCount.labels(phase, outcome.kind).inc();
  };

  app.post('/webhooks/awdpay/deposit/', async (request, reply) => {
    const outcome = await reconciler.handleDeposit({
      payload: request.body,
      rawBody: request.rawBody,
      ipAddress: clientIp(request)
    });
    record('deposit', outcome);
    return sendOutcome(request, reply, outcome);
  });

  app.post('/webhooks/awdpay/withdrawal/', async (request, reply) => {
    const outcome = await reconciler.handleWithdrawal({
      payload: request.body,
      rawBody: request.rawBody ?? '',
      headers: request.headers,
      ipAddress: clientIp(request)
    });
    record('withdrawal', outcome);
    return sendOutcome(request, reply, outcome);
  });
}
