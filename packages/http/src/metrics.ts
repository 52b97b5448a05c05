import { createServiceMetrics, type ServiceMetrics } from '@mobiremit/observability';
import type { FastifyInstance, FastifyRequest } from 'fastify';

/**
 * Installs request timing hooks and a `/metrics` route. Pass `metrics` to
 * share a registry the service also records domain counters on.
 */
export function registerServiceMetrics(app: FastifyInstance, serviceName: string, metrics: ServiceMetrics = createServiceMetrics(serviceName)): ServiceMetrics {
  const startedAt = new WeakMap<FastifyRequest, number>();

  app.addHook('onRequest', async (request) => {
    startedAt.set(request, Date.now());
  });

  app.addHook('onResponse', async (request, reply) => {
    const duration = Math.max(Date.now() - (startedAt.get(request) ?? Date.now()), 0);
    const route = request.routeOptions.url ?? 'unmatched';
    const status = String(reply.statusCode);

    metrics.requestDurationMs.labels(request.method, route, status).observe(duration);
    metrics.requestCount.labels(request.method, route, status).inc();

    if (reply.statusCode >= 400) {
      metrics.errorCount.labels(status).inc();
    }
  });

  app.get('/metrics', async (_request, reply) => {
    reply.header('content-type', metrics.registry.contentType);
    return metrics.registry.metrics();
  });

  return metrics;
}
