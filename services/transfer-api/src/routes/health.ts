import type { ServiceLogger } from '@mobiremit/observability';
import type { FastifyInstance } from 'fastify';

export function registerHealthRoutes(
  app: FastifyInstance,
  deps: {
    serviceName: string;
    readiness: () => Promise<boolean>;
    logger: ServiceLogger;
  }
): void {
  app.get('/healthz', async () => ({ ok: true, service: deps.serviceName }));
  app.get('/readyz', async (_request, reply) => {
    const ready = await deps.readiness().catch((error: unknown) => {
      deps.logger.warn('Readiness check failed', { error: error instanceof Error ? error.message : String(error) });
      return false;
    });
    return reply.status(ready ? 200 : 503).send({
      ok: ready,
      service: deps.serviceName,
      checks: { database: ready ? 'ok' : 'unavailable' }
    });
  });
}
