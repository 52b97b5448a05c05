import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export interface ServiceMetrics {
  registry: Registry;
  requestDurationMs: Histogram<string>;
  requestCount: Counter<string>;
  errorCount: Counter<string>;
  webhookCount: Counter<string>;
  transferCount: Counter<string>;
  buildInfo: Gauge<string>;
}

export function createServiceMetrics(serviceName: string): ServiceMetrics {
  const registry = new Registry();
  const prefix = serviceName.replaceAll('-', '_');

  const requestDurationMs = new Histogram({
    name: `${prefix}_request_duration_ms`,
    help: 'Request duration in milliseconds',
    labelNames: ['method', 'route', 'status'] as const,
    buckets: [10, 25, 50, 100, 250, 500, 1000, 2000, 5000],
    registers: [registry]
  });

  const requestCount = new Counter({
    name: `${prefix}_request_total`,
    help: 'Total HTTP requests',
    labelNames: ['method', 'route', 'status'] as const,
    registers: [registry]
  });

  const errorCount = new Counter({
    name: `${prefix}_error_total`,
    help: 'Total errors',
    labelNames: ['code'] as const,
    registers: [registry]
  });

  const webhookCount = new Counter({
    name: `${prefix}_webhook_total`,
    help: 'Provider callbacks by phase and outcome',
    labelNames: ['phase', 'outcome'] as const,
    registers: [registry]
  });

  const transferCount = new Counter({
    name: `${prefix}_transfer_created_total`,
    help: 'Transfer creation attempts by resulting status',
    labelNames: ['status'] as const,
    registers: [registry]
  });

  const buildInfo = new Gauge({
    name: `${prefix}_build_info`,
    help: 'Build and deployment metadata for this running service',
    labelNames: ['release_id', 'git_sha', 'environment'] as const,
    registers: [registry]
  });

  buildInfo
    .labels(
      process.env.RELEASE_ID ?? 'dev',
      process.env.GIT_SHA ?? 'local',
      process.env.ENVIRONMENT ?? process.env.NODE_ENV ?? 'development'
    )
    .set(1);

  return {
    registry,
    requestDurationMs,
    requestCount,
    errorCount,
    webhookCount,
    transferCount,
    buildInfo
  };
}
