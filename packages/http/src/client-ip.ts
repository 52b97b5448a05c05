import type { FastifyRequest } from 'fastify';

/** First hop of `x-forwarded-for`, else the socket address. */
export function clientIp(request: Pick<FastifyRequest, 'headers' | 'ip'>): string | null {
  const forwarded = request.headers['x-forwarded-for'];
  const raw = Array.isArray(forwarded) ? forwarded[0] : forwarded;
  const first = raw?.split(',')[0]?.trim();
  if (first) {
    return first;
  }
  return request.ip.length > 0 ? request.ip : null;
}
