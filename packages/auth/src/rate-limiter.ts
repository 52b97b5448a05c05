/**
 * In-memory fixed-window rate limiter.
 *
 * Counts hits per key (a user id, an IP) within a window. Single-instance
 * only; several replicas each keep their own counts.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { log } from '@mobiremit/observability';

export interface RateLimitConfig {
    /** Maximum hits per window (default: 100). */
    max: number;
    /** Window size in ms (default: 60_000 = 1 min). */
    windowMs: number;
    /** Optional custom response message. */
    message?: string;
    now?: () => number;
}

export interface RateLimitDecision {
    allowed: boolean;
    limit: number;
    remaining: number;
    resetSeconds: number;
}

export interface RateLimiter {
    hit(key: string): RateLimitDecision;
    /** Applies the decision to the reply; returns false once a 429 has been sent. */
    enforce(request: FastifyRequest, reply: FastifyReply, key: string): boolean;
    readonly storeSize: number;
    clear(): void;
}

interface WindowEntry {
    count: number;
    resetAt: number;
}

export function createRateLimiter(config: Partial<RateLimitConfig> = {}): RateLimiter {
    const max = config.max ?? 100;
    const windowMs = config.windowMs ?? 60_000;
    const message = config.message ?? 'Too many requests, please try again later.';
    const now = config.now ?? Date.now;

    const store = new Map<string, WindowEntry>();
    let nextSweepAt = now() + windowMs * 5;

    function sweep(at: number): void {
        if (at < nextSweepAt) return;
        for (const [key, entry] of store) {
            if (entry.resetAt <= at) {
                store.delete(key);
            }
        }
        nextSweepAt = at + windowMs * 5;
    }

    function hit(key: string): RateLimitDecision {
        const at = now();
        sweep(at);

        let entry = store.get(key);
        if (!entry || entry.resetAt <= at) {
            entry = { count: 0, resetAt: at + windowMs };
            store.set(key, entry);
        }

        entry.count += 1;

        return {
            allowed: entry.count <= max,
            limit: max,
            remaining: Math.max(0, max - entry.count),
            resetSeconds: Math.ceil((entry.resetAt - at) / 1000)
        };
    }

    return {
        hit,

        enforce(request, reply, key) {
            const decision = hit(key);
            reply.header('x-ratelimit-limit', decision.limit);
            reply.header('x-ratelimit-remaining', decision.remaining);
            reply.header('x-ratelimit-reset', decision.resetSeconds);

            if (decision.allowed) {
                return true;
            }

            log('warn', 'Rate limit exceeded', {
                key,
                path: request.url.split('?')[0] ?? '',
                method: request.method,
                max
            });

            void reply
                .header('retry-after', decision.resetSeconds)
                .status(429)
                .send({
                    error: {
                        code: 'RATE_LIMIT_EXCEEDED',
                        message,
                        requestId: request.id,
                        details: { retryAfterSeconds: decision.resetSeconds }
                    }
                });
            return false;
        },

        get storeSize(): number {
            return store.size;
        },

        clear(): void {
            store.clear();
        }
    };
}
