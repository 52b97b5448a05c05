import type { ApiError } from '@mobiremit/domain';
import type { FastifyReply, FastifyRequest } from 'fastify';

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    requestId: string;
    details?: unknown;
  };
}

export function errorEnvelope(request: Pick<FastifyRequest, 'id'>, code: string, message: string, details?: unknown): ErrorEnvelope {
  return {
    error: {
      code,
      message,
      requestId: request.id,
      ...(details !== undefined ? { details } : {})
    }
  };
}

export function deny(params: {
  request: FastifyRequest;
  reply: FastifyReply;
  code: string;
  message: string;
  status?: number;
  details?: unknown;
}): FastifyReply {
  return params.reply.status(params.status ?? 400).send(errorEnvelope(params.request, params.code, params.message, params.details));
}

export function sendApiError(request: FastifyRequest, reply: FastifyReply, error: ApiError): FastifyReply {
  return deny({
    request,
    reply,
    code: error.code,
    message: error.message,
    status: error.status,
    details: error.details
  });
}
