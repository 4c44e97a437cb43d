import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ApiErrorEnvelope } from './types.js';

function firstHeaderValue(value: string | string[] | number | undefined): string {
  if (Array.isArray(value)) {
    return value[0] ?? '';
  }
  return value === undefined ? '' : String(value);
}

/** The id set by the correlation plugin; the request header is the fallback before the reply carries it. */
export function getCorrelationId(req: FastifyRequest, reply: FastifyReply): string {
  return firstHeaderValue(reply.getHeader('x-correlation-id')) || firstHeaderValue(req.headers['x-correlation-id']);
}

export function sendApiError(
  req: FastifyRequest,
  reply: FastifyReply,
  statusCode: number,
  code: string,
  message: string
) {
  const body: ApiErrorEnvelope = {
    ok: false,
    error: { code, message },
    correlationId: getCorrelationId(req, reply)
  };

  return reply.code(statusCode).send(body);
}
