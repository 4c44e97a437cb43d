import { timingSafeEqual } from 'node:crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { env } from '../config/env.js';
import { sendApiError } from '../lib/apiError.js';

let warnedAboutMissingApiKey = false;

function readApiKeyHeader(req: FastifyRequest): string {
  const value = req.headers['x-api-key'];
  if (Array.isArray(value)) {
    return value[0] ?? '';
  }

  return value ?? '';
}

function matchesApiKey(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/** preHandler for mutation routes. Without API_KEY, development lets requests through and other environments answer 503. */
export async function requireMutationApiKey(req: FastifyRequest, reply: FastifyReply) {
  if (!env.API_KEY) {
    if (env.NODE_ENV === 'development') {
      if (!warnedAboutMissingApiKey) {
        warnedAboutMissingApiKey = true;
        req.log.warn({ route: req.url }, 'auth.api_key_missing_in_development_allowing_request');
      }
      return;
    }

    return sendApiError(
      req,
      reply,
      503,
      'AUTH_MISCONFIGURED',
      'API key authentication is not configured for this environment'
    );
  }

  if (!matchesApiKey(readApiKeyHeader(req), env.API_KEY)) {
    return sendApiError(req, reply, 401, 'UNAUTHORIZED', 'Invalid API key');
  }
}
