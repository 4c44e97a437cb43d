import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';
import { ZodError } from 'zod';
import { getCorrelationId, sendApiError } from '../lib/apiError.js';
import { isRepairEngineError } from '../lib/errors.js';

const INTERNAL_ERROR_MESSAGE = 'An unexpected error occurred';

type ErrorWithStatusCode = Error & { statusCode?: number };

type ErrorResponse = {
  statusCode: number;
  code: string;
  message: string;
};

function hasStatusCode(error: Error): error is ErrorWithStatusCode {
  return 'statusCode' in error;
}

function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ZodError) {
    const issue = error.issues[0];
    const message = issue ? `${issue.path.join('.') || 'request'}: ${issue.message}` : error.message;
    return { statusCode: 400, code: 'VALIDATION_ERROR', message };
  }

  if (isRepairEngineError(error)) {
    return error.statusCode >= 500
      ? { statusCode: error.statusCode, code: 'INTERNAL_ERROR', message: INTERNAL_ERROR_MESSAGE }
      : { statusCode: error.statusCode, code: error.code, message: error.message };
  }

  // framework errors such as malformed JSON bodies carry their own 4xx status
  if (error instanceof Error && hasStatusCode(error) && typeof error.statusCode === 'number') {
    if (error.statusCode >= 400 && error.statusCode < 500) {
      return { statusCode: error.statusCode, code: 'REQUEST_ERROR', message: error.message };
    }
  }

  return { statusCode: 500, code: 'INTERNAL_ERROR', message: INTERNAL_ERROR_MESSAGE };
}

const errorEnvelope: FastifyPluginAsync = async (app) => {
  app.setErrorHandler(async (error, req, reply) => {
    const response = toErrorResponse(error);
    const correlationId = getCorrelationId(req, reply);

    const logPayload = { err: error, correlationId, code: response.code };
    if (response.statusCode >= 500) {
      req.log.error(logPayload, 'request.failed');
    } else {
      req.log.warn(logPayload, 'request.rejected');
    }

    return sendApiError(req, reply, response.statusCode, response.code, response.message);
  });

  app.setNotFoundHandler(async (req, reply) => sendApiError(req, reply, 404, 'NOT_FOUND', 'Route not found'));
};

export const errorEnvelopePlugin = fp(errorEnvelope);
