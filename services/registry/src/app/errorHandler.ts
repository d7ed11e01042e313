import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ErrorResponse } from '@fleet/protocol';
import { ZodError } from 'zod';
import { RegistryError } from '../domain/errors';

type HandledError = FastifyError | RegistryError | ZodError;

const mapErrorToStatus = (error: HandledError): { statusCode: number; code: string } => {
  if (error instanceof RegistryError) {
    return { statusCode: error.statusCode, code: error.code };
  }

  if (error instanceof ZodError) {
    return { statusCode: 400, code: 'VALIDATION_ERROR' };
  }

  if (error.code === 'FST_ERR_VALIDATION') {
    return { statusCode: 400, code: 'VALIDATION_ERROR' };
  }

  // framework-level client errors (malformed JSON, unsupported media type, body too large)
  if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
    return { statusCode: error.statusCode, code: 'BAD_REQUEST' };
  }

  return { statusCode: 500, code: 'INTERNAL_SERVER_ERROR' };
};

const detailsFor = (error: HandledError): Record<string, unknown> | undefined => {
  if (error instanceof RegistryError) return error.details;
  if (error instanceof ZodError) return error.flatten();
  return undefined;
};

export const registerErrorHandler = (app: FastifyInstance) => {
  const handler = (error: HandledError, request: FastifyRequest, reply: FastifyReply) => {
    const { statusCode, code } = mapErrorToStatus(error);

    const responseBody: ErrorResponse = {
      code,
      message: statusCode === 500 ? 'Internal server error' : error.message,
      details: detailsFor(error),
      requestId: request.id
    };

    if (statusCode === 500) {
      request.log.error({ err: error, requestId: request.id }, 'Unhandled error');
    } else if (statusCode >= 400 && statusCode < 500) {
      request.log.warn({ err: error, requestId: request.id }, 'Client error');
    } else {
      request.log.warn({ err: error, requestId: request.id }, 'Upstream error');
    }

    reply
      .code(statusCode)
      .type('application/json')
      .send(responseBody);
  };

  app.setErrorHandler(handler);

  app.setNotFoundHandler((request, reply) => {
    const responseBody: ErrorResponse = {
      code: 'NOT_FOUND',
      message: `Route ${request.method}:${request.url} not found`,
      requestId: request.id
    };
    reply.code(404).send(responseBody);
  });
};
