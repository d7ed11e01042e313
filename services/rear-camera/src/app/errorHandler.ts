import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { CameraError } from '../camera/errors';

type HandledError = FastifyError | CameraError;

const mapErrorToStatus = (error: HandledError): { statusCode: number; code: string } => {
  if (error instanceof CameraError) {
    return { statusCode: error.statusCode, code: error.code };
  }
  if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
    return { statusCode: error.statusCode, code: 'BAD_REQUEST' };
  }
  return { statusCode: 500, code: 'INTERNAL_SERVER_ERROR' };
};

export const registerErrorHandler = (app: FastifyInstance) => {
  app.setErrorHandler((error: HandledError, request: FastifyRequest, reply: FastifyReply) => {
    const { statusCode, code } = mapErrorToStatus(error);

    if (statusCode === 500) {
      request.log.error({ err: error, requestId: request.id }, 'Unhandled error');
    } else {
      request.log.warn({ err: error, requestId: request.id }, 'Client error');
    }

    reply.code(statusCode).send({
      code,
      message: statusCode === 500 ? 'Internal server error' : error.message,
      requestId: request.id
    });
  });

  app.setNotFoundHandler((request, reply) => {
    reply.code(404).send({
      code: 'NOT_FOUND',
      message: `Route ${request.method}:${request.url} not found`,
      requestId: request.id
    });
  });
};
