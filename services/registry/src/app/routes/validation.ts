import type { ErrorResponse } from '@fleet/protocol';
import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ZodError } from 'zod';

export const sendValidationError = (request: FastifyRequest, reply: FastifyReply, message: string, error: ZodError) => {
  const body: ErrorResponse = {
    code: 'VALIDATION_ERROR',
    message,
    details: error.flatten(),
    requestId: request.id
  };
  return reply.code(400).send(body);
};
