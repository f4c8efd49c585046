import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { isAppError } from '../shared/errors';
import type { ApiResponse } from '../shared/types';

/**
 * Maps thrown errors to the API envelope. 5xx messages never reach clients.
 */
export function errorHandler(error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply): void {
  const correlationId = request.correlationId || request.id;
  const statusCode = isAppError(error)
    ? error.statusCode
    : 'statusCode' in error && typeof error.statusCode === 'number'
      ? error.statusCode
      : 500;

  const log = { correlationId, error: error.message, statusCode };
  if (statusCode >= 500) {
    request.log.error({ ...log, stack: error.stack }, 'Request error');
  } else {
    request.log.warn(log, 'Request rejected');
  }

  const body: ApiResponse = {
    success: false,
    error: statusCode >= 500 ? 'Internal server error' : error.message,
    code: isAppError(error) ? error.code : undefined,
    correlationId,
  };

  reply.status(statusCode).send(body);
}
