import { timingSafeEqual } from 'crypto';
import { FastifyRequest, FastifyReply, preHandlerAsyncHookHandler } from 'fastify';
import { UnauthorizedError } from '../../shared/errors';

function extractToken(request: FastifyRequest): string | undefined {
  const apiKey = request.headers['x-api-key'];
  if (typeof apiKey === 'string' && apiKey) {
    return apiKey;
  }

  const authHeader = request.headers.authorization;
  if (authHeader?.startsWith('Bearer ')) {
    return authHeader.substring(7);
  }

  return undefined;
}

function sameKey(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * API-key check for the intake routes: `x-api-key` header or
 * `Authorization: Bearer <key>`.
 */
export function createAuthMiddleware(apiSecretKey: string): preHandlerAsyncHookHandler {
  return async function authMiddleware(request: FastifyRequest, _reply: FastifyReply): Promise<void> {
    const token = extractToken(request);

    if (!token) {
      throw new UnauthorizedError('Missing API key or authorization token');
    }

    if (!sameKey(token, apiSecretKey)) {
      request.log.warn({ providedKey: token.substring(0, 4) + '...' }, 'Invalid API key attempt');
      throw new UnauthorizedError('Invalid API key');
    }

    request.log.debug('API key validated');
  };
}
