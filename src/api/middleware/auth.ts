import { FastifyRequest, FastifyReply } from 'fastify';
import { config } from '../../config';
import { ForbiddenError, UnauthorizedError } from '../../shared/errors';

/**
 * Bearer-token check for the submission routes. A missing token is 401, a
 * wrong one 403.
 */
export async function authMiddleware(
  request: FastifyRequest,
  _reply: FastifyReply
): Promise<void> {
  const apiKey = request.headers['x-api-key'];
  const authHeader = request.headers['authorization'];

  let token: string | undefined;

  // Check X-API-Key header first
  if (typeof apiKey === 'string' && apiKey.length > 0) {
    token = apiKey.trim();
  }
  // Then check Authorization: Bearer header
  else if (authHeader?.startsWith('Bearer ')) {
    token = authHeader.substring(7).trim();
  }

  if (!token) {
    throw new UnauthorizedError('Missing or invalid Authorization header');
  }

  if (token !== config.apiSecretKey) {
    request.log.warn({ providedKey: token.substring(0, 4) + '...' }, 'Invalid API key attempt');
    throw new ForbiddenError('Invalid API key');
  }

  request.log.debug('API key validated');
}
