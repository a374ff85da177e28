import { FastifyRequest, FastifyReply } from 'fastify';
import { config } from '../../config';
import { AppError, UnauthorizedError } from '../../shared/errors';

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export async function authMiddleware(
  request: FastifyRequest,
  _reply: FastifyReply
): Promise<void> {
  const apiKey = headerValue(request.headers['x-api-key']);
  const authHeader = headerValue(request.headers['authorization']);

  let token: string | undefined;

  // Check X-API-Key header first
  if (apiKey) {
    token = apiKey;
  }
  // Then check Authorization: Bearer header
  else if (authHeader?.startsWith('Bearer ')) {
    token = authHeader.substring(7);
  }

  if (!token) {
    throw new UnauthorizedError('Missing API key or authorization token');
  }

  if (token !== config.apiSecretKey) {
    request.log.warn({ providedKey: token.substring(0, 4) + '...' }, 'Invalid API key attempt');
    throw new UnauthorizedError('Invalid API key');
  }

  request.log.debug('API key validated');
}

/**
 * Fixed-window rate limit per client IP.
 */
export function rateLimit(options: {
  windowMs: number;
  maxRequests: number;
}) {
  const requests = new Map<string, { count: number; resetAt: number }>();

  return async function rateLimitMiddleware(
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<void> {
    const key = request.ip;
    const now = Date.now();

    let record = requests.get(key);

    // Clean up expired records periodically
    if (requests.size > 10000) {
      for (const [k, v] of requests.entries()) {
        if (v.resetAt < now) {
          requests.delete(k);
        }
      }
    }

    if (!record || record.resetAt < now) {
      record = {
        count: 0,
        resetAt: now + options.windowMs,
      };
      requests.set(key, record);
    }

    record.count++;

    reply.header('X-RateLimit-Limit', options.maxRequests);
    reply.header('X-RateLimit-Remaining', Math.max(0, options.maxRequests - record.count));
    reply.header('X-RateLimit-Reset', Math.ceil(record.resetAt / 1000));

    if (record.count > options.maxRequests) {
      throw new AppError('Too many requests', 429, 'RATE_LIMITED');
    }
  };
}
