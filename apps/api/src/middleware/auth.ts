import { bearerAuth } from 'hono/bearer-auth';
import type { MiddlewareHandler } from 'hono';

/**
 * Bearer token authentication for every /api route.
 * An empty token is rejected at construction so the API never runs open.
 */
export function createAuthMiddleware(token: string): MiddlewareHandler {
  if (!token) {
    throw new Error('API token is required');
  }

  return bearerAuth({
    verifyToken: async (incoming) => incoming === token,
  });
}
