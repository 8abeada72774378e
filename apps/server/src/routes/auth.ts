/**
 * Auth routes - Plex token verification
 */

import type { FastifyPluginAsync } from 'fastify';
import {
  verifyTokenSchema,
  type AuthResponse,
  type AuthStatus,
  type VerifyTokenInput,
} from '@streamclip/shared';
import type { TokenVerifier } from '../plugins/auth.js';

export interface AuthRoutesOptions {
  verifyToken: TokenVerifier;
  /** Whether a Plex server URL and token are configured */
  serverConfigured: boolean;
}

export const authRoutes: FastifyPluginAsync<AuthRoutesOptions> = async (app, options) => {
  /**
   * POST /auth/verify - Check a Plex token against plex.tv
   */
  app.post<{ Body: VerifyTokenInput }>(
    '/verify',
    { preHandler: [app.validateRequest({ body: verifyTokenSchema })] },
    async (request, reply) => {
      const user = await options.verifyToken(request.body.token);
      if (!user) {
        return reply.unauthorized('Invalid Plex token or unable to verify with plex.tv');
      }

      const result: AuthResponse = {
        success: true,
        username: user.username,
        userId: user.userId || undefined,
        message: 'Authentication successful',
      };
      return result;
    }
  );

  /**
   * GET /auth/status - How callers authenticate
   */
  app.get('/status', async () => {
    const status: AuthStatus = {
      authRequired: true,
      authMethod: 'plex_token',
      serverConfigured: options.serverConfigured,
    };
    return status;
  });
};
