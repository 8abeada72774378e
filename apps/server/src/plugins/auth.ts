/**
 * Authentication plugin for Fastify
 *
 * Callers identify themselves with their Plex token in the X-Plex-Token
 * header; the token is checked against plex.tv on every protected request.
 */

import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import type { AuthUser } from '@streamclip/shared';

export const PLEX_TOKEN_HEADER = 'x-plex-token';

export type TokenVerifier = (token: string) => Promise<AuthUser | null>;

export interface AuthPluginOptions {
  verifyToken: TokenVerifier;
}

declare module 'fastify' {
  interface FastifyInstance {
    authenticate: (request: FastifyRequest) => Promise<void>;
  }
  interface FastifyRequest {
    authUser: AuthUser | null;
  }
}

const authPlugin: FastifyPluginAsync<AuthPluginOptions> = async (app, options) => {
  app.decorateRequest('authUser', null);

  // Authenticate decorator - verifies the Plex token with plex.tv
  app.decorate('authenticate', async function (request: FastifyRequest) {
    const header = request.headers[PLEX_TOKEN_HEADER];
    const token = Array.isArray(header) ? header[0] : header;

    if (!token) {
      throw app.httpErrors.unauthorized('Plex token required');
    }

    const user = await options.verifyToken(token);
    if (!user) {
      throw app.httpErrors.unauthorized('Invalid Plex token');
    }

    request.authUser = user;
  });
};

export default fp(authPlugin, {
  name: 'auth',
  dependencies: ['@fastify/sensible'],
});
