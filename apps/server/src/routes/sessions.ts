/**
 * Session routes - What each viewer is watching right now
 */

import type { FastifyPluginAsync } from 'fastify';
import {
  viewerParamSchema,
  type SessionView,
  type SessionsResponse,
  type ViewerParamInput,
} from '@streamclip/shared';
import type { SessionDirectory } from '../services/mediaServer/types.js';
import { toSessionView } from '../services/mediaServer/plex/parser.js';

export interface SessionRoutesOptions {
  directory: SessionDirectory;
}

export const sessionRoutes: FastifyPluginAsync<SessionRoutesOptions> = async (app, options) => {
  const { directory } = options;

  /**
   * GET /plex/sessions - All active video sessions
   */
  app.get('/sessions', async () => {
    const sessions = await directory.listActiveSessions();
    const result: SessionsResponse = {
      sessions: sessions.map(toSessionView),
      count: sessions.length,
    };
    return result;
  });

  /**
   * GET /plex/stream/:viewer - Current stream of one viewer
   */
  app.get<{ Params: ViewerParamInput }>(
    '/stream/:viewer',
    { preHandler: [app.validateRequest({ params: viewerParamSchema })] },
    async (request): Promise<SessionView> => {
      const session = await directory.requireSessionForViewer(request.params.viewer);
      return toSessionView(session);
    }
  );
};
