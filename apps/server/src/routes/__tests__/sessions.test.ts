/**
 * Session routes tests
 *
 * - GET /plex/sessions - All active sessions
 * - GET /plex/stream/:viewer - One viewer's stream
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { UpstreamError, UpstreamUnreachableError } from '../../utils/errors.js';
import { buildTestApp, createSession, type TestContext } from './helpers.js';

describe('Session routes', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await buildTestApp([
      createSession(),
      createSession({
        viewerName: 'Carol',
        sessionKey: '13',
        title: 'Pilot',
        displayTitle: 'Sample Show - Pilot',
        kind: 'episode',
        currentTimeString: '00:00:05',
        sourcePath: '/media/show/s01e01.mkv',
      }),
    ]);
  });

  afterEach(async () => {
    await ctx.close();
  });

  describe('GET /api/v1/plex/sessions', () => {
    it('should list every active session', async () => {
      const response = await ctx.app.inject({ method: 'GET', url: '/api/v1/plex/sessions' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        count: 2,
        sessions: [
          {
            viewer: 'Alice',
            title: 'Test Movie',
            currentTimeString: '01:02:03',
            sourcePath: '/media/movies/Test Movie.mkv',
            kind: 'movie',
            sessionKey: '12',
          },
          {
            viewer: 'Carol',
            title: 'Sample Show - Pilot',
            currentTimeString: '00:00:05',
            sourcePath: '/media/show/s01e01.mkv',
            kind: 'episode',
            sessionKey: '13',
          },
        ],
      });
    });

    it('should return 503 when Plex is unreachable', async () => {
      ctx.directory.failure = new UpstreamUnreachableError('plex');

      const response = await ctx.app.inject({ method: 'GET', url: '/api/v1/plex/sessions' });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toEqual({
        statusCode: 503,
        error: 'UpstreamUnreachableError',
        code: 'UPSTREAM_UNREACHABLE',
        message: 'Unable to connect to plex',
      });
    });

    it('should pass the upstream status through', async () => {
      ctx.directory.failure = new UpstreamError('plex', 401, 'Unauthorized');

      const response = await ctx.app.inject({ method: 'GET', url: '/api/v1/plex/sessions' });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({ message: 'plex responded with 401 Unauthorized' });
    });
  });

  describe('GET /api/v1/plex/stream/:viewer', () => {
    it('should match the viewer case-insensitively', async () => {
      const response = await ctx.app.inject({ method: 'GET', url: '/api/v1/plex/stream/CAROL' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ viewer: 'Carol', sessionKey: '13' });
    });

    it('should return 404 for a viewer who is not streaming', async () => {
      const response = await ctx.app.inject({ method: 'GET', url: '/api/v1/plex/stream/Bob' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({ message: 'No active stream found for user Bob' });
    });
  });
});
