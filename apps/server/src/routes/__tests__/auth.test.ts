/**
 * Auth routes tests
 *
 * - POST /auth/verify - Check a Plex token
 * - GET /auth/status - Auth configuration
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { TEST_TOKEN, buildTestApp, type TestContext } from './helpers.js';

describe('Auth routes', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await buildTestApp();
  });

  afterEach(async () => {
    await ctx.close();
  });

  describe('POST /api/v1/auth/verify', () => {
    it('should accept a valid token', async () => {
      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/v1/auth/verify',
        payload: { token: TEST_TOKEN },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        success: true,
        username: 'alice',
        userId: '1',
        message: 'Authentication successful',
      });
    });

    it('should return 401 for a rejected token', async () => {
      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/v1/auth/verify',
        payload: { token: 'wrong-token' },
      });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({
        message: 'Invalid Plex token or unable to verify with plex.tv',
      });
    });

    it('should return 400 when the token is missing', async () => {
      const response = await ctx.app.inject({
        method: 'POST',
        url: '/api/v1/auth/verify',
        payload: {},
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ code: 'VALIDATION_ERROR' });
    });
  });

  describe('GET /api/v1/auth/status', () => {
    it('should describe the token scheme', async () => {
      const response = await ctx.app.inject({ method: 'GET', url: '/api/v1/auth/status' });

      expect(response.json()).toEqual({
        authRequired: true,
        authMethod: 'plex_token',
        serverConfigured: true,
      });
    });
  });
});
