/**
 * Fastify application factory
 *
 * Collaborators are passed in rather than created here so tests can build an
 * app around in-process fakes.
 */

import Fastify, { type FastifyError, type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import sensible from '@fastify/sensible';
import rateLimit from '@fastify/rate-limit';
import fastifyStatic from '@fastify/static';
import { resolve } from 'node:path';
import { API_BASE_PATH, STATIC_PREFIX, type ApiError } from '@streamclip/shared';

import validationPlugin from './plugins/validation.js';
import authPlugin, { type TokenVerifier } from './plugins/auth.js';
import { authRoutes } from './routes/auth.js';
import { sessionRoutes } from './routes/sessions.js';
import { clipRoutes } from './routes/clips.js';
import { AppError } from './utils/errors.js';
import type { SessionDirectory } from './services/mediaServer/types.js';
import type { ClipService } from './services/clips.js';
import type { ArtifactCatalog } from './services/artifacts.js';

export interface AppDependencies {
  directory: SessionDirectory;
  clips: ClipService;
  catalog: ArtifactCatalog;
  verifyToken: TokenVerifier;
  staticRoot: string;
  serverConfigured: boolean;
  corsOrigin?: string | boolean;
  /** Disable for tests; requests per minute per client otherwise */
  rateLimitMax?: number | false;
  logger?: FastifyServerOptions['logger'];
}

export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const app = Fastify({ logger: deps.logger ?? false });

  // Security plugins
  await app.register(helmet, {
    // Produced media is loaded by other origins' <video>/<img> tags
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });
  await app.register(cors, {
    origin: deps.corsOrigin ?? true,
    credentials: true,
  });
  if (deps.rateLimitMax !== false) {
    await app.register(rateLimit, {
      max: deps.rateLimitMax ?? 100,
      timeWindow: '1 minute',
    });
  }

  // Utility plugins
  await app.register(sensible);
  await app.register(validationPlugin);
  await app.register(authPlugin, { verifyToken: deps.verifyToken });

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error, code: error.code }, error.message);
      }
      const body: ApiError = {
        statusCode: error.statusCode,
        error: error.name,
        code: error.code,
        message: error.message,
        details: error.details,
      };
      return reply.status(error.statusCode).send(body);
    }

    // @fastify/sensible http errors and Fastify's own errors carry a status
    const statusCode = typeof error.statusCode === 'number' ? error.statusCode : 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    return reply.status(statusCode).send({
      statusCode,
      error: error.name,
      code: error.code || (statusCode >= 500 ? 'INTERNAL_ERROR' : 'HTTP_ERROR'),
      message: statusCode >= 500 ? 'Internal Server Error' : error.message,
    });
  });

  // Produced clips and snapshots
  await app.register(fastifyStatic, {
    root: resolve(deps.staticRoot),
    prefix: `/${STATIC_PREFIX}/`,
  });

  // Health check
  app.get('/health', async () => ({ status: 'ok' }));

  // API routes
  await app.register(authRoutes, {
    prefix: `${API_BASE_PATH}/auth`,
    verifyToken: deps.verifyToken,
    serverConfigured: deps.serverConfigured,
  });
  await app.register(sessionRoutes, {
    prefix: `${API_BASE_PATH}/plex`,
    directory: deps.directory,
  });
  await app.register(clipRoutes, {
    prefix: `${API_BASE_PATH}/clips`,
    directory: deps.directory,
    clips: deps.clips,
    catalog: deps.catalog,
  });

  return app;
}
