/**
 * Clip routes - Create, list and delete clips and snapshots
 */

import type { FastifyPluginAsync } from 'fastify';
import {
  addTimeQuerySchema,
  createClipSchema,
  createSnapshotSchema,
  deleteFileQuerySchema,
  type AddTimeQueryInput,
  type AddTimeResponse,
  type ClipResult,
  type CreateClipInput,
  type CreateSnapshotInput,
  type DeleteFileQueryInput,
  type ImageListResponse,
  type SnapshotDescriptor,
  type SnapshotResult,
  type VideoListResponse,
} from '@streamclip/shared';
import type { SessionDirectory } from '../services/mediaServer/types.js';
import type { ClipService } from '../services/clips.js';
import type { ArtifactCatalog } from '../services/artifacts.js';
import { addSeconds } from '../utils/timestamp.js';

export interface ClipRoutesOptions {
  directory: SessionDirectory;
  clips: ClipService;
  catalog: ArtifactCatalog;
}

export const clipRoutes: FastifyPluginAsync<ClipRoutesOptions> = async (app, options) => {
  const { directory, clips, catalog } = options;

  /**
   * POST /clips - Cut a clip from what the viewer is watching
   */
  app.post<{ Body: CreateClipInput }>(
    '/',
    { preHandler: [app.validateRequest({ body: createClipSchema })] },
    async (request): Promise<ClipResult> => {
      const { viewerName, start, end } = request.body;
      const session = await directory.requireSessionForViewer(viewerName);
      return clips.createClip(session, { viewerName, start, end });
    }
  );

  /**
   * POST /clips/snapshot - Grab frames at the viewer's current position
   */
  app.post<{ Body: CreateSnapshotInput }>(
    '/snapshot',
    { preHandler: [app.validateRequest({ body: createSnapshotSchema })] },
    async (request): Promise<SnapshotResult> => {
      const { viewerName, frameCount } = request.body;
      const session = await directory.requireSessionForViewer(viewerName);
      return clips.createSnapshot(session, frameCount);
    }
  );

  /**
   * GET /clips/videos - Produced clips with their embedded metadata
   */
  app.get('/videos', async (): Promise<VideoListResponse> => {
    return { videos: await catalog.listClips() };
  });

  /**
   * GET /clips/images - Public paths of produced snapshot frames
   */
  app.get('/images', async (): Promise<ImageListResponse> => {
    return { images: await catalog.listSnapshots() };
  });

  /**
   * GET /clips/snapshots - Snapshot frames with the position they were taken at
   */
  app.get('/snapshots', async (): Promise<{ snapshots: SnapshotDescriptor[] }> => {
    return { snapshots: await catalog.listSnapshotDescriptors() };
  });

  /**
   * DELETE /clips/file?path= - Remove a produced file (requires a Plex token)
   */
  app.delete<{ Querystring: DeleteFileQueryInput }>(
    '/file',
    {
      preHandler: [app.authenticate, app.validateRequest({ query: deleteFileQuerySchema })],
    },
    async (request, reply) => {
      const deleted = await catalog.deleteArtifact(request.query.path);
      if (!deleted) {
        return reply.notFound('File not found or could not be deleted');
      }

      request.log.info({ path: request.query.path, user: request.authUser?.username }, 'File deleted');
      return { status: 'success', message: 'File deleted' };
    }
  );

  /**
   * POST /clips/time/add?time=&seconds= - Shift a timestamp, wrapping at midnight
   */
  app.post<{ Querystring: AddTimeQueryInput }>(
    '/time/add',
    { preHandler: [app.validateRequest({ query: addTimeQuerySchema })] },
    async (request): Promise<AddTimeResponse> => {
      const { time, seconds } = request.query;
      return { originalTime: time, newTime: addSeconds(time, seconds) };
    }
  );
};
