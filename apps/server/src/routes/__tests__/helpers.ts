/**
 * Shared fixtures for route tests: an in-memory session directory, a
 * recording transcoder and an app built around them on a temp directory.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { FastifyInstance } from 'fastify';
import { vi } from 'vitest';
import type { AuthUser } from '@streamclip/shared';
import { buildApp } from '../../app.js';
import { ArtifactCatalog } from '../../services/artifacts.js';
import { ClipService } from '../../services/clips.js';
import type {
  MediaItemDetails,
  PlaybackSession,
  SessionDirectory,
} from '../../services/mediaServer/types.js';
import type { ClipPlan, FramePlan, TranscodeDelegate } from '../../services/transcoder/types.js';
import { ViewerNotStreamingError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';

export const TEST_TOKEN = 'test-token';
export const REQUEST_TIME = new Date('2024-01-01T00:00:00Z');

export const silentLogger: Logger = {
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

export function createSession(overrides: Partial<PlaybackSession> = {}): PlaybackSession {
  return {
    viewerName: 'Alice',
    viewerId: '1',
    sessionKey: '12',
    mediaKey: '/library/metadata/500',
    playbackOffsetMs: 3_723_000,
    currentTimeString: '01:02:03',
    durationMs: 7_200_000,
    sourcePath: '/media/movies/Test Movie.mkv',
    frameRate: 24,
    title: 'Test Movie',
    displayTitle: 'Test Movie',
    kind: 'movie',
    playerState: 'playing',
    ...overrides,
  };
}

/**
 * SessionDirectory over a fixed list of sessions
 */
export class InMemoryDirectory implements SessionDirectory {
  failure: Error | null = null;

  constructor(public sessions: PlaybackSession[] = []) {}

  async listActiveSessions(): Promise<PlaybackSession[]> {
    if (this.failure) throw this.failure;
    return this.sessions;
  }

  async findSessionForViewer(viewerName: string): Promise<PlaybackSession | null> {
    const wanted = viewerName.toLowerCase();
    const sessions = await this.listActiveSessions();
    return sessions.find((session) => session.viewerName.toLowerCase() === wanted) ?? null;
  }

  async requireSessionForViewer(viewerName: string): Promise<PlaybackSession> {
    const session = await this.findSessionForViewer(viewerName);
    if (!session) throw new ViewerNotStreamingError(viewerName);
    return session;
  }

  async getMediaDetails(mediaKey: string): Promise<MediaItemDetails> {
    const session = this.sessions.find((s) => s.mediaKey === mediaKey);
    return {
      mediaKey,
      title: session?.title ?? '',
      kind: session?.kind ?? 'unknown',
      durationMs: session?.durationMs ?? 0,
      sourcePath: session?.sourcePath ?? '',
      frameRate: session?.frameRate ?? 24,
    };
  }

  async testConnection(): Promise<boolean> {
    return this.failure === null;
  }
}

export function createTranscoder() {
  return {
    extractClip: vi.fn<(plan: ClipPlan) => Promise<void>>().mockResolvedValue(undefined),
    extractFrames: vi.fn<(plan: FramePlan) => Promise<void>>().mockResolvedValue(undefined),
    probeMetadata: vi.fn<(filePath: string) => Promise<Record<string, string>>>().mockResolvedValue({}),
  } satisfies TranscodeDelegate;
}

export async function verifyTestToken(token: string): Promise<AuthUser | null> {
  return token === TEST_TOKEN ? { userId: '1', username: 'alice' } : null;
}

export interface TestContext {
  app: FastifyInstance;
  directory: InMemoryDirectory;
  transcoder: ReturnType<typeof createTranscoder>;
  staticRoot: string;
  close: () => Promise<void>;
}

/**
 * Build the full app around in-process fakes and a throwaway static root
 */
export async function buildTestApp(sessions: PlaybackSession[] = [createSession()]): Promise<TestContext> {
  const staticRoot = await mkdtemp(join(tmpdir(), 'routes-'));
  const directory = new InMemoryDirectory(sessions);
  const transcoder = createTranscoder();
  const catalog = new ArtifactCatalog({ staticRoot, transcoder, logger: silentLogger });
  await catalog.ensureDirectories();

  const app = await buildApp({
    directory,
    clips: new ClipService({ transcoder, staticRoot, logger: silentLogger, now: () => REQUEST_TIME }),
    catalog,
    verifyToken: verifyTestToken,
    staticRoot,
    serverConfigured: true,
    rateLimitMax: false,
  });

  return {
    app,
    directory,
    transcoder,
    staticRoot,
    close: async () => {
      await app.close();
      await rm(staticRoot, { recursive: true, force: true });
    },
  };
}
