/**
 * Clip and Snapshot Service
 *
 * Turns a resolved playback session plus a request into an extraction plan,
 * hands it to the transcode delegate, and maps any failure to a domain error.
 * Each call stands alone: a failed extraction has no effect on other requests.
 */

import { readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import {
  ARTIFACT_EXTENSIONS,
  MAX_FILENAME_TITLE_LENGTH,
  MEDIA_DIRS,
  STATIC_PREFIX,
  type ClipResult,
  type SnapshotResult,
} from '@streamclip/shared';
import {
  ClipCreationFailedError,
  InvalidClipWindowError,
  NoPlayableMediaError,
  SnapshotCreationFailedError,
  TranscodeError,
  getErrorMessage,
} from '../utils/errors.js';
import { clipLogger, type Logger } from '../utils/logger.js';
import { durationSeconds } from '../utils/timestamp.js';
import type { PlaybackSession } from './mediaServer/types.js';
import type { ClipPlan, FramePlan, TranscodeDelegate } from './transcoder/types.js';

// ============================================================================
// Types
// ============================================================================

export interface ClipRequest {
  viewerName: string;
  /** HH:MM:SS */
  start: string;
  /** HH:MM:SS */
  end: string;
}

export interface ClipServiceOptions {
  transcoder: TranscodeDelegate;
  /** Directory holding the public media tree (videos/ and images/ live below it) */
  staticRoot: string;
  logger?: Logger;
  /** Source of the request time, injectable for deterministic names */
  now?: () => Date;
}

/** Fixed output profile: H.264/AAC in yuv420p plays nearly everywhere */
export const CLIP_ENCODING = {
  videoCodec: 'libx264',
  audioCodec: 'aac',
  pixelFormat: 'yuv420p',
  crf: 18,
} as const;

export const SNAPSHOT_QUALITY = 2;

// ============================================================================
// Naming
// ============================================================================

const FILESYSTEM_HOSTILE = /[<>:"/\\|?* ]/g;

/**
 * Replace characters that are unsafe in file names and cap the length
 *
 * @example
 * sanitizeFilename('Show: Pilot/Ep 1') // 'Show__Pilot_Ep_1'
 */
export function sanitizeFilename(name: string): string {
  return name.replace(FILESYSTEM_HOSTILE, '_').slice(0, MAX_FILENAME_TITLE_LENGTH);
}

/**
 * `{viewer}_{title}_{unixSeconds}`, stable for a given request time
 */
export function buildClipBaseName(session: PlaybackSession, viewerName: string, requestedAt: Date): string {
  const unixSeconds = Math.floor(requestedAt.getTime() / 1000);
  return `${sanitizeFilename(viewerName)}_${sanitizeFilename(session.displayTitle)}_${unixSeconds}`;
}

/**
 * File name label for snapshots taken at a playback position ('01:02:03' -> '01_02_03')
 */
export function snapshotLabel(timeString: string): string {
  return timeString.replace(/:/g, '_');
}

/**
 * Tags embedded in a clip. The comment carries the position the viewer was
 * at when the clip was requested, not the clip's own window.
 */
export function buildClipMetadata(session: PlaybackSession, viewerName: string): Record<string, string> {
  const metadata: Record<string, string> = {
    title: session.displayTitle,
    comment: session.currentTimeString,
    artist: viewerName,
  };

  if (session.kind === 'episode' && session.episode) {
    metadata.show = session.episode.showTitle;
    metadata.season_number = session.episode.seasonNumber?.toString() ?? '';
    metadata.episode_id = session.episode.episodeNumber?.toString() ?? '';
  }

  return Object.fromEntries(Object.entries(metadata).filter(([, value]) => value !== ''));
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function diagnosticOf(error: unknown): string {
  return error instanceof TranscodeError ? error.diagnostic : getErrorMessage(error);
}

// ============================================================================
// Service
// ============================================================================

export class ClipService {
  private readonly transcoder: TranscodeDelegate;
  private readonly videosDir: string;
  private readonly imagesDir: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: ClipServiceOptions) {
    this.transcoder = options.transcoder;
    this.videosDir = join(options.staticRoot, MEDIA_DIRS.VIDEOS);
    this.imagesDir = join(options.staticRoot, MEDIA_DIRS.IMAGES);
    this.logger = options.logger ?? clipLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Remove what a failed extraction left behind. Cleanup problems are logged;
   * the extraction failure is what the caller sees.
   */
  private async discardFiles(paths: string[]): Promise<void> {
    for (const path of paths) {
      try {
        await rm(path, { force: true });
      } catch (error) {
        this.logger.warn('Failed to remove partial output', { path, error: getErrorMessage(error) });
      }
    }
  }

  /**
   * Frames already written for a snapshot label ({label}_NNN.jpg)
   */
  private async snapshotFrames(timestampLabel: string): Promise<string[]> {
    const framePattern = new RegExp(`^${timestampLabel}_\\d{3,}\\${ARTIFACT_EXTENSIONS.SNAPSHOT}$`);
    try {
      const names = await readdir(this.imagesDir);
      return names.filter((name) => framePattern.test(name)).map((name) => join(this.imagesDir, name));
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        this.logger.warn('Failed to list partial snapshot frames', { error: getErrorMessage(error) });
      }
      return [];
    }
  }

  private assertPlayable(session: PlaybackSession): void {
    if (!session.sourcePath) {
      throw new NoPlayableMediaError(session.viewerName);
    }
  }

  /**
   * Build the clip plan without running anything
   *
   * @throws NoPlayableMediaError when the session has no source file
   * @throws InvalidTimeFormatError when start or end is not HH:MM:SS
   * @throws InvalidClipWindowError when end is not after start
   */
  planClip(session: PlaybackSession, request: ClipRequest): { plan: ClipPlan; filename: string } {
    this.assertPlayable(session);

    const duration = durationSeconds(request.start, request.end);
    if (duration <= 0) {
      throw new InvalidClipWindowError(request.start, request.end, duration);
    }

    const filename = `${buildClipBaseName(session, request.viewerName, this.now())}${ARTIFACT_EXTENSIONS.CLIP}`;

    return {
      filename,
      plan: {
        inputPath: session.sourcePath,
        startTime: request.start,
        durationSeconds: duration,
        outputPath: join(this.videosDir, filename),
        ...CLIP_ENCODING,
        metadata: buildClipMetadata(session, request.viewerName),
      },
    };
  }

  /**
   * Cut a clip from the session's source file
   *
   * @throws ClipCreationFailedError when the transcoder fails
   */
  async createClip(session: PlaybackSession, request: ClipRequest): Promise<ClipResult> {
    const { plan, filename } = this.planClip(session, request);

    try {
      await this.transcoder.extractClip(plan);
    } catch (error) {
      const diagnostic = diagnosticOf(error);
      this.logger.error('Clip extraction failed', { viewer: request.viewerName, filename, diagnostic });
      await this.discardFiles([plan.outputPath]);
      throw new ClipCreationFailedError(diagnostic);
    }

    this.logger.info('Created clip', { viewer: request.viewerName, filename, durationSeconds: plan.durationSeconds });

    return {
      status: 'success',
      filename,
      relativePath: `${STATIC_PREFIX}/${MEDIA_DIRS.VIDEOS}/${filename}`,
    };
  }

  /**
   * Grab frameCount frames starting at the session's current position
   *
   * @throws NoPlayableMediaError when the session has no source file
   * @throws SnapshotCreationFailedError when the transcoder fails
   */
  async createSnapshot(session: PlaybackSession, frameCount = 1): Promise<SnapshotResult> {
    this.assertPlayable(session);

    const timestampLabel = snapshotLabel(session.currentTimeString);
    const plan: FramePlan = {
      inputPath: session.sourcePath,
      seekTime: session.currentTimeString,
      frameCount,
      outputPattern: join(this.imagesDir, `${timestampLabel}_%03d${ARTIFACT_EXTENSIONS.SNAPSHOT}`),
      quality: SNAPSHOT_QUALITY,
    };

    try {
      await this.transcoder.extractFrames(plan);
    } catch (error) {
      const diagnostic = diagnosticOf(error);
      this.logger.error('Snapshot extraction failed', { viewer: session.viewerName, diagnostic });
      await this.discardFiles(await this.snapshotFrames(timestampLabel));
      throw new SnapshotCreationFailedError(diagnostic);
    }

    this.logger.info('Created snapshot', { viewer: session.viewerName, timestampLabel, frameCount });

    return { status: 'success', timestampLabel, frameCount };
  }
}
