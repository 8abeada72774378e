/**
 * Plex API Response Parser
 *
 * Pure functions for parsing raw Plex API responses into typed objects.
 * Separated from the client for testability and reuse.
 *
 * Every "maybe a list, maybe a single record, maybe absent" child is resolved
 * here, so nothing downstream has to re-check the shape of a session.
 */

import { DEFAULT_FRAME_RATE } from '@streamclip/shared';
import type { AuthUser, EpisodeInfo, MediaKind, SessionView } from '@streamclip/shared';
import {
  asRecordList,
  firstRecord,
  isRecord,
  parseNumber,
  parseOptionalNumber,
  parseString,
  type UnknownRecord,
} from '../../../utils/parsing.js';
import { MalformedSessionError, UpstreamError, getErrorMessage } from '../../../utils/errors.js';
import { millisecondsToTimeString } from '../../../utils/timestamp.js';
import type { Logger } from '../../../utils/logger.js';
import type { MediaItemDetails, PlaybackSession, PlayerState } from '../types.js';

/** Stream type constants from Plex API */
export const STREAM_TYPE = {
  VIDEO: 1,
  AUDIO: 2,
  SUBTITLE: 3,
} as const;

/** Session types that never carry a video stream */
const NON_VIDEO_KINDS: ReadonlySet<string> = new Set(['track', 'photo']);

/** Symbolic frame rates Plex reports in Media.videoFrameRate */
const NAMED_FRAME_RATES: Readonly<Record<string, number>> = {
  ntsc: 29.97,
  pal: 25,
  film: 23.976,
};

// ============================================================================
// Field Extraction
// ============================================================================

/**
 * Parse the media kind; anything Plex reports is kept, lowercased
 */
export function parseMediaKind(type: unknown): MediaKind {
  const kind = parseString(type).trim().toLowerCase();
  return kind === '' ? 'unknown' : kind;
}

function parsePlayerState(state: unknown): PlayerState {
  const stateStr = parseString(state, 'playing').toLowerCase();
  switch (stateStr) {
    case 'paused':
      return 'paused';
    case 'buffering':
      return 'buffering';
    default:
      return 'playing';
  }
}

/**
 * Parse a frame rate value ('23.976', 24, '24p', 'PAL', ...)
 * @returns A positive frame rate, or undefined when not recognisable
 */
export function parseFrameRateValue(value: unknown): number | undefined {
  const raw = parseString(value).trim().toLowerCase();
  if (raw === '') return undefined;

  const named = NAMED_FRAME_RATES[raw];
  if (named !== undefined) return named;

  const numeric = parseOptionalNumber(raw.endsWith('p') ? raw.slice(0, -1) : raw);
  return numeric !== undefined && numeric > 0 ? numeric : undefined;
}

/**
 * First video stream of a Part, if Plex included stream details
 */
function findVideoStream(part: UnknownRecord | undefined): UnknownRecord | undefined {
  if (!part) return undefined;
  return asRecordList(part.Stream).find(
    (stream) => parseNumber(stream.streamType) === STREAM_TYPE.VIDEO
  );
}

/**
 * Frame rate of the first Media entry
 *
 * Prefers Media.frameRate, then the video stream's frameRate, then the
 * symbolic Media.videoFrameRate. Falls back to 24 fps.
 */
export function extractFrameRate(item: UnknownRecord): number {
  const media = firstRecord(item.Media);
  if (!media) return DEFAULT_FRAME_RATE;

  const videoStream = findVideoStream(firstRecord(media.Part));
  return (
    parseFrameRateValue(media.frameRate) ??
    parseFrameRateValue(videoStream?.frameRate) ??
    parseFrameRateValue(media.videoFrameRate) ??
    DEFAULT_FRAME_RATE
  );
}

/**
 * File path of the first Part of the first Media entry, '' when absent
 */
export function extractSourcePath(item: UnknownRecord): string {
  const part = firstRecord(firstRecord(item.Media)?.Part);
  return parseString(part?.file);
}

function extractEpisodeInfo(item: UnknownRecord, kind: MediaKind): EpisodeInfo | undefined {
  if (kind !== 'episode') return undefined;
  return {
    showTitle: parseString(item.grandparentTitle),
    seasonNumber: parseOptionalNumber(item.parentIndex),
    episodeNumber: parseOptionalNumber(item.index),
  };
}

/**
 * "{show} - {title}" for episodes that name their show, else the bare title
 */
export function buildDisplayTitle(title: string, episode: EpisodeInfo | undefined): string {
  if (episode && episode.showTitle) {
    return `${episode.showTitle} - ${title}`;
  }
  return title;
}

// ============================================================================
// Session Parsing
// ============================================================================

/**
 * Parse one entry of /status/sessions into a PlaybackSession
 *
 * Missing numeric fields default instead of failing. Only a node that is not
 * an object, or whose User/Media children are not objects, is rejected.
 *
 * @throws MalformedSessionError
 */
export function parseSession(node: unknown): PlaybackSession {
  if (!isRecord(node)) {
    throw new MalformedSessionError('session entry is not an object');
  }
  if (node.User !== undefined && !isRecord(node.User)) {
    throw new MalformedSessionError('User is not an object');
  }
  if (node.Media !== undefined && !Array.isArray(node.Media) && !isRecord(node.Media)) {
    throw new MalformedSessionError('Media is neither an object nor a list');
  }

  const user = isRecord(node.User) ? node.User : {};
  const player = isRecord(node.Player) ? node.Player : {};
  const kind = parseMediaKind(node.type);
  const title = parseString(node.title);
  const episode = extractEpisodeInfo(node, kind);
  const playbackOffsetMs = Math.max(0, Math.floor(parseNumber(node.viewOffset)));

  return Object.freeze({
    viewerName: parseString(user.title),
    viewerId: parseString(user.id),
    sessionKey: parseString(node.sessionKey),
    mediaKey: parseString(node.key),
    playbackOffsetMs,
    currentTimeString: millisecondsToTimeString(playbackOffsetMs),
    durationMs: parseNumber(node.duration),
    sourcePath: extractSourcePath(node),
    frameRate: extractFrameRate(node),
    title,
    displayTitle: buildDisplayTitle(title, episode),
    kind,
    episode: episode ? Object.freeze(episode) : undefined,
    playerState: parsePlayerState(player.state),
  });
}

/**
 * Entries of MediaContainer.Metadata, which Plex sends as a list but which
 * may also arrive as a single record or be missing when nothing plays
 */
function containerEntries(data: unknown): unknown[] {
  if (!isRecord(data) || !isRecord(data.MediaContainer)) return [];
  const metadata = data.MediaContainer.Metadata;
  if (Array.isArray(metadata)) return metadata;
  return metadata === undefined ? [] : [metadata];
}

/**
 * Parse the /status/sessions response
 *
 * Each entry is normalized on its own. Audio and photo sessions are ignored;
 * a malformed entry is skipped with a warning and does not fail the batch.
 */
export function parseSessionsResponse(data: unknown, logger: Logger): PlaybackSession[] {
  const sessions: PlaybackSession[] = [];

  containerEntries(data).forEach((entry, index) => {
    if (isRecord(entry) && NON_VIDEO_KINDS.has(parseMediaKind(entry.type))) {
      logger.debug('Ignoring non-video session', { index, type: parseString(entry.type) });
      return;
    }

    try {
      sessions.push(parseSession(entry));
    } catch (error) {
      logger.warn('Skipping malformed session', { index, reason: getErrorMessage(error) });
    }
  });

  return sessions;
}

/**
 * Parse a /library/metadata/{id} response into item details
 *
 * @throws UpstreamError (404) when the response holds no metadata record
 */
export function parseMediaDetailsResponse(data: unknown, mediaKey: string): MediaItemDetails {
  const item = containerEntries(data).find(isRecord);
  if (!item) {
    throw new UpstreamError('plex', 404, `No metadata for ${mediaKey}`);
  }

  const kind = parseMediaKind(item.type);
  return {
    mediaKey: parseString(item.key, mediaKey),
    title: parseString(item.title),
    kind,
    durationMs: parseNumber(item.duration),
    sourcePath: extractSourcePath(item),
    frameRate: extractFrameRate(item),
    episode: extractEpisodeInfo(item, kind),
  };
}

// ============================================================================
// Views
// ============================================================================

/**
 * Caller-facing view of a session
 */
export function toSessionView(session: PlaybackSession): SessionView {
  return {
    viewer: session.viewerName,
    title: session.displayTitle,
    currentTimeString: session.currentTimeString,
    sourcePath: session.sourcePath,
    kind: session.kind,
    sessionKey: session.sessionKey,
  };
}

// ============================================================================
// plex.tv Parsing
// ============================================================================

/**
 * Parse the plex.tv /api/v2/user response into the caller identity
 */
export function parsePlexTvUser(data: unknown): AuthUser {
  const user = isRecord(data) ? data : {};
  return {
    userId: parseString(user.id),
    username: parseString(user.username) || parseString(user.title) || 'Unknown',
  };
}
