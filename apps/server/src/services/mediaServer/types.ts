/**
 * Media Server Integration Types
 *
 * The normalized session model and the directory interface the clip
 * orchestrator and routes depend on.
 */

import type { EpisodeInfo, MediaKind } from '@streamclip/shared';
import type { Logger } from '../../utils/logger.js';

// ============================================================================
// Session Types
// ============================================================================

export type PlayerState = 'playing' | 'paused' | 'buffering';

/**
 * Snapshot of one viewer's playback at the moment of a poll.
 * Rebuilt from scratch on every poll; never merged or mutated.
 */
export interface PlaybackSession {
  readonly viewerName: string;
  readonly viewerId: string;
  /** Server-assigned session identifier, opaque */
  readonly sessionKey: string;
  /** Metadata path of the playing item (e.g. /library/metadata/123) */
  readonly mediaKey: string;
  /** Elapsed playback position in milliseconds */
  readonly playbackOffsetMs: number;
  /** playbackOffsetMs rendered as HH:MM:SS */
  readonly currentTimeString: string;
  readonly durationMs: number;
  /** File path as known to the media server; empty when nothing is playable */
  readonly sourcePath: string;
  readonly frameRate: number;
  readonly title: string;
  /** "{show} - {title}" for episodes with a show name, otherwise the title */
  readonly displayTitle: string;
  readonly kind: MediaKind;
  /** Present only when kind is 'episode' */
  readonly episode?: Readonly<EpisodeInfo>;
  readonly playerState: PlayerState;
}

/**
 * Detail record for a single library item
 */
export interface MediaItemDetails {
  mediaKey: string;
  title: string;
  kind: MediaKind;
  durationMs: number;
  sourcePath: string;
  frameRate: number;
  episode?: EpisodeInfo;
}

// ============================================================================
// Directory Client Interface
// ============================================================================

/**
 * Configuration for creating a media server client
 */
export interface MediaServerConfig {
  /** Server URL (trailing slash is stripped) */
  url: string;
  /** Authentication token */
  token: string;
  /** Timeout for each directory request in milliseconds */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Read access to the sessions a media server is currently serving
 */
export interface SessionDirectory {
  listActiveSessions(): Promise<PlaybackSession[]>;
  /** Case-insensitive exact match on viewer name, null when not streaming */
  findSessionForViewer(viewerName: string): Promise<PlaybackSession | null>;
  /** Same as findSessionForViewer, throws ViewerNotStreamingError when absent */
  requireSessionForViewer(viewerName: string): Promise<PlaybackSession>;
  getMediaDetails(mediaKey: string): Promise<MediaItemDetails>;
  testConnection(): Promise<boolean>;
}
