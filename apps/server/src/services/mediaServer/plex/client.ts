/**
 * Plex Media Server Client
 *
 * Implements SessionDirectory for Plex servers: resolves what each viewer is
 * watching right now. Every call is a fresh round trip; nothing is cached and
 * nothing is retried.
 */

import { TIMEOUTS, type AuthUser } from '@streamclip/shared';
import { fetchJson, plexHeaders } from '../../../utils/http.js';
import { UpstreamError, ViewerNotStreamingError, getErrorMessage } from '../../../utils/errors.js';
import { plexLogger, type Logger } from '../../../utils/logger.js';
import type {
  MediaItemDetails,
  MediaServerConfig,
  PlaybackSession,
  SessionDirectory,
} from '../types.js';
import { parseMediaDetailsResponse, parsePlexTvUser, parseSessionsResponse } from './parser.js';

const PLEX_TV_BASE = 'https://plex.tv';

/** plex.tv answers an invalid or expired token with one of these */
const REJECTED_TOKEN_STATUSES: ReadonlySet<number> = new Set([401, 422]);

/**
 * Plex Media Server client implementation
 *
 * @example
 * const client = new PlexClient({ url: 'http://plex.local:32400', token: 'xxx' });
 * const session = await client.findSessionForViewer('alice');
 */
export class PlexClient implements SessionDirectory {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(config: MediaServerConfig) {
    this.baseUrl = config.url.replace(/\/$/, '');
    this.token = config.token;
    this.timeoutMs = config.timeoutMs ?? TIMEOUTS.PLEX_REQUEST_MS;
    this.logger = config.logger ?? plexLogger;
  }

  /**
   * Build headers for Plex API requests
   */
  private buildHeaders(): Record<string, string> {
    return plexHeaders(this.token);
  }

  // ==========================================================================
  // SessionDirectory Implementation
  // ==========================================================================

  /**
   * Get all active video playback sessions
   *
   * Malformed entries are skipped with a warning rather than failing the call.
   *
   * @throws UpstreamUnreachableError when the server cannot be reached in time
   * @throws UpstreamError when the server answers with an error status
   */
  async listActiveSessions(): Promise<PlaybackSession[]> {
    const data = await fetchJson(`${this.baseUrl}/status/sessions`, {
      headers: this.buildHeaders(),
      service: 'plex',
      timeout: this.timeoutMs,
    });

    return parseSessionsResponse(data, this.logger);
  }

  async findSessionForViewer(viewerName: string): Promise<PlaybackSession | null> {
    const wanted = viewerName.toLowerCase();
    const sessions = await this.listActiveSessions();
    return sessions.find((session) => session.viewerName.toLowerCase() === wanted) ?? null;
  }

  async requireSessionForViewer(viewerName: string): Promise<PlaybackSession> {
    const session = await this.findSessionForViewer(viewerName);
    if (!session) {
      throw new ViewerNotStreamingError(viewerName);
    }
    return session;
  }

  /**
   * Get detail metadata for a single library item
   *
   * @param mediaKey - Metadata path as reported by the session (e.g. /library/metadata/123)
   */
  async getMediaDetails(mediaKey: string): Promise<MediaItemDetails> {
    const path = mediaKey.startsWith('/') ? mediaKey : `/${mediaKey}`;
    const data = await fetchJson(`${this.baseUrl}${path}`, {
      headers: this.buildHeaders(),
      service: 'plex',
      timeout: this.timeoutMs,
    });

    return parseMediaDetailsResponse(data, mediaKey);
  }

  /**
   * Test connection to the server
   */
  async testConnection(): Promise<boolean> {
    try {
      await fetchJson(`${this.baseUrl}/identity`, {
        headers: this.buildHeaders(),
        service: 'plex',
        timeout: this.timeoutMs,
      });
      return true;
    } catch (error) {
      this.logger.warn('Plex connection test failed', {
        error: getErrorMessage(error),
      });
      return false;
    }
  }

  // ==========================================================================
  // Static Methods - Plex.tv API Operations
  // ==========================================================================

  /**
   * Resolve the account behind a Plex token
   *
   * @returns The account, or null when plex.tv rejects the token
   * @throws UpstreamUnreachableError when plex.tv cannot be reached
   */
  static async verifyToken(token: string): Promise<AuthUser | null> {
    try {
      const data = await fetchJson(`${PLEX_TV_BASE}/api/v2/user`, {
        headers: plexHeaders(token),
        service: 'plex.tv',
        timeout: TIMEOUTS.PLEX_TV_REQUEST_MS,
      });
      return parsePlexTvUser(data);
    } catch (error) {
      if (error instanceof UpstreamError && REJECTED_TOKEN_STATUSES.has(error.upstreamStatus)) {
        return null;
      }
      throw error;
    }
  }
}
