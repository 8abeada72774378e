/**
 * Core type definitions for Streamclip
 */

// Media kinds reported by Plex; open-ended, anything else is passed through
export type KnownMediaKind = 'movie' | 'episode' | 'clip' | 'unknown';
export type MediaKind = KnownMediaKind | (string & {});

export interface EpisodeInfo {
  showTitle: string;
  seasonNumber?: number;
  episodeNumber?: number;
}

// Session types
export interface SessionView {
  viewer: string;
  title: string;
  currentTimeString: string;
  sourcePath: string;
  kind: MediaKind;
  sessionKey: string;
}

export interface SessionsResponse {
  sessions: SessionView[];
  count: number;
}

// Clip and snapshot results
export interface ClipResult {
  status: 'success';
  filename: string;
  relativePath: string;
}

export interface SnapshotResult {
  status: 'success';
  timestampLabel: string;
  frameCount: number;
}

export interface ClipDescriptor {
  filePath: string;
  title: string;
  /** Playback position the clip was taken at */
  originalTimestamp: string;
  viewer: string;
  show: string;
  seasonNumber: string;
  episodeNumber: string;
}

export interface SnapshotDescriptor {
  filePath: string;
  /** HH:MM:SS recovered from the file name */
  timestamp: string;
  frameIndex: number;
}

export interface VideoListResponse {
  videos: ClipDescriptor[];
}

export interface ImageListResponse {
  images: string[];
}

export interface AddTimeResponse {
  originalTime: string;
  newTime: string;
}

// Auth types
export interface AuthUser {
  userId: string;
  username: string;
}

export interface AuthStatus {
  authRequired: boolean;
  authMethod: 'plex_token';
  serverConfigured: boolean;
}

export interface AuthResponse {
  success: boolean;
  username: string;
  userId?: string;
  message?: string;
}

// API types
export interface ApiError {
  statusCode: number;
  error: string;
  code: string;
  message: string;
  details?: unknown;
}
