/**
 * Shared constants for Streamclip
 */

export const API_VERSION = 'v1';
export const API_BASE_PATH = `/api/${API_VERSION}`;

/** Public URL prefix under which produced media files are served */
export const STATIC_PREFIX = 'static';

export const MEDIA_DIRS = {
  VIDEOS: 'media/videos',
  IMAGES: 'media/images',
} as const;

export const ARTIFACT_EXTENSIONS = {
  CLIP: '.mp4',
  SNAPSHOT: '.jpg',
} as const;

/** HH:MM:SS with at least two hour digits */
export const TIME_STRING_PATTERN = /^(\d{2,}):([0-5]\d):([0-5]\d)$/;

export const SNAPSHOT_LIMITS = {
  MIN_FRAMES: 1,
  MAX_FRAMES: 120,
} as const;

export const TIMEOUTS = {
  /** Directory fetches must fail fast rather than stall a request */
  PLEX_REQUEST_MS: 10_000,
  PLEX_TV_REQUEST_MS: 10_000,
  TRANSCODE_MS: 10 * 60 * 1000,
} as const;

/** Frame rate assumed when the media server reports none */
export const DEFAULT_FRAME_RATE = 24;

/** Longest sanitized title that is embedded in a clip file name */
export const MAX_FILENAME_TITLE_LENGTH = 50;
