/**
 * @streamclip/shared - Shared types, schemas, and constants
 */

// Type exports
export type {
  // Session
  KnownMediaKind,
  MediaKind,
  EpisodeInfo,
  SessionView,
  SessionsResponse,
  // Clips
  ClipResult,
  SnapshotResult,
  ClipDescriptor,
  SnapshotDescriptor,
  VideoListResponse,
  ImageListResponse,
  AddTimeResponse,
  // Auth
  AuthUser,
  AuthStatus,
  AuthResponse,
  // API
  ApiError,
} from './types.js';

// Schema exports
export {
  // Common
  timeStringSchema,
  viewerNameSchema,
  // Auth
  verifyTokenSchema,
  // Session
  viewerParamSchema,
  // Clips
  createClipSchema,
  createSnapshotSchema,
  deleteFileQuerySchema,
  addTimeQuerySchema,
} from './schemas.js';

// Schema input type exports
export type {
  VerifyTokenInput,
  ViewerParamInput,
  CreateClipInput,
  CreateSnapshotInput,
  DeleteFileQueryInput,
  AddTimeQueryInput,
} from './schemas.js';

// Constant exports
export {
  API_VERSION,
  API_BASE_PATH,
  STATIC_PREFIX,
  MEDIA_DIRS,
  ARTIFACT_EXTENSIONS,
  TIME_STRING_PATTERN,
  SNAPSHOT_LIMITS,
  TIMEOUTS,
  DEFAULT_FRAME_RATE,
  MAX_FILENAME_TITLE_LENGTH,
} from './constants.js';
