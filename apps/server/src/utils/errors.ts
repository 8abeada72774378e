/**
 * Application error types
 *
 * Every error that should reach an API caller with a specific status extends
 * AppError. The error handler in app.ts turns these into JSON responses.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export interface FieldError {
  field: string;
  message: string;
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly fields: FieldError[] = []
  ) {
    super(message, 400, 'VALIDATION_ERROR', fields.length > 0 ? fields : undefined);
  }
}

// ============================================================================
// Time Errors
// ============================================================================

export class InvalidTimeFormatError extends AppError {
  constructor(public readonly value: string) {
    super(`Invalid time format: "${value}" (expected HH:MM:SS)`, 400, 'INVALID_TIME_FORMAT');
  }
}

export class InvalidClipWindowError extends AppError {
  constructor(
    public readonly start: string,
    public readonly end: string,
    public readonly durationSeconds: number
  ) {
    super(
      `Clip end ${end} must be after start ${start} (duration ${durationSeconds}s)`,
      400,
      'INVALID_CLIP_WINDOW'
    );
  }
}

// ============================================================================
// Media Server Errors
// ============================================================================

export class UpstreamUnreachableError extends AppError {
  constructor(
    public readonly service: string,
    cause?: unknown
  ) {
    super(`Unable to connect to ${service}`, 503, 'UPSTREAM_UNREACHABLE');
    if (cause !== undefined) this.cause = cause;
  }
}

export class UpstreamError extends AppError {
  constructor(
    public readonly service: string,
    public readonly upstreamStatus: number,
    statusText = ''
  ) {
    super(
      `${service} responded with ${upstreamStatus}${statusText ? ` ${statusText}` : ''}`,
      upstreamStatus >= 400 && upstreamStatus <= 599 ? upstreamStatus : 502,
      'UPSTREAM_ERROR'
    );
  }
}

export class ViewerNotStreamingError extends AppError {
  constructor(public readonly viewerName: string) {
    super(`No active stream found for user ${viewerName}`, 404, 'VIEWER_NOT_STREAMING');
  }
}

export class MalformedSessionError extends AppError {
  constructor(reason: string) {
    super(`Malformed session: ${reason}`, 502, 'MALFORMED_SESSION');
  }
}

// ============================================================================
// Extraction Errors
// ============================================================================

export class NoPlayableMediaError extends AppError {
  constructor(public readonly viewerName: string) {
    super(`Session for ${viewerName} has no playable media file`, 422, 'NO_PLAYABLE_MEDIA');
  }
}

export class ClipCreationFailedError extends AppError {
  constructor(public readonly diagnostic: string) {
    super(`Clip creation failed: ${diagnostic}`, 500, 'CLIP_CREATION_FAILED');
  }
}

export class SnapshotCreationFailedError extends AppError {
  constructor(public readonly diagnostic: string) {
    super(`Snapshot creation failed: ${diagnostic}`, 500, 'SNAPSHOT_CREATION_FAILED');
  }
}

/**
 * Extract a readable message from an unknown thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Raised by a transcode delegate; the diagnostic is the tool's own output
 */
export class TranscodeError extends Error {
  constructor(public readonly diagnostic: string) {
    super(diagnostic);
    this.name = 'TranscodeError';
  }
}
