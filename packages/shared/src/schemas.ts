/**
 * Zod validation schemas for API requests
 */

import { z } from 'zod';
import { SNAPSHOT_LIMITS, TIME_STRING_PATTERN } from './constants.js';

// ============================================================================
// Common Schemas
// ============================================================================

export const timeStringSchema = z
  .string()
  .trim()
  .regex(TIME_STRING_PATTERN, { error: 'Expected a time in HH:MM:SS format' });

export const viewerNameSchema = z.string().trim().min(1).max(255);

// ============================================================================
// Auth Schemas
// ============================================================================

export const verifyTokenSchema = z.object({
  token: z.string().min(1),
});

// ============================================================================
// Session Schemas
// ============================================================================

export const viewerParamSchema = z.object({
  viewer: viewerNameSchema,
});

// ============================================================================
// Clip Schemas
// ============================================================================

export const createClipSchema = z.object({
  viewerName: viewerNameSchema,
  start: timeStringSchema,
  end: timeStringSchema,
});

export const createSnapshotSchema = z.object({
  viewerName: viewerNameSchema,
  frameCount: z.coerce
    .number()
    .int()
    .min(SNAPSHOT_LIMITS.MIN_FRAMES)
    .max(SNAPSHOT_LIMITS.MAX_FRAMES)
    .default(1),
});

export const deleteFileQuerySchema = z.object({
  path: z.string().min(1, 'File path is required').max(1024),
});

// Times are checked by the handler so a bad format maps to InvalidTimeFormat
export const addTimeQuerySchema = z.object({
  time: z.string().min(1),
  seconds: z.coerce.number().int(),
});

// ============================================================================
// Type Exports
// ============================================================================

export type VerifyTokenInput = z.infer<typeof verifyTokenSchema>;
export type ViewerParamInput = z.infer<typeof viewerParamSchema>;
export type CreateClipInput = z.infer<typeof createClipSchema>;
export type CreateSnapshotInput = z.infer<typeof createSnapshotSchema>;
export type DeleteFileQueryInput = z.infer<typeof deleteFileQuerySchema>;
export type AddTimeQueryInput = z.infer<typeof addTimeQuerySchema>;
