/**
 * Transcode delegate contract
 *
 * The orchestrator describes what to cut; a delegate runs the actual tool.
 * Delegates reject with TranscodeError carrying the tool's diagnostic output.
 */

export interface ClipPlan {
  inputPath: string;
  /** Seek position in the source, HH:MM:SS */
  startTime: string;
  durationSeconds: number;
  outputPath: string;
  videoCodec: string;
  audioCodec: string;
  pixelFormat: string;
  /** Constant-quality factor */
  crf: number;
  /** Tags written into the clip; source tags are dropped */
  metadata: Record<string, string>;
}

export interface FramePlan {
  inputPath: string;
  seekTime: string;
  frameCount: number;
  /** Output path containing a %03d sequence placeholder */
  outputPattern: string;
  /** JPEG quality scale (2 is near-lossless) */
  quality: number;
}

/** Container-level tags, keys lowercased */
export type MediaTags = Record<string, string>;

export interface TranscodeDelegate {
  extractClip(plan: ClipPlan): Promise<void>;
  extractFrames(plan: FramePlan): Promise<void>;
  probeMetadata(filePath: string): Promise<MediaTags>;
}
