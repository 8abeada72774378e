/**
 * FFmpeg transcode delegate
 *
 * Runs ffmpeg/ffprobe through fluent-ffmpeg. Each invocation is a child
 * process, so a long encode never blocks the event loop that serves session
 * polling. ffmpeg runs are killed once they exceed the configured timeout;
 * a probe that overruns it is abandoned and reported as a failure.
 */

import ffmpeg, { type FfmpegCommand, type FfprobeData } from 'fluent-ffmpeg';
import { TIMEOUTS } from '@streamclip/shared';
import { TranscodeError, getErrorMessage } from '../../utils/errors.js';
import { createLogger, type Logger } from '../../utils/logger.js';
import type { ClipPlan, FramePlan, MediaTags, TranscodeDelegate } from './types.js';

export interface FfmpegTranscoderOptions {
  /** ffmpeg binary, defaults to the one on PATH */
  ffmpegPath?: string;
  /** ffprobe binary, defaults to the one on PATH */
  ffprobePath?: string;
  /** Kill any invocation running longer than this */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Output arguments for a clip: codecs, quality, and a metadata block that
 * replaces whatever tags the source carried
 */
export function buildClipOutputOptions(plan: ClipPlan): string[] {
  const options = [
    '-c:v',
    plan.videoCodec,
    '-c:a',
    plan.audioCodec,
    '-pix_fmt',
    plan.pixelFormat,
    '-crf',
    String(plan.crf),
    '-map_metadata',
    '-1',
  ];

  for (const [key, value] of Object.entries(plan.metadata)) {
    options.push('-metadata', `${key}=${value}`);
  }

  return options;
}

export function buildFrameOutputOptions(plan: FramePlan): string[] {
  return ['-frames:v', String(plan.frameCount), '-q:v', String(plan.quality)];
}

/**
 * Lowercase tag keys and stringify values (ffprobe reports some containers'
 * tags in upper case and numeric-looking tags as numbers)
 */
export function normalizeTags(tags: Record<string, string | number> | undefined): MediaTags {
  const normalized: MediaTags = {};
  if (!tags) return normalized;

  for (const [key, value] of Object.entries(tags)) {
    normalized[key.toLowerCase()] = String(value);
  }
  return normalized;
}

/**
 * Prefer ffmpeg's own stderr; fall back to the process error
 */
function toDiagnostic(error: Error, stderr: string | null | undefined): string {
  const output = stderr?.trim();
  return output ? output : error.message;
}

export class FfmpegTranscoder implements TranscodeDelegate {
  private readonly ffmpegPath?: string;
  private readonly ffprobePath?: string;
  private readonly timeoutSeconds: number;
  private readonly logger: Logger;

  constructor(options: FfmpegTranscoderOptions = {}) {
    this.ffmpegPath = options.ffmpegPath;
    this.ffprobePath = options.ffprobePath;
    this.timeoutSeconds = Math.max(1, Math.ceil((options.timeoutMs ?? TIMEOUTS.TRANSCODE_MS) / 1000));
    this.logger = options.logger ?? createLogger('ffmpeg');
  }

  private createCommand(input: string): FfmpegCommand {
    const command = ffmpeg(input, { timeout: this.timeoutSeconds });
    if (this.ffmpegPath) command.setFfmpegPath(this.ffmpegPath);
    if (this.ffprobePath) command.setFfprobePath(this.ffprobePath);
    return command;
  }

  private run(command: FfmpegCommand, outputPath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      command
        .output(outputPath)
        .on('start', (commandLine: string) => {
          this.logger.debug('Spawned ffmpeg', { commandLine });
        })
        .on('error', (error: Error, _stdout: string | null, stderr: string | null) => {
          reject(new TranscodeError(toDiagnostic(error, stderr)));
        })
        .on('end', () => {
          resolve();
        })
        .run();
    });
  }

  async extractClip(plan: ClipPlan): Promise<void> {
    // Spread so fluent-ffmpeg keeps "title=Some Movie" as a single argument
    const command = this.createCommand(plan.inputPath)
      .seekInput(plan.startTime)
      .duration(plan.durationSeconds)
      .outputOptions(...buildClipOutputOptions(plan));

    await this.run(command, plan.outputPath);
  }

  async extractFrames(plan: FramePlan): Promise<void> {
    const command = this.createCommand(plan.inputPath)
      .seekInput(plan.seekTime)
      .outputOptions(...buildFrameOutputOptions(plan));

    await this.run(command, plan.outputPattern);
  }

  /**
   * Read container tags. fluent-ffmpeg applies no timeout to ffprobe, so the
   * probe is abandoned here once it exceeds the configured limit.
   */
  async probeMetadata(filePath: string): Promise<MediaTags> {
    const data = await new Promise<FfprobeData>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.logger.warn('ffprobe timed out', { filePath, timeoutSeconds: this.timeoutSeconds });
        reject(new TranscodeError(`ffprobe ran into a timeout (${this.timeoutSeconds}s)`));
      }, this.timeoutSeconds * 1000);

      this.createCommand(filePath).ffprobe((error: unknown, result: FfprobeData) => {
        clearTimeout(timer);
        if (error) {
          reject(new TranscodeError(getErrorMessage(error)));
          return;
        }
        resolve(result);
      });
    });

    return normalizeTags(data.format.tags);
  }
}
