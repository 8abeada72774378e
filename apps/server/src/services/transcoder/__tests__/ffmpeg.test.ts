/**
 * FFmpeg Transcoder Tests
 *
 * fluent-ffmpeg is replaced by a scripted command so no binary is spawned.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TranscodeError } from '../../../utils/errors.js';
import type { Logger } from '../../../utils/logger.js';
import type { ClipPlan, FramePlan } from '../types.js';
import { FfmpegTranscoder, buildClipOutputOptions, buildFrameOutputOptions, normalizeTags } from '../ffmpeg.js';

type Outcome =
  | { kind: 'end' }
  | { kind: 'error'; message: string; stderr: string }
  | { kind: 'probe'; tags?: Record<string, string | number>; error?: Error }
  | { kind: 'hang' };

type ProbeCallback = (error: Error | null, data: { format: { tags?: Record<string, string | number> } }) => void;

interface RecordedCommand {
  input: string;
  timeout?: number;
  calls: Array<[string, unknown[]]>;
}

const ffmpegState = vi.hoisted(() => {
  const state: { outcome: Outcome; commands: RecordedCommand[] } = { outcome: { kind: 'end' }, commands: [] };
  return state;
});

vi.mock('fluent-ffmpeg', async () => {
  const { EventEmitter: Emitter } = await import('node:events');

  class FakeCommand extends Emitter {
    readonly calls: Array<[string, unknown[]]> = [];

    private record(name: string, args: unknown[]): this {
      this.calls.push([name, args]);
      return this;
    }

    setFfmpegPath(...args: unknown[]): this {
      return this.record('setFfmpegPath', args);
    }

    setFfprobePath(...args: unknown[]): this {
      return this.record('setFfprobePath', args);
    }

    seekInput(...args: unknown[]): this {
      return this.record('seekInput', args);
    }

    duration(...args: unknown[]): this {
      return this.record('duration', args);
    }

    outputOptions(...args: unknown[]): this {
      return this.record('outputOptions', args);
    }

    output(...args: unknown[]): this {
      return this.record('output', args);
    }

    run(): void {
      this.record('run', []);
      const outcome = ffmpegState.outcome;
      queueMicrotask(() => {
        this.emit('start', 'ffmpeg -i input');
        if (outcome.kind === 'error') {
          this.emit('error', new Error(outcome.message), '', outcome.stderr);
        } else {
          this.emit('end');
        }
      });
    }

    ffprobe(callback: ProbeCallback): void {
      const outcome = ffmpegState.outcome;
      if (outcome.kind === 'hang') return;
      queueMicrotask(() => {
        if (outcome.kind === 'probe' && outcome.error) {
          callback(outcome.error, { format: {} });
          return;
        }
        callback(null, { format: { tags: outcome.kind === 'probe' ? outcome.tags : undefined } });
      });
    }
  }

  const factory = (input: string, options?: { timeout?: number }) => {
    const command = new FakeCommand();
    ffmpegState.commands.push({ input, timeout: options?.timeout, calls: command.calls });
    return command;
  };

  return { default: factory };
});

const silentLogger: Logger = {
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

const clipPlan: ClipPlan = {
  inputPath: '/media/movie.mkv',
  startTime: '00:10:00',
  durationSeconds: 90,
  outputPath: '/srv/static/media/videos/out.mp4',
  videoCodec: 'libx264',
  audioCodec: 'aac',
  pixelFormat: 'yuv420p',
  crf: 18,
  metadata: { title: 'Some Movie', artist: 'Alice' },
};

const framePlan: FramePlan = {
  inputPath: '/media/movie.mkv',
  seekTime: '01:02:03',
  frameCount: 5,
  outputPattern: '/srv/static/media/images/01_02_03_%03d.jpg',
  quality: 2,
};

describe('ffmpeg option builders', () => {
  it('buildClipOutputOptions should keep each metadata pair as one argument', () => {
    expect(buildClipOutputOptions(clipPlan)).toEqual([
      '-c:v',
      'libx264',
      '-c:a',
      'aac',
      '-pix_fmt',
      'yuv420p',
      '-crf',
      '18',
      '-map_metadata',
      '-1',
      '-metadata',
      'title=Some Movie',
      '-metadata',
      'artist=Alice',
    ]);
  });

  it('buildFrameOutputOptions should limit frames and set quality', () => {
    expect(buildFrameOutputOptions(framePlan)).toEqual(['-frames:v', '5', '-q:v', '2']);
  });

  it('normalizeTags should lowercase keys and stringify values', () => {
    expect(normalizeTags({ TITLE: 'Film', season_number: 2 })).toEqual({ title: 'Film', season_number: '2' });
    expect(normalizeTags(undefined)).toEqual({});
  });
});

describe('FfmpegTranscoder', () => {
  beforeEach(() => {
    ffmpegState.outcome = { kind: 'end' };
    ffmpegState.commands.length = 0;
  });

  it('should seek, trim and tag when extracting a clip', async () => {
    const transcoder = new FfmpegTranscoder({ timeoutMs: 30_000, logger: silentLogger });

    await transcoder.extractClip(clipPlan);

    const [command] = ffmpegState.commands;
    expect(command?.input).toBe('/media/movie.mkv');
    expect(command?.timeout).toBe(30);
    expect(command?.calls).toEqual([
      ['seekInput', ['00:10:00']],
      ['duration', [90]],
      ['outputOptions', buildClipOutputOptions(clipPlan)],
      ['output', ['/srv/static/media/videos/out.mp4']],
      ['run', []],
    ]);
  });

  it('should write frames to the numbered pattern', async () => {
    const transcoder = new FfmpegTranscoder({ logger: silentLogger });

    await transcoder.extractFrames(framePlan);

    const [command] = ffmpegState.commands;
    expect(command?.timeout).toBe(600);
    expect(command?.calls).toEqual([
      ['seekInput', ['01:02:03']],
      ['outputOptions', ['-frames:v', '5', '-q:v', '2']],
      ['output', ['/srv/static/media/images/01_02_03_%03d.jpg']],
      ['run', []],
    ]);
  });

  it('should apply configured binary paths', async () => {
    const transcoder = new FfmpegTranscoder({
      ffmpegPath: '/opt/ffmpeg/bin/ffmpeg',
      ffprobePath: '/opt/ffmpeg/bin/ffprobe',
      logger: silentLogger,
    });

    await transcoder.extractFrames(framePlan);

    expect(ffmpegState.commands[0]?.calls.slice(0, 2)).toEqual([
      ['setFfmpegPath', ['/opt/ffmpeg/bin/ffmpeg']],
      ['setFfprobePath', ['/opt/ffmpeg/bin/ffprobe']],
    ]);
  });

  it('should reject with the stderr output as diagnostic', async () => {
    ffmpegState.outcome = {
      kind: 'error',
      message: 'ffmpeg exited with code 1',
      stderr: '  /media/movie.mkv: No such file or directory\n',
    };
    const transcoder = new FfmpegTranscoder({ logger: silentLogger });

    const error = await transcoder.extractClip(clipPlan).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TranscodeError);
    expect(error).toMatchObject({ diagnostic: '/media/movie.mkv: No such file or directory' });
  });

  it('should fall back to the process error when stderr is empty', async () => {
    ffmpegState.outcome = { kind: 'error', message: 'ffmpeg was killed with signal SIGKILL', stderr: '' };
    const transcoder = new FfmpegTranscoder({ logger: silentLogger });

    await expect(transcoder.extractFrames(framePlan)).rejects.toMatchObject({
      diagnostic: 'ffmpeg was killed with signal SIGKILL',
    });
  });

  it('should read container tags with ffprobe', async () => {
    ffmpegState.outcome = { kind: 'probe', tags: { TITLE: 'Film', comment: '00:01:00' } };
    const transcoder = new FfmpegTranscoder({ logger: silentLogger });

    await expect(transcoder.probeMetadata('/srv/static/media/videos/a.mp4')).resolves.toEqual({
      title: 'Film',
      comment: '00:01:00',
    });
  });

  it('should reject when ffprobe fails', async () => {
    ffmpegState.outcome = { kind: 'probe', error: new Error('Invalid data found when processing input') };
    const transcoder = new FfmpegTranscoder({ logger: silentLogger });

    await expect(transcoder.probeMetadata('/srv/static/media/videos/bad.mp4')).rejects.toThrow(
      new TranscodeError('Invalid data found when processing input')
    );
  });

  describe('probe timeout', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should reject a probe that never answers once the timeout passes', async () => {
      ffmpegState.outcome = { kind: 'hang' };
      const transcoder = new FfmpegTranscoder({ timeoutMs: 1000, logger: silentLogger });

      const probe = transcoder.probeMetadata('/srv/static/media/videos/stuck.mp4').catch((e: unknown) => e);
      await vi.advanceTimersByTimeAsync(999);
      let settled = false;
      void probe.then(() => {
        settled = true;
      });
      await Promise.resolve();
      expect(settled).toBe(false);

      await vi.advanceTimersByTimeAsync(1);
      const error = await probe;

      expect(error).toBeInstanceOf(TranscodeError);
      expect(error).toMatchObject({ diagnostic: 'ffprobe ran into a timeout (1s)' });
    });

    it('should clear the timer when the probe answers in time', async () => {
      ffmpegState.outcome = { kind: 'probe', tags: { title: 'Film' } };
      const transcoder = new FfmpegTranscoder({ timeoutMs: 1000, logger: silentLogger });

      await expect(transcoder.probeMetadata('/srv/static/media/videos/a.mp4')).resolves.toEqual({ title: 'Film' });
      expect(vi.getTimerCount()).toBe(0);
    });
  });
});
