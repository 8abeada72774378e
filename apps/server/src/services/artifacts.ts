/**
 * Artifact Catalog
 *
 * The filesystem is the only index of produced clips and snapshots: clips are
 * described by the tags embedded at creation time, snapshots by their file
 * names. Deletion is confined to the static root.
 */

import { lstat, mkdir, readdir, unlink } from 'node:fs/promises';
import { extname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import {
  ARTIFACT_EXTENSIONS,
  MEDIA_DIRS,
  STATIC_PREFIX,
  type ClipDescriptor,
  type SnapshotDescriptor,
} from '@streamclip/shared';
import { getErrorMessage } from '../utils/errors.js';
import { artifactLogger, type Logger } from '../utils/logger.js';
import type { MediaTags, TranscodeDelegate } from './transcoder/types.js';

export interface ArtifactCatalogOptions {
  staticRoot: string;
  /** Used to read clip tags back */
  transcoder: TranscodeDelegate;
  logger?: Logger;
}

const SNAPSHOT_NAME_PATTERN = /^(\d{2,})_(\d{2})_(\d{2})_(\d+)\.jpg$/i;

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Describe a clip from its probed tags
 */
export function describeClip(fileName: string, tags: MediaTags): ClipDescriptor {
  return {
    filePath: `${STATIC_PREFIX}/${MEDIA_DIRS.VIDEOS}/${fileName}`,
    title: tags.title ?? '',
    originalTimestamp: tags.comment ?? '',
    viewer: tags.artist ?? '',
    show: tags.show ?? '',
    seasonNumber: tags.season_number ?? '',
    episodeNumber: tags.episode_id ?? '',
  };
}

/**
 * Recover the source position and frame index from a snapshot file name
 *
 * @example
 * describeSnapshot('01_02_03_002.jpg') // { timestamp: '01:02:03', frameIndex: 2, ... }
 */
export function describeSnapshot(fileName: string): SnapshotDescriptor | null {
  const match = SNAPSHOT_NAME_PATTERN.exec(fileName);
  if (!match) return null;

  const [, hours = '', minutes = '', seconds = '', index = '0'] = match;
  return {
    filePath: `${STATIC_PREFIX}/${MEDIA_DIRS.IMAGES}/${fileName}`,
    timestamp: `${hours}:${minutes}:${seconds}`,
    frameIndex: Number(index),
  };
}

export class ArtifactCatalog {
  private readonly staticRoot: string;
  private readonly videosDir: string;
  private readonly imagesDir: string;
  private readonly transcoder: TranscodeDelegate;
  private readonly logger: Logger;

  constructor(options: ArtifactCatalogOptions) {
    this.staticRoot = resolve(options.staticRoot);
    this.videosDir = join(this.staticRoot, MEDIA_DIRS.VIDEOS);
    this.imagesDir = join(this.staticRoot, MEDIA_DIRS.IMAGES);
    this.transcoder = options.transcoder;
    this.logger = options.logger ?? artifactLogger;
  }

  /**
   * Create the clip and snapshot directories if missing
   */
  async ensureDirectories(): Promise<void> {
    for (const dir of [this.videosDir, this.imagesDir]) {
      await mkdir(dir, { recursive: true });
      this.logger.info('Ensured directory exists', { dir });
    }
  }

  /**
   * Names of regular files in dir with the given extension, sorted.
   * A directory that does not exist yet simply has no artifacts.
   */
  private async listFiles(dir: string, extension: string): Promise<string[]> {
    try {
      const entries = await readdir(dir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile() && extname(entry.name).toLowerCase() === extension)
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return [];
      throw error;
    }
  }

  /**
   * Every clip with the metadata embedded at creation time.
   * Files whose tags cannot be read are skipped with a warning.
   */
  async listClips(): Promise<ClipDescriptor[]> {
    const clips: ClipDescriptor[] = [];

    for (const fileName of await this.listFiles(this.videosDir, ARTIFACT_EXTENSIONS.CLIP)) {
      try {
        const tags = await this.transcoder.probeMetadata(join(this.videosDir, fileName));
        clips.push(describeClip(fileName, tags));
      } catch (error) {
        this.logger.warn('Failed to read clip metadata', { fileName, error: getErrorMessage(error) });
      }
    }

    return clips;
  }

  /**
   * Public paths of every snapshot frame, in lexicographic order
   */
  async listSnapshots(): Promise<string[]> {
    const names = await this.listFiles(this.imagesDir, ARTIFACT_EXTENSIONS.SNAPSHOT);
    return names.map((name) => `${STATIC_PREFIX}/${MEDIA_DIRS.IMAGES}/${name}`);
  }

  /**
   * Snapshot frames whose names follow the {HH_MM_SS}_{NNN}.jpg pattern
   */
  async listSnapshotDescriptors(): Promise<SnapshotDescriptor[]> {
    const names = await this.listFiles(this.imagesDir, ARTIFACT_EXTENSIONS.SNAPSHOT);
    return names.flatMap((name) => {
      const descriptor = describeSnapshot(name);
      return descriptor ? [descriptor] : [];
    });
  }

  /**
   * Map a public path ('static/media/videos/x.mp4') to a file beneath the
   * static root, or null when it would land outside it
   */
  resolveArtifactPath(relativePath: string): string | null {
    let path = relativePath.trim().replace(/^\/+/, '');
    if (path.startsWith(`${STATIC_PREFIX}/`)) {
      path = path.slice(STATIC_PREFIX.length + 1);
    }

    const target = resolve(this.staticRoot, path);
    const fromRoot = relative(this.staticRoot, target);
    if (fromRoot === '' || fromRoot === '..' || fromRoot.startsWith(`..${sep}`) || isAbsolute(fromRoot)) {
      return null;
    }
    return target;
  }

  /**
   * Remove one produced file
   *
   * @returns false when the path escapes the static root, does not exist, or
   *   is not a regular file; true once the file is removed
   */
  async deleteArtifact(relativePath: string): Promise<boolean> {
    const target = this.resolveArtifactPath(relativePath);
    if (!target) {
      this.logger.warn('Refusing to delete outside the media root', { path: relativePath });
      return false;
    }

    try {
      const stats = await lstat(target);
      if (!stats.isFile()) {
        this.logger.warn('Not a file, nothing deleted', { path: relativePath });
        return false;
      }
      await unlink(target);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        this.logger.warn('File not found', { path: relativePath });
        return false;
      }
      throw error;
    }

    this.logger.info('Deleted file', { path: target });
    return true;
  }
}
