import { createHash, randomUUID } from 'crypto';
import { Dir, promises as fs, Stats } from 'fs';
import path from 'path';
import {
  isErrnoCode,
  NotFoundError,
  ProtectedArtifactError,
  StorageReadError,
  StorageWriteError,
} from '../errors';
import { log } from '../log';
import { recordArtifactCreated } from '../metrics';
import { ArtifactListing, AudioArtifact, AudioFormat, AUDIO_FORMATS, isAudioFormat } from './types';

const ID_PATTERN = /^[A-Za-z0-9_-]+$/;
const PARTIAL_SUFFIX = '.partial';
const CONTENT_HASH_CHARS = 12;

export interface AudioArtifactStoreOptions {
  root: string;
  /** Files served from the store but never evicted or deleted. */
  protectedPaths?: readonly string[];
  now?: () => number;
}

interface ParsedFileName {
  id: string;
  format: AudioFormat;
}

export function parseArtifactFileName(fileName: string): ParsedFileName | null {
  if (fileName.startsWith('.')) {
    return null;
  }
  const extension = path.extname(fileName);
  const format = extension.slice(1).toLowerCase();
  if (!isAudioFormat(format)) {
    return null;
  }
  const id = fileName.slice(0, fileName.length - extension.length);
  if (!ID_PATTERN.test(id)) {
    return null;
  }
  return { id, format };
}

async function statIfExists(filePath: string): Promise<Stats | null> {
  try {
    return await fs.stat(filePath);
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT') || isErrnoCode(error, 'ENOTDIR')) {
      return null;
    }
    throw error;
  }
}

function createdAtFrom(stats: Stats): number {
  return Math.round(stats.mtimeMs);
}

/**
 * Filesystem-backed store of synthesized audio. The directory is the only
 * source of truth: every lookup, listing and deletion re-reads it.
 */
export class AudioArtifactStore {
  readonly root: string;
  private readonly protectedById = new Map<string, string>();
  private readonly protectedPaths = new Set<string>();
  private readonly now: () => number;

  constructor(options: AudioArtifactStoreOptions) {
    this.root = path.resolve(options.root);
    this.now = options.now ?? Date.now;

    for (const entry of options.protectedPaths ?? []) {
      const absolute = path.resolve(entry);
      const parsed = parseArtifactFileName(path.basename(absolute));
      if (!parsed) {
        throw new Error(`protected path is not a supported audio file: ${absolute}`);
      }
      const existing = this.protectedById.get(parsed.id);
      if (existing !== undefined && existing !== absolute) {
        throw new Error(`protected paths share the id ${parsed.id}: ${existing}, ${absolute}`);
      }
      this.protectedById.set(parsed.id, absolute);
      this.protectedPaths.add(absolute);
    }
  }

  async init(): Promise<void> {
    await fs.mkdir(this.root, { recursive: true });
  }

  isProtected(filePath: string): boolean {
    return this.protectedPaths.has(path.resolve(filePath));
  }

  async create(bytes: Buffer | Uint8Array, format: AudioFormat): Promise<AudioArtifact> {
    const id = this.allocateId(bytes);
    const finalPath = path.join(this.root, `${id}.${format}`);
    const partialPath = path.join(this.root, `.${id}.${format}${PARTIAL_SUFFIX}`);
    const createdAt = this.now();

    try {
      await fs.mkdir(this.root, { recursive: true });
      await fs.writeFile(partialPath, bytes, { flag: 'wx' });
      // mtime carries createdAt, so it must be set before the rename publishes the file
      const stamp = new Date(createdAt);
      await fs.utimes(partialPath, stamp, stamp);
      await fs.rename(partialPath, finalPath);
    } catch (error) {
      await fs.rm(partialPath, { force: true }).catch((cleanupError: unknown) => {
        log.warn({ err: cleanupError, path: partialPath }, 'audio artifact partial cleanup failed');
      });
      throw new StorageWriteError(finalPath, error);
    }

    recordArtifactCreated(format);
    log.debug({ event: 'artifact_created', id, format, bytes: bytes.byteLength }, 'audio artifact created');
    return { id, path: finalPath, format, createdAt };
  }

  async exists(id: string): Promise<boolean> {
    return (await this.locate(id)) !== null;
  }

  async get(id: string): Promise<AudioArtifact> {
    const artifact = await this.locate(id);
    if (!artifact) {
      throw new NotFoundError(id);
    }
    return artifact;
  }

  /** Milliseconds since the artifact was created. */
  async age(id: string): Promise<number> {
    const artifact = await this.get(id);
    return Math.max(0, this.now() - artifact.createdAt);
  }

  /**
   * Removes an artifact. Returns false when there was nothing to remove,
   * including when a concurrent delete got there first.
   */
  async delete(id: string): Promise<boolean> {
    const protectedPath = this.protectedById.get(id);
    if (protectedPath !== undefined) {
      throw new ProtectedArtifactError(id, protectedPath);
    }

    const artifact = await this.locateInRoot(id);
    if (!artifact) {
      return false;
    }

    try {
      await fs.unlink(artifact.path);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return false;
      }
      throw new StorageWriteError(artifact.path, error);
    }
    return true;
  }

  /**
   * Lazily walks protected files, then the store root. Entries created after
   * the walk started may or may not appear.
   */
  async *listAll(): AsyncGenerator<ArtifactListing> {
    for (const [id, protectedPath] of this.protectedById) {
      const stats = await this.statOrThrow(protectedPath);
      if (stats?.isFile()) {
        yield {
          id,
          path: protectedPath,
          format: this.formatOf(protectedPath),
          createdAt: createdAtFrom(stats),
          protected: true,
        };
      }
    }

    let dir: Dir;
    try {
      dir = await fs.opendir(this.root);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return;
      }
      throw new StorageReadError(this.root, error);
    }

    try {
      for await (const entry of dir) {
        if (!entry.isFile()) {
          continue;
        }
        const parsed = parseArtifactFileName(entry.name);
        if (!parsed) {
          continue;
        }
        const entryPath = path.join(this.root, entry.name);
        if (this.protectedPaths.has(entryPath)) {
          continue;
        }
        const stats = await this.statOrThrow(entryPath);
        if (!stats) {
          continue;
        }
        yield { ...parsed, path: entryPath, createdAt: createdAtFrom(stats), protected: false };
      }
    } catch (error) {
      throw error instanceof StorageReadError ? error : new StorageReadError(this.root, error);
    }
  }

  private allocateId(bytes: Buffer | Uint8Array): string {
    const contentHash = createHash('sha256').update(bytes).digest('hex').slice(0, CONTENT_HASH_CHARS);
    return `${contentHash}-${randomUUID()}`;
  }

  private formatOf(filePath: string): AudioFormat {
    const format = path.extname(filePath).slice(1).toLowerCase();
    return isAudioFormat(format) ? format : 'wav';
  }

  private async statOrThrow(filePath: string): Promise<Stats | null> {
    try {
      return await statIfExists(filePath);
    } catch (error) {
      throw new StorageReadError(this.root, error);
    }
  }

  private async locate(id: string): Promise<AudioArtifact | null> {
    const protectedPath = this.protectedById.get(id);
    if (protectedPath === undefined) {
      return this.locateInRoot(id);
    }
    const stats = await this.statOrThrow(protectedPath);
    if (!stats?.isFile()) {
      return null;
    }
    return { id, path: protectedPath, format: this.formatOf(protectedPath), createdAt: createdAtFrom(stats) };
  }

  private async locateInRoot(id: string): Promise<AudioArtifact | null> {
    if (!ID_PATTERN.test(id)) {
      return null;
    }
    for (const format of AUDIO_FORMATS) {
      const candidate = path.join(this.root, `${id}.${format}`);
      const stats = await this.statOrThrow(candidate);
      if (stats?.isFile()) {
        return { id, path: candidate, format, createdAt: createdAtFrom(stats) };
      }
    }
    return null;
  }
}
