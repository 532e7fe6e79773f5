/**
 * On-disk audio artifacts.
 *
 * One file per artifact, `<artifactId>.<format>`, directly under the output
 * directory. Writes go to a dot-prefixed `.tmp` sibling and are renamed into
 * place, so `exists`/`open` never observe a partial file. Ids are
 * time + random, which is what keeps concurrent writers apart.
 */
import { randomBytes } from 'crypto';
import fs from 'fs';
import fsp from 'fs/promises';
import path from 'path';
import type { Readable } from 'stream';
import { AUDIO_FORMATS, type AudioFormat } from '../config';
import { readAudioInfo, type AudioInfo } from '../audio/audioInfo';
import { StorageError, describeError, errnoCode } from '../errors';
import { log } from '../log';

export interface AudioArtifact {
  artifactId: string;
  filePath: string;
  format: AudioFormat;
  sampleRate: number;
  createdAt: Date;
  sizeBytes: number;
  durationEstimateSec: number;
}

export interface OpenedArtifact {
  artifactId: string;
  filePath: string;
  format: AudioFormat;
  sizeBytes: number;
  stream: Readable;
}

/** Writes the temp file. Replaceable so tests can simulate a crash mid-write. */
export type TempWriter = (tempPath: string, bytes: Buffer) => Promise<void>;

export interface ArtifactStoreOptions {
  outputDir: string;
  writeTemp?: TempWriter;
}

const ARTIFACT_ID = /^tts_[0-9a-z]+_[0-9a-f]{16}$/;
const TEMP_SUFFIX = '.tmp';

export function generateArtifactId(now: number = Date.now()): string {
  return `tts_${now.toString(36)}_${randomBytes(8).toString('hex')}`;
}

export function isArtifactId(value: string): boolean {
  return ARTIFACT_ID.test(value);
}

const defaultWriteTemp: TempWriter = async (tempPath, bytes) => {
  const handle = await fsp.open(tempPath, 'wx');
  try {
    await handle.writeFile(bytes);
    await handle.sync();
  } finally {
    await handle.close();
  }
};

function storageErrorFrom(err: unknown, action: string): StorageError {
  const code = errnoCode(err);
  if (code === 'ENOSPC' || code === 'EDQUOT') {
    return new StorageError('DiskFull', `${action}: disk full`, { cause: err });
  }
  return new StorageError('WriteError', `${action}: ${describeError(err)}`, { cause: err });
}

export class ArtifactStore {
  readonly outputDir: string;
  private readonly writeTemp: TempWriter;

  constructor(options: ArtifactStoreOptions) {
    this.outputDir = path.resolve(options.outputDir);
    this.writeTemp = options.writeTemp ?? defaultWriteTemp;
  }

  /** Create the directory and clear temp files a crashed process left behind. */
  async init(): Promise<void> {
    await fsp.mkdir(this.outputDir, { recursive: true });
    const entries = await fsp.readdir(this.outputDir);
    const stale = entries.filter((name) => name.startsWith('.') && name.endsWith(TEMP_SUFFIX));
    await Promise.all(stale.map((name) => fsp.rm(path.join(this.outputDir, name), { force: true })));
    if (stale.length > 0) {
      log.warn({ event: 'artifact_temp_cleanup', removed: stale.length }, 'removed stale temp artifacts');
    }
  }

  pathFor(artifactId: string, format: AudioFormat): string {
    return path.join(this.outputDir, `${artifactId}.${format}`);
  }

  async persist(bytes: Buffer, format: AudioFormat, info?: AudioInfo): Promise<AudioArtifact> {
    let audioInfo: AudioInfo;
    try {
      audioInfo = info ?? readAudioInfo(bytes, format);
    } catch (err) {
      throw new StorageError('WriteError', `refusing to store unreadable ${format} audio: ${describeError(err)}`, {
        cause: err,
      });
    }

    const createdAt = new Date();
    const artifactId = generateArtifactId(createdAt.getTime());
    const finalPath = this.pathFor(artifactId, format);
    const tempPath = path.join(this.outputDir, `.${artifactId}.${format}${TEMP_SUFFIX}`);

    try {
      await this.writeTemp(tempPath, bytes);
      await fsp.rename(tempPath, finalPath);
    } catch (err) {
      await fsp.rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
        log.warn({ err: cleanupErr, temp_path: tempPath }, 'temp artifact cleanup failed');
      });
      const storageErr = storageErrorFrom(err, 'artifact write failed');
      log.error({ event: 'artifact_write_failed', artifact_id: artifactId, code: storageErr.code, err }, storageErr.message);
      throw storageErr;
    }

    log.debug({ event: 'artifact_persisted', artifact_id: artifactId, size_bytes: bytes.length }, 'artifact persisted');

    return {
      artifactId,
      filePath: finalPath,
      format,
      sampleRate: audioInfo.sampleRate,
      createdAt,
      sizeBytes: bytes.length,
      durationEstimateSec: audioInfo.durationSec,
    };
  }

  /** Locate a committed artifact; temp files are never matched. */
  async stat(artifactId: string): Promise<{ filePath: string; format: AudioFormat; sizeBytes: number } | null> {
    if (!isArtifactId(artifactId)) return null;

    for (const format of AUDIO_FORMATS) {
      const filePath = this.pathFor(artifactId, format);
      try {
        const stats = await fsp.stat(filePath);
        if (stats.isFile()) {
          return { filePath, format, sizeBytes: stats.size };
        }
      } catch (err) {
        if (errnoCode(err) !== 'ENOENT') throw err;
      }
    }
    return null;
  }

  async exists(artifactId: string): Promise<boolean> {
    return (await this.stat(artifactId)) !== null;
  }

  async open(artifactId: string): Promise<OpenedArtifact> {
    const found = await this.stat(artifactId);
    if (!found) {
      throw new StorageError('NotFound', `artifact not found: ${artifactId}`);
    }
    return {
      artifactId,
      ...found,
      stream: fs.createReadStream(found.filePath),
    };
  }

  /** Write and remove a probe file; used by the health check. */
  async checkWritable(): Promise<void> {
    const probePath = path.join(this.outputDir, `.health-${randomBytes(4).toString('hex')}${TEMP_SUFFIX}`);
    await fsp.writeFile(probePath, 'ok');
    await fsp.rm(probePath, { force: true });
  }
}
