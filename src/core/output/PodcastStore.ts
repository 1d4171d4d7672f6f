/**
 * PodcastStore - disk storage for finished podcasts
 *
 * Storage layout:
 *   ~/Documents/meeting-podcast/
 *     podcast-YYYYMMDD-HHMMSS-xxxx/
 *       podcast.wav | podcast.mp3
 *       manifest.json
 *
 * save() moves the rendered file out of the job's work directory, so the
 * work directory can be discarded afterwards. If the signal fires or a step
 * fails part way, the job's directory is removed before save() rejects.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { PodcastError, isPodcastError, throwIfAborted } from '../errors.js';
import { createLogger } from '../utils/Logger.js';
import type { PodcastStorage, StoragePayload } from '../collaborators.js';
import type { StorageReference } from '../../shared/types.js';

const log = createLogger('PodcastStore');

export const DEFAULT_OUTPUT_DIR = path.join(os.homedir(), 'Documents', 'meeting-podcast');

export class PodcastStore implements PodcastStorage {
  private baseDir: string;

  constructor(baseDir?: string) {
    this.baseDir = baseDir ?? DEFAULT_OUTPUT_DIR;
  }

  async save(payload: StoragePayload, signal?: AbortSignal): Promise<StorageReference> {
    throwIfAborted(signal);
    const jobDir = this.getJobDir(payload.jobId);
    const artifactPath = path.join(jobDir, `podcast${path.extname(payload.artifactPath) || '.wav'}`);
    const manifestPath = path.join(jobDir, 'manifest.json');

    try {
      await fs.mkdir(jobDir, { recursive: true });
      throwIfAborted(signal);
      await this.move(payload.artifactPath, artifactPath);
      throwIfAborted(signal);
      await fs.writeFile(manifestPath, JSON.stringify(payload.manifest, null, 2), 'utf-8');
      throwIfAborted(signal);
    } catch (error) {
      await this.removeJobDir(jobDir);
      if (isPodcastError(error)) {
        throw error;
      }
      throw new PodcastError(
        `Failed to store podcast for ${payload.jobId}: ${error instanceof Error ? error.message : String(error)}`,
        'STORAGE_FAILED',
        error instanceof Error ? error : undefined,
      );
    }

    log.info('Podcast stored', { jobId: payload.jobId, artifactPath });
    return { jobId: payload.jobId, artifactPath, manifestPath };
  }

  async discard(reference: StorageReference): Promise<void> {
    await fs.rm(this.getJobDir(reference.jobId), { recursive: true, force: true });
    log.info('Podcast discarded', { jobId: reference.jobId });
  }

  /**
   * Get the absolute path to a job's storage directory.
   */
  getJobDir(jobId: string): string {
    return path.join(this.baseDir, jobId);
  }

  private async removeJobDir(jobDir: string): Promise<void> {
    try {
      await fs.rm(jobDir, { recursive: true, force: true });
    } catch (error) {
      log.warn('Failed to remove partial podcast directory', {
        jobDir,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async move(from: string, to: string): Promise<void> {
    try {
      await fs.rename(from, to);
    } catch (error) {
      // rename cannot cross devices (work dir on tmpfs)
      if (error instanceof Error && 'code' in error && error.code === 'EXDEV') {
        await fs.copyFile(from, to);
        await fs.unlink(from);
        return;
      }
      throw error;
    }
  }
}
