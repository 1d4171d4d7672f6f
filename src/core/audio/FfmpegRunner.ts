/**
 * FfmpegRunner - ffmpeg / ffprobe subprocess wrapper
 *
 * Runs the media tools with a minimal environment. Callers pass an
 * AbortSignal per call; aborting kills the child.
 */

import { execFile as execFileCb } from 'child_process';
import { cancelledError } from '../errors.js';
import { createLogger } from '../utils/Logger.js';

const log = createLogger('FfmpegRunner');

export interface MediaToolRunner {
  /** Duration of a media file in seconds. Rejects if the file is unreadable. */
  probeDuration(path: string, signal?: AbortSignal): Promise<number>;
  /** Run ffmpeg with the given arguments. */
  runFfmpeg(args: string[], signal?: AbortSignal): Promise<void>;
}

export interface FfmpegRunnerOptions {
  ffmpegPath: string;
  ffprobePath: string;
}

export const SAFE_CHILD_ENV = {
  PATH: process.env.PATH,
  HOME: process.env.HOME || process.env.USERPROFILE,
  USERPROFILE: process.env.USERPROFILE,
  LANG: process.env.LANG,
  TMPDIR: process.env.TMPDIR || process.env.TEMP,
  TEMP: process.env.TEMP,
};

/** ffmpeg can be chatty on stderr even at -loglevel error. */
const MAX_BUFFER_BYTES = 16 * 1024 * 1024;

export class FfmpegRunner implements MediaToolRunner {
  private readonly options: FfmpegRunnerOptions;

  constructor(options: Partial<FfmpegRunnerOptions> = {}) {
    this.options = {
      ffmpegPath: options.ffmpegPath ?? 'ffmpeg',
      ffprobePath: options.ffprobePath ?? 'ffprobe',
    };
  }

  async probeDuration(path: string, signal?: AbortSignal): Promise<number> {
    const { stdout } = await this.execTool(
      this.options.ffprobePath,
      ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', path],
      signal,
    );
    const duration = Number.parseFloat(stdout.trim());
    if (!Number.isFinite(duration) || duration < 0) {
      throw new Error(`ffprobe reported no duration for ${path}`);
    }
    return duration;
  }

  async runFfmpeg(args: string[], signal?: AbortSignal): Promise<void> {
    log.debug('Running ffmpeg', { args: args.join(' ') });
    await this.execTool(this.options.ffmpegPath, ['-hide_banner', '-loglevel', 'error', ...args], signal);
  }

  /**
   * Check that ffmpeg is on PATH.
   */
  async checkAvailable(): Promise<boolean> {
    try {
      await this.execTool(this.options.ffmpegPath, ['-version']);
      return true;
    } catch {
      return false;
    }
  }

  private execTool(
    command: string,
    args: string[],
    signal?: AbortSignal,
  ): Promise<{ stdout: string; stderr: string }> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(cancelledError());
        return;
      }

      const onAbort = () => {
        child.kill('SIGKILL');
        reject(cancelledError(`${command} cancelled`));
      };

      const child = execFileCb(
        command,
        args,
        { env: SAFE_CHILD_ENV, maxBuffer: MAX_BUFFER_BYTES },
        (error, stdout, stderr) => {
          signal?.removeEventListener('abort', onAbort);
          if (error) {
            const detail = stderr?.toString().trim();
            reject(new Error(detail ? `${command} failed: ${detail.slice(-500)}` : `${command} failed: ${error.message}`));
          } else {
            resolve({ stdout: stdout?.toString() ?? '', stderr: stderr?.toString() ?? '' });
          }
        },
      );
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
