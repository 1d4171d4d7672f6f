/**
 * MicrophoneSource - live meeting audio from the default input device
 *
 * Spawns ffmpeg reading the platform's audio input and writing raw 16 kHz
 * mono PCM to stdout. startCapture() yields that PCM until stopCapture() is
 * called. If ffmpeg ends on its own (device unplugged, permission revoked),
 * iteration fails with RECORDING_DISCONNECTED after the captured audio.
 * A stop that arrives before capture starts makes the next startCapture()
 * end at once without spawning ffmpeg.
 */

import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import { PodcastError } from '../errors.js';
import { SAFE_CHILD_ENV } from '../audio/FfmpegRunner.js';
import { createLogger } from '../utils/Logger.js';
import type { AudioFormat, RecordingSource } from '../collaborators.js';

const log = createLogger('MicrophoneSource');

/** How long ffmpeg gets to exit after SIGINT before SIGKILL. */
const STOP_TIMEOUT_MS = 10_000;

export interface MicrophoneSourceOptions {
  ffmpegPath: string;
  /** Input device name; platform default when omitted. */
  device?: string;
  sampleRate: number;
}

export function inputArgsForPlatform(platform: NodeJS.Platform, device?: string): string[] {
  switch (platform) {
    case 'darwin':
      // ":device" means audio-only (no video input)
      return ['-f', 'avfoundation', '-i', `:${device ?? 'default'}`];
    case 'win32':
      return ['-f', 'dshow', '-i', `audio=${device ?? 'default'}`];
    default:
      return ['-f', 'pulse', '-i', device ?? 'default'];
  }
}

export class MicrophoneSource implements RecordingSource {
  readonly format: AudioFormat;
  private readonly options: MicrophoneSourceOptions;
  private child: ChildProcess | null = null;
  private stopping = false;

  constructor(options: Partial<MicrophoneSourceOptions> = {}) {
    this.options = {
      ffmpegPath: options.ffmpegPath ?? 'ffmpeg',
      device: options.device,
      sampleRate: options.sampleRate ?? 16_000,
    };
    this.format = { encoding: 'linear16', sampleRate: this.options.sampleRate, channels: 1 };
  }

  async *startCapture(): AsyncIterable<Buffer> {
    if (this.child) {
      throw new PodcastError('Microphone capture already running', 'INVALID_OPERATION');
    }

    const args = [
      '-hide_banner',
      '-loglevel', 'error',
      ...inputArgsForPlatform(process.platform, this.options.device),
      '-ac', '1',
      '-ar', String(this.options.sampleRate),
      '-f', 's16le',
      'pipe:1',
    ];

    if (this.stopping) {
      this.stopping = false;
      log.info('Capture stopped before it started');
      return;
    }

    log.info('Starting microphone capture', { device: this.options.device ?? 'default' });
    const child = spawn(this.options.ffmpegPath, args, {
      env: SAFE_CHILD_ENV,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    this.child = child;

    let stderrTail = '';
    child.stderr?.on('data', (data: Buffer) => {
      stderrTail = (stderrTail + data.toString()).slice(-2000);
    });

    const exited = new Promise<{ code: number | null; error?: Error }>((resolve) => {
      child.once('exit', (code) => resolve({ code }));
      child.once('error', (error) => resolve({ code: null, error }));
    });

    try {
      if (child.stdout) {
        for await (const data of child.stdout) {
          yield Buffer.isBuffer(data) ? data : Buffer.from(String(data));
        }
      }

      const { code, error } = await exited;
      if (!this.stopping) {
        const reason = error?.message ?? (stderrTail.trim() || `ffmpeg exited with code ${code}`);
        log.warn('Microphone capture ended unexpectedly', { code, reason });
        throw new PodcastError(`Recording source disconnected: ${reason}`, 'RECORDING_DISCONNECTED');
      }
      log.info('Microphone capture stopped');
    } finally {
      this.child = null;
      this.stopping = false;
    }
  }

  async stopCapture(): Promise<void> {
    this.stopping = true;
    const child = this.child;
    if (!child || child.exitCode !== null) {
      return;
    }

    await new Promise<void>((resolve) => {
      const timeout = setTimeout(() => {
        log.warn('ffmpeg did not exit in time, sending SIGKILL');
        child.kill('SIGKILL');
      }, STOP_TIMEOUT_MS);

      child.once('exit', () => {
        clearTimeout(timeout);
        resolve();
      });

      // SIGINT lets ffmpeg flush what it has buffered
      child.kill('SIGINT');
    });
  }
}
