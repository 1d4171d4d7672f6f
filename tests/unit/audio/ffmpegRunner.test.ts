/**
 * FfmpegRunner Unit Tests
 *
 * child_process.execFile is mocked; no real ffmpeg runs.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

type ExecCallback = (error: Error | null, stdout: string, stderr: string) => void;

const { mockExecFile, mockKill } = vi.hoisted(() => ({
  mockExecFile: vi.fn(),
  mockKill: vi.fn(),
}));

vi.mock('child_process', () => ({
  execFile: mockExecFile,
}));

import { FfmpegRunner } from '../../../src/core/audio/FfmpegRunner.js';

function respondWith(error: Error | null, stdout: string, stderr = ''): void {
  mockExecFile.mockImplementation((_cmd: string, _args: string[], _opts: unknown, callback: ExecCallback) => {
    process.nextTick(() => callback(error, stdout, stderr));
    return { kill: mockKill, pid: 1234 };
  });
}

describe('FfmpegRunner', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('probeDuration', () => {
    it('parses the duration printed by ffprobe', async () => {
      respondWith(null, '12.480000\n');

      const duration = await new FfmpegRunner().probeDuration('/audio/meeting.wav');

      expect(duration).toBe(12.48);
      expect(mockExecFile).toHaveBeenCalledWith(
        'ffprobe',
        ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', '/audio/meeting.wav'],
        expect.objectContaining({ maxBuffer: 16 * 1024 * 1024 }),
        expect.any(Function),
      );
    });

    it('rejects when ffprobe prints no duration', async () => {
      respondWith(null, 'N/A\n');
      await expect(new FfmpegRunner().probeDuration('/audio/meeting.wav')).rejects.toThrow(
        'ffprobe reported no duration for /audio/meeting.wav',
      );
    });

    it('uses the configured ffprobe binary', async () => {
      respondWith(null, '1.0');
      await new FfmpegRunner({ ffprobePath: '/opt/bin/ffprobe' }).probeDuration('/a.wav');
      expect(mockExecFile.mock.calls[0]?.[0]).toBe('/opt/bin/ffprobe');
    });
  });

  describe('runFfmpeg', () => {
    it('runs quietly with the given arguments', async () => {
      respondWith(null, '');
      await new FfmpegRunner({ ffmpegPath: '/opt/bin/ffmpeg' }).runFfmpeg(['-i', 'in.wav', 'out.wav']);

      expect(mockExecFile.mock.calls[0]?.slice(0, 2)).toEqual([
        '/opt/bin/ffmpeg',
        ['-hide_banner', '-loglevel', 'error', '-i', 'in.wav', 'out.wav'],
      ]);
    });

    it('reports the tail of stderr on failure', async () => {
      respondWith(new Error('Command failed'), '', 'in.wav: Invalid data found when processing input\n');
      await expect(new FfmpegRunner().runFfmpeg(['-i', 'in.wav'])).rejects.toThrow(
        'ffmpeg failed: in.wav: Invalid data found when processing input',
      );
    });

    it('falls back to the process error without stderr', async () => {
      respondWith(new Error('spawn ffmpeg ENOENT'), '', '');
      await expect(new FfmpegRunner().runFfmpeg([])).rejects.toThrow('ffmpeg failed: spawn ffmpeg ENOENT');
    });

    it('kills the child and rejects with CANCELLED on abort', async () => {
      mockExecFile.mockImplementation(() => ({ kill: mockKill, pid: 1234 }));
      const controller = new AbortController();

      const pending = new FfmpegRunner().runFfmpeg(['-i', 'in.wav'], controller.signal);
      controller.abort();

      await expect(pending).rejects.toMatchObject({ code: 'CANCELLED', message: 'ffmpeg cancelled' });
      expect(mockKill).toHaveBeenCalledWith('SIGKILL');
    });

    it('does not start when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      await expect(new FfmpegRunner().runFfmpeg([], controller.signal)).rejects.toMatchObject({ code: 'CANCELLED' });
      expect(mockExecFile).not.toHaveBeenCalled();
    });
  });

  describe('checkAvailable', () => {
    it('is true when ffmpeg runs', async () => {
      respondWith(null, 'ffmpeg version 6.1');
      expect(await new FfmpegRunner().checkAvailable()).toBe(true);
    });

    it('is false when ffmpeg is missing', async () => {
      respondWith(new Error('spawn ffmpeg ENOENT'), '', '');
      expect(await new FfmpegRunner().checkAvailable()).toBe(false);
    });
  });
});
