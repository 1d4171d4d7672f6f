/**
 * MicrophoneSource Unit Tests
 *
 * ffmpeg is replaced by a fake child process whose stdout the test feeds.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'events';
import { PassThrough } from 'stream';

const { mockSpawn } = vi.hoisted(() => ({
  mockSpawn: vi.fn(),
}));

vi.mock('child_process', () => ({
  spawn: mockSpawn,
  execFile: vi.fn(),
}));

import { MicrophoneSource, inputArgsForPlatform } from '../../../src/core/capture/MicrophoneSource.js';

class FakeChild extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  exitCode: number | null = null;
  readonly kill = vi.fn((_signal?: string) => {
    this.finish(0);
    return true;
  });

  finish(code: number): void {
    this.exitCode = code;
    this.stdout.end();
    this.emit('exit', code);
  }
}

describe('inputArgsForPlatform', () => {
  it('uses avfoundation audio-only input on macOS', () => {
    expect(inputArgsForPlatform('darwin')).toEqual(['-f', 'avfoundation', '-i', ':default']);
    expect(inputArgsForPlatform('darwin', '1')).toEqual(['-f', 'avfoundation', '-i', ':1']);
  });

  it('uses dshow on Windows', () => {
    expect(inputArgsForPlatform('win32', 'Microphone Array')).toEqual([
      '-f',
      'dshow',
      '-i',
      'audio=Microphone Array',
    ]);
  });

  it('uses pulse elsewhere', () => {
    expect(inputArgsForPlatform('linux')).toEqual(['-f', 'pulse', '-i', 'default']);
  });
});

describe('MicrophoneSource', () => {
  let child: FakeChild;

  beforeEach(() => {
    child = new FakeChild();
    mockSpawn.mockReset();
    mockSpawn.mockReturnValue(child);
  });

  it('reports 16 kHz mono linear PCM', () => {
    expect(new MicrophoneSource().format).toEqual({ encoding: 'linear16', sampleRate: 16_000, channels: 1 });
  });

  it('yields PCM from ffmpeg until stopped', async () => {
    const source = new MicrophoneSource({ ffmpegPath: '/opt/ffmpeg', device: 'hw:1' });
    const iterator = source.startCapture()[Symbol.asyncIterator]();

    const first = iterator.next();
    child.stdout.write(Buffer.from([1, 2, 3, 4]));
    expect(await first).toEqual({ value: Buffer.from([1, 2, 3, 4]), done: false });

    await source.stopCapture();
    expect(child.kill).toHaveBeenCalledWith('SIGINT');
    expect(await iterator.next()).toEqual({ value: undefined, done: true });

    expect(mockSpawn).toHaveBeenCalledWith(
      '/opt/ffmpeg',
      [
        '-hide_banner',
        '-loglevel',
        'error',
        ...inputArgsForPlatform(process.platform, 'hw:1'),
        '-ac',
        '1',
        '-ar',
        '16000',
        '-f',
        's16le',
        'pipe:1',
      ],
      expect.objectContaining({ stdio: ['ignore', 'pipe', 'pipe'] }),
    );
  });

  it('fails with RECORDING_DISCONNECTED when ffmpeg exits on its own', async () => {
    const source = new MicrophoneSource();
    const iterator = source.startCapture()[Symbol.asyncIterator]();

    const first = iterator.next();
    child.stderr.write('Device not found\n');
    await new Promise((resolve) => setImmediate(resolve));
    child.finish(1);

    await expect(first).rejects.toMatchObject({
      code: 'RECORDING_DISCONNECTED',
      message: 'Recording source disconnected: Device not found',
    });
  });

  it('does nothing when stopped before capture starts', async () => {
    await new MicrophoneSource().stopCapture();
    expect(mockSpawn).not.toHaveBeenCalled();
  });

  it('ends the next capture at once when the stop came first', async () => {
    const source = new MicrophoneSource();
    await source.stopCapture();

    const iterator = source.startCapture()[Symbol.asyncIterator]();
    expect(await iterator.next()).toEqual({ value: undefined, done: true });
    expect(mockSpawn).not.toHaveBeenCalled();
  });

  it('captures again after an early stop has been consumed', async () => {
    const source = new MicrophoneSource();
    await source.stopCapture();
    for await (const _pcm of source.startCapture()) {
      // ends without data
    }

    const iterator = source.startCapture()[Symbol.asyncIterator]();
    const first = iterator.next();
    child.stdout.write(Buffer.from([9]));
    expect(await first).toEqual({ value: Buffer.from([9]), done: false });
    expect(mockSpawn).toHaveBeenCalledTimes(1);

    await source.stopCapture();
    expect(await iterator.next()).toEqual({ value: undefined, done: true });
  });
});
