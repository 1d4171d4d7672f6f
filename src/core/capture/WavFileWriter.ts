/**
 * WavFileWriter - streams 16-bit PCM into a WAV file
 *
 * Writes a header with zero sizes up front, appends PCM as it arrives and
 * patches the RIFF and data sizes on close, so a long recording never has to
 * sit in memory.
 */

import * as fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import type { AudioFormat } from '../collaborators.js';

const HEADER_BYTES = 44;
const BYTES_PER_SAMPLE = 2;

export function buildWavHeader(format: AudioFormat, dataSize: number): Buffer {
  const blockAlign = format.channels * BYTES_PER_SAMPLE;
  const byteRate = format.sampleRate * blockAlign;
  const buffer = Buffer.alloc(HEADER_BYTES);

  buffer.write('RIFF', 0, 'ascii');
  buffer.writeUInt32LE(36 + dataSize, 4);
  buffer.write('WAVE', 8, 'ascii');
  buffer.write('fmt ', 12, 'ascii');
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(1, 20); // PCM
  buffer.writeUInt16LE(format.channels, 22);
  buffer.writeUInt32LE(format.sampleRate, 24);
  buffer.writeUInt32LE(byteRate, 28);
  buffer.writeUInt16LE(blockAlign, 32);
  buffer.writeUInt16LE(BYTES_PER_SAMPLE * 8, 34);
  buffer.write('data', 36, 'ascii');
  buffer.writeUInt32LE(dataSize, 40);

  return buffer;
}

export class WavFileWriter {
  private handle: FileHandle | null = null;
  private dataBytes = 0;

  constructor(
    readonly path: string,
    private readonly format: AudioFormat,
  ) {}

  async open(): Promise<void> {
    this.handle = await fs.open(this.path, 'w');
    await this.handle.write(buildWavHeader(this.format, 0), 0, HEADER_BYTES, 0);
  }

  async write(pcm: Buffer): Promise<void> {
    if (!this.handle) {
      throw new Error('WAV writer is not open');
    }
    await this.handle.write(pcm, 0, pcm.byteLength, HEADER_BYTES + this.dataBytes);
    this.dataBytes += pcm.byteLength;
  }

  /**
   * Patch the header sizes and close the file. Returns the PCM byte count.
   */
  async close(): Promise<number> {
    const handle = this.handle;
    if (!handle) {
      return this.dataBytes;
    }
    this.handle = null;

    try {
      const sizes = Buffer.alloc(4);
      sizes.writeUInt32LE(36 + this.dataBytes, 0);
      await handle.write(sizes, 0, 4, 4);
      sizes.writeUInt32LE(this.dataBytes, 0);
      await handle.write(sizes, 0, 4, 40);
    } finally {
      await handle.close();
    }
    return this.dataBytes;
  }

  get bytesWritten(): number {
    return this.dataBytes;
  }
}
