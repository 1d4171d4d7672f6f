/**
 * TranscriptBuffer - Append-only, time-ordered store of transcript chunks
 *
 * One buffer belongs to one job. Exactly one producer (transcription
 * ingestion) may append; it receives that role through openProducer(). Any
 * number of readers may take snapshots at any time, including while the
 * producer is still appending.
 *
 * Ordering contract: each chunk starts at or after the previous chunk's start
 * and does not begin inside the previous chunk's [start, end) interval.
 */

import { PodcastError } from '../errors.js';
import type { TranscriptChunk } from '../../shared/types.js';

/**
 * Write capability for a buffer. Handed out once.
 */
export interface TranscriptProducer {
  append(chunk: TranscriptChunk): void;
  close(): void;
}

export class TranscriptBuffer {
  private chunks: Readonly<TranscriptChunk>[] = [];
  private closed = false;
  private producerIssued = false;
  private cachedSnapshot: readonly Readonly<TranscriptChunk>[] | null = null;

  /**
   * Claim the producer role. Fails with PRODUCER_TAKEN on the second call.
   */
  openProducer(): TranscriptProducer {
    if (this.producerIssued) {
      throw new PodcastError('Transcript buffer already has a producer', 'PRODUCER_TAKEN');
    }
    this.producerIssued = true;
    return {
      append: (chunk) => this.append(chunk),
      close: () => this.close(),
    };
  }

  /**
   * Append a chunk at the end of the buffer.
   */
  append(chunk: TranscriptChunk): void {
    if (this.closed) {
      throw new PodcastError('Transcript buffer is closed', 'BUFFER_CLOSED');
    }

    validateChunk(chunk);

    const last = this.chunks[this.chunks.length - 1];
    if (last) {
      if (chunk.startTime < last.startTime) {
        throw new PodcastError(
          `Chunk starting at ${chunk.startTime}s arrived after a chunk starting at ${last.startTime}s`,
          'OUT_OF_ORDER_CHUNK',
        );
      }
      if (chunk.startTime < last.endTime) {
        throw new PodcastError(
          `Chunk starting at ${chunk.startTime}s overlaps previous chunk [${last.startTime}, ${last.endTime})`,
          'OVERLAP',
        );
      }
    }

    const stored: TranscriptChunk = {
      startTime: chunk.startTime,
      endTime: chunk.endTime,
      text: chunk.text,
    };
    if (chunk.speakerLabel !== undefined) {
      stored.speakerLabel = chunk.speakerLabel;
    }

    this.chunks.push(Object.freeze(stored));
    this.cachedSnapshot = null;
  }

  /**
   * Immutable view of every chunk appended so far, in append order.
   */
  snapshot(): readonly Readonly<TranscriptChunk>[] {
    if (!this.cachedSnapshot) {
      this.cachedSnapshot = Object.freeze(this.chunks.slice());
    }
    return this.cachedSnapshot;
  }

  /**
   * Close the buffer. Idempotent.
   */
  close(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.chunks.length;
  }

  /**
   * End time of the last chunk, or 0 for an empty buffer.
   */
  get lastEndTime(): number {
    return this.chunks[this.chunks.length - 1]?.endTime ?? 0;
  }
}

function validateChunk(chunk: TranscriptChunk): void {
  const { startTime, endTime, text } = chunk;
  if (!Number.isFinite(startTime) || !Number.isFinite(endTime)) {
    throw new PodcastError('Chunk times must be finite numbers', 'INVALID_CHUNK');
  }
  if (startTime < 0) {
    throw new PodcastError(`Chunk start ${startTime}s is negative`, 'INVALID_CHUNK');
  }
  if (endTime < startTime) {
    throw new PodcastError(`Chunk ends (${endTime}s) before it starts (${startTime}s)`, 'INVALID_CHUNK');
  }
  if (typeof text !== 'string') {
    throw new PodcastError('Chunk text must be a string', 'INVALID_CHUNK');
  }
}
