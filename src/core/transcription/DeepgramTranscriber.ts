/**
 * DeepgramTranscriber - transcript chunks from Deepgram
 *
 * - transcribeFile(): prerecorded API with utterances + diarization
 * - transcribeLive(): WebSocket streaming, final results only
 *
 * Both yield chunks that already satisfy the transcript buffer's ordering
 * contract: vendor utterances that overlap are trimmed to start where the
 * previous one ended.
 */

import * as fs from 'fs/promises';
import { createClient, LiveTranscriptionEvents } from '@deepgram/sdk';
import type { DeepgramClient } from '@deepgram/sdk';
import { z } from 'zod';
import { PodcastError, cancelledError, errorMessage, isPodcastError } from '../errors.js';
import { BoundedChannel } from '../pipeline/BoundedChannel.js';
import { raceAbort, withTimeout } from '../utils/async.js';
import { createLogger } from '../utils/Logger.js';
import type { AudioFormat, Transcriber } from '../collaborators.js';
import type { TranscriptChunk } from '../../shared/types.js';

const log = createLogger('DeepgramTranscriber');

// ============================================================================
// Options
// ============================================================================

export interface DeepgramTranscriberOptions {
  model: string;
  language: string;
  /** Prerecorded request timeout. */
  timeoutMs: number;
  /** Time allowed for the live socket to open. */
  connectTimeoutMs: number;
}

export const DEFAULT_DEEPGRAM_OPTIONS: DeepgramTranscriberOptions = {
  model: 'nova-2',
  language: 'en',
  timeoutMs: 300_000,
  connectTimeoutMs: 10_000,
};

// ============================================================================
// Response schemas
// ============================================================================

const wordSchema = z.object({
  start: z.number().optional(),
  end: z.number().optional(),
  speaker: z.number().optional(),
});

const alternativeSchema = z.object({
  transcript: z.string().optional(),
  words: z.array(wordSchema).optional(),
});

const prerecordedSchema = z.object({
  results: z
    .object({
      utterances: z
        .array(
          z.object({
            start: z.number(),
            end: z.number(),
            transcript: z.string(),
            speaker: z.number().optional(),
          }),
        )
        .optional(),
      channels: z.array(z.object({ alternatives: z.array(alternativeSchema).optional() })).optional(),
    })
    .optional(),
});

const liveResultSchema = z.object({
  start: z.number(),
  duration: z.number(),
  is_final: z.boolean().optional(),
  channel: z.object({ alternatives: z.array(alternativeSchema) }),
});

// ============================================================================
// Chunk normalization
// ============================================================================

/**
 * Turns raw vendor spans into buffer-safe chunks: drops empty or out-of-order
 * spans and trims overlaps against the previous accepted chunk.
 */
export class ChunkNormalizer {
  private lastStart = -Infinity;
  private lastEnd = 0;

  accept(raw: { start: number; end: number; text: string; speaker?: number }): TranscriptChunk | null {
    const text = raw.text.trim();
    if (text.length === 0 || !Number.isFinite(raw.start) || !Number.isFinite(raw.end)) {
      return null;
    }

    const startTime = Math.max(raw.start, this.lastEnd, 0);
    const endTime = Math.max(raw.end, startTime);
    if (startTime < this.lastStart) {
      return null;
    }

    this.lastStart = startTime;
    this.lastEnd = endTime;
    const chunk: TranscriptChunk = { startTime, endTime, text };
    if (raw.speaker !== undefined) {
      chunk.speakerLabel = `Speaker ${raw.speaker + 1}`;
    }
    return chunk;
  }
}

export function parsePrerecordedChunks(result: unknown): TranscriptChunk[] {
  const parsed = prerecordedSchema.safeParse(result);
  if (!parsed.success) {
    throw new PodcastError('Deepgram returned an unexpected response shape', 'TRANSCRIPTION_FAILED');
  }

  const normalizer = new ChunkNormalizer();
  const utterances = parsed.data.results?.utterances;
  if (utterances && utterances.length > 0) {
    return [...utterances]
      .sort((a, b) => a.start - b.start)
      .map((utterance) =>
        normalizer.accept({
          start: utterance.start,
          end: utterance.end,
          text: utterance.transcript,
          speaker: utterance.speaker,
        }),
      )
      .filter((chunk): chunk is TranscriptChunk => chunk !== null);
  }

  const alternative = parsed.data.results?.channels?.[0]?.alternatives?.[0];
  if (!alternative?.transcript?.trim()) {
    return [];
  }
  const words = alternative.words ?? [];
  const start = words[0]?.start ?? 0;
  const end = words[words.length - 1]?.end ?? start;
  const chunk = normalizer.accept({ start, end, text: alternative.transcript });
  return chunk ? [chunk] : [];
}

/**
 * Convert a Node Buffer to an ArrayBuffer for the Deepgram socket.
 */
function toArrayBufferLike(data: Buffer): ArrayBufferLike {
  return data.buffer.slice(data.byteOffset, data.byteOffset + data.byteLength);
}

// ============================================================================
// DeepgramTranscriber Class
// ============================================================================

export class DeepgramTranscriber implements Transcriber {
  private readonly client: DeepgramClient;
  private readonly options: DeepgramTranscriberOptions;

  constructor(apiKey: string, options: Partial<DeepgramTranscriberOptions> = {}) {
    this.client = createClient(apiKey);
    this.options = { ...DEFAULT_DEEPGRAM_OPTIONS, ...options };
  }

  async *transcribeFile(audioPath: string, signal?: AbortSignal): AsyncIterable<TranscriptChunk> {
    const audio = await fs.readFile(audioPath);
    if (audio.byteLength === 0) {
      return;
    }

    log.info('Transcribing recording', { audioPath, bytes: audio.byteLength });
    const response = await raceAbort(
      withTimeout(
        this.client.listen.prerecorded.transcribeFile(audio, {
          model: this.options.model,
          language: this.options.language,
          smart_format: true,
          punctuate: true,
          utterances: true,
          diarize: true,
        }),
        this.options.timeoutMs,
        'Deepgram prerecorded transcription timed out',
      ),
      signal,
    );

    if (response.error) {
      throw new PodcastError(
        `Deepgram prerecorded transcription failed: ${errorMessage(response.error)}`,
        'TRANSCRIPTION_FAILED',
      );
    }

    const chunks = parsePrerecordedChunks(response.result);
    log.info('Transcription complete', { chunks: chunks.length });
    yield* chunks;
  }

  async *transcribeLive(
    audio: AsyncIterable<Buffer>,
    format: AudioFormat,
    signal?: AbortSignal,
  ): AsyncIterable<TranscriptChunk> {
    if (signal?.aborted) {
      throw cancelledError();
    }

    const channel = new BoundedChannel<TranscriptChunk>(256);
    const normalizer = new ChunkNormalizer();
    let pending: Promise<void> = Promise.resolve();

    const connection = this.client.listen.live({
      model: this.options.model,
      language: this.options.language,
      smart_format: true,
      punctuate: true,
      diarize: true,
      interim_results: false,
      encoding: format.encoding,
      sample_rate: format.sampleRate,
      channels: format.channels,
    });

    const opened = new Promise<void>((resolve, reject) => {
      connection.on(LiveTranscriptionEvents.Open, () => resolve());
      connection.on(LiveTranscriptionEvents.Error, (error: unknown) => {
        const failure = new PodcastError(`Deepgram live error: ${errorMessage(error)}`, 'TRANSCRIPTION_FAILED');
        reject(failure);
        channel.fail(failure);
      });
    });
    opened.catch((error: unknown) => log.warn('Live connection failed', { error: errorMessage(error) }));

    connection.on(LiveTranscriptionEvents.Transcript, (data: unknown) => {
      const parsed = liveResultSchema.safeParse(data);
      if (!parsed.success || parsed.data.is_final === false) {
        return;
      }
      const alternative = parsed.data.channel.alternatives[0];
      const chunk = normalizer.accept({
        start: parsed.data.start,
        end: parsed.data.start + parsed.data.duration,
        text: alternative?.transcript ?? '',
        speaker: alternative?.words?.[0]?.speaker,
      });
      if (chunk) {
        pending = pending
          .then(() => channel.send(chunk))
          .catch((error: unknown) => log.warn('Dropped live transcript chunk', { error: errorMessage(error) }));
      }
    });

    connection.on(LiveTranscriptionEvents.Close, () => {
      log.info('Live transcription socket closed');
      void pending.then(() => channel.close());
    });

    const onAbort = () => {
      channel.fail(cancelledError('Live transcription cancelled'));
      connection.requestClose();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      await withTimeout(opened, this.options.connectTimeoutMs, 'Deepgram live connection timed out');
      log.info('Live transcription connected', { sampleRate: format.sampleRate });

      const pump = (async () => {
        for await (const buffer of audio) {
          if (signal?.aborted) {
            return;
          }
          connection.send(toArrayBufferLike(buffer));
        }
        // Flush remaining finals; the socket closes once Deepgram is done.
        connection.requestClose();
      })();
      pump.catch((error: unknown) => {
        channel.fail(
          isPodcastError(error)
            ? error
            : new PodcastError(`Live audio stream failed: ${errorMessage(error)}`, 'TRANSCRIPTION_FAILED'),
        );
      });

      yield* channel;
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (!channel.isClosed) {
        channel.close();
        connection.requestClose();
      }
    }
  }
}
