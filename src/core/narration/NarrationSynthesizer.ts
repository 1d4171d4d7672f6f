/**
 * NarrationSynthesizer - retrying adapter over a speech vendor
 *
 * Converts narration text into audio for one key segment. Transient vendor
 * failures are retried with capped exponential backoff; permanent failures
 * and unknown voices fail at once. The outcome is returned as an explicit
 * NarrationResult, never thrown. Only cancellation throws (CANCELLED).
 */

import { PodcastError, isPodcastError, isTransientServiceError, errorMessage, throwIfAborted } from '../errors.js';
import { raceAbort, sleep as abortableSleep } from '../utils/async.js';
import { createLogger } from '../utils/Logger.js';
import { isVoicePreset } from './voices.js';
import type { SpeechSynthesizer } from '../collaborators.js';
import type { NarrationClip } from '../../shared/types.js';

const log = createLogger('NarrationSynthesizer');

// =============================================================================
// Types
// =============================================================================

export interface NarrationRequest {
  keySegmentId: string;
  text: string;
  voiceId: string;
}

export type NarrationResult =
  | { status: 'success'; clip: NarrationClip; attempts: number }
  | { status: 'failed'; keySegmentId: string; error: PodcastError; attempts: number };

export interface NarrationSynthesizerOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Injected for tests; must reject with CANCELLED when the signal fires. */
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export const DEFAULT_NARRATION_OPTIONS: NarrationSynthesizerOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 8000,
  sleep: abortableSleep,
};

/**
 * Delay before retrying after failed attempt `attempt` (1-based).
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

// =============================================================================
// NarrationSynthesizer Class
// =============================================================================

export class NarrationSynthesizer {
  private readonly options: NarrationSynthesizerOptions;

  constructor(
    private readonly speech: SpeechSynthesizer,
    options: Partial<NarrationSynthesizerOptions> = {},
  ) {
    this.options = { ...DEFAULT_NARRATION_OPTIONS, ...options };
  }

  async synthesize(request: NarrationRequest, signal?: AbortSignal): Promise<NarrationResult> {
    const { keySegmentId, text, voiceId } = request;

    if (!isVoicePreset(voiceId) || !this.speech.supportedVoices.has(voiceId)) {
      log.warn('Rejected unknown voice', { keySegmentId, voiceId });
      return {
        status: 'failed',
        keySegmentId,
        error: new PodcastError(`Voice "${voiceId}" is not supported`, 'INVALID_VOICE'),
        attempts: 0,
      };
    }

    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      throwIfAborted(signal);

      try {
        const speech = await raceAbort(this.speech.synthesize(text, voiceId, signal), signal);
        if (speech.audio.byteLength === 0 || !Number.isFinite(speech.durationSeconds) || speech.durationSeconds <= 0) {
          throw new PodcastError('Speech vendor returned empty audio', 'SYNTHESIS_UNAVAILABLE');
        }

        log.info('Narration attempt succeeded', { keySegmentId, attempt, duration: speech.durationSeconds });
        return {
          status: 'success',
          clip: {
            keySegmentId,
            renderedAudio: speech.audio,
            duration: speech.durationSeconds,
            voiceId,
          },
          attempts: attempt,
        };
      } catch (error) {
        if (isPodcastError(error, 'CANCELLED') || signal?.aborted) {
          log.info('Narration cancelled', { keySegmentId, attempt });
          throw isPodcastError(error, 'CANCELLED') ? error : new PodcastError('Narration cancelled', 'CANCELLED');
        }

        lastError = error;
        const transient = isTransientServiceError(error);
        log.warn('Narration attempt failed', {
          keySegmentId,
          attempt,
          maxAttempts: this.options.maxAttempts,
          transient,
          error: errorMessage(error),
        });

        if (isPodcastError(error, 'INVALID_VOICE')) {
          return { status: 'failed', keySegmentId, error, attempts: attempt };
        }
        if (!transient) {
          return {
            status: 'failed',
            keySegmentId,
            error: new PodcastError(
              `Speech synthesis failed permanently: ${errorMessage(error)}`,
              'SYNTHESIS_UNAVAILABLE',
              error instanceof Error ? error : undefined,
            ),
            attempts: attempt,
          };
        }

        if (attempt < this.options.maxAttempts) {
          const delay = backoffDelay(attempt, this.options.baseDelayMs, this.options.maxDelayMs);
          log.debug('Retrying narration', { keySegmentId, delayMs: delay });
          await this.options.sleep(delay, signal);
        }
      }
    }

    return {
      status: 'failed',
      keySegmentId,
      error: new PodcastError(
        `Speech synthesis unavailable after ${this.options.maxAttempts} attempts: ${errorMessage(lastError)}`,
        'SYNTHESIS_UNAVAILABLE',
        lastError instanceof Error ? lastError : undefined,
      ),
      attempts: this.options.maxAttempts,
    };
  }
}
