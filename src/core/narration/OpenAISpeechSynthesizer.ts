/**
 * OpenAISpeechSynthesizer - text-to-speech via the OpenAI audio API
 *
 * POSTs to /v1/audio/speech and returns the MP3 body. The clip duration is
 * measured with ffprobe on a temp copy, since the API does not report it.
 */

import * as fs from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { PodcastError, ServiceCallError, cancelledError, isTransientStatus } from '../errors.js';
import { OPENAI_VOICE_MAP, isVoicePreset } from './voices.js';
import type { MediaToolRunner } from '../audio/FfmpegRunner.js';
import type { SpeechSynthesizer, SynthesizedSpeech } from '../collaborators.js';

export interface OpenAISpeechOptions {
  model: string;
  timeoutMs: number;
  baseUrl: string;
  speed: number;
}

export const DEFAULT_OPENAI_SPEECH_OPTIONS: OpenAISpeechOptions = {
  model: 'tts-1',
  timeoutMs: 60_000,
  baseUrl: 'https://api.openai.com/v1',
  speed: 1.0,
};

/**
 * Extract a user-friendly error message from an OpenAI API error response.
 */
async function extractOpenAiError(response: Response): Promise<string> {
  try {
    const raw = await response.text();
    const trimmed = raw.trim();
    if (trimmed.length === 0) {
      return 'Unknown API error';
    }

    const parsed: unknown = JSON.parse(trimmed);
    if (
      typeof parsed === 'object' &&
      parsed !== null &&
      'error' in parsed &&
      typeof parsed.error === 'object' &&
      parsed.error !== null &&
      'message' in parsed.error &&
      typeof parsed.error.message === 'string' &&
      parsed.error.message.trim().length > 0
    ) {
      return parsed.error.message.trim();
    }
    return trimmed.length > 220 ? `${trimmed.slice(0, 220)}...` : trimmed;
  } catch {
    return `HTTP ${response.status}`;
  }
}

export class OpenAISpeechSynthesizer implements SpeechSynthesizer {
  readonly supportedVoices: ReadonlySet<string> = new Set(Object.keys(OPENAI_VOICE_MAP));
  private readonly options: OpenAISpeechOptions;

  constructor(
    private readonly apiKey: string,
    private readonly media: MediaToolRunner,
    options: Partial<OpenAISpeechOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPENAI_SPEECH_OPTIONS, ...options };
  }

  async synthesize(text: string, voiceId: string, signal?: AbortSignal): Promise<SynthesizedSpeech> {
    if (!isVoicePreset(voiceId)) {
      throw new PodcastError(`Voice "${voiceId}" is not supported`, 'INVALID_VOICE');
    }
    if (signal?.aborted) {
      throw cancelledError();
    }

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    let audio: Buffer;
    try {
      const response = await fetch(`${this.options.baseUrl}/audio/speech`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.options.model,
          voice: OPENAI_VOICE_MAP[voiceId],
          input: text,
          response_format: 'mp3',
          speed: this.options.speed,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const detail = await extractOpenAiError(response);
        if (response.status === 400 && /voice/i.test(detail)) {
          throw new PodcastError(`OpenAI rejected voice "${voiceId}": ${detail}`, 'INVALID_VOICE');
        }
        throw new ServiceCallError(
          `OpenAI speech failed (${response.status}): ${detail}`,
          isTransientStatus(response.status),
          response.status,
        );
      }

      audio = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      if (signal?.aborted) {
        throw cancelledError('Speech synthesis cancelled');
      }
      if (error instanceof PodcastError || error instanceof ServiceCallError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new ServiceCallError(`OpenAI speech timed out after ${this.options.timeoutMs}ms`, true);
      }
      // fetch rejects with TypeError on network failures
      throw new ServiceCallError(
        `OpenAI speech request failed: ${error instanceof Error ? error.message : String(error)}`,
        true,
        undefined,
        error instanceof Error ? error : undefined,
      );
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }

    return { audio, durationSeconds: await this.measure(audio, signal) };
  }

  private async measure(audio: Buffer, signal?: AbortSignal): Promise<number> {
    const dir = await fs.mkdtemp(join(tmpdir(), 'podcast-tts-'));
    const file = join(dir, 'clip.mp3');
    try {
      await fs.writeFile(file, audio);
      return await this.media.probeDuration(file, signal);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }
}
