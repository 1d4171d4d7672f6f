/**
 * Wires real collaborators from runtime settings.
 *
 * Missing vendor keys degrade where a fallback exists: no Anthropic key means
 * heuristic selection, no Deepgram key means uploads must bring a transcript.
 * Speech has no fallback, so an OpenAI key is required.
 */

import { join } from 'path';
import { FfmpegRunner } from '../audio/FfmpegRunner.js';
import { MicrophoneSource } from '../capture/MicrophoneSource.js';
import { NarrationSynthesizer } from '../narration/NarrationSynthesizer.js';
import { OpenAISpeechSynthesizer } from '../narration/OpenAISpeechSynthesizer.js';
import { PodcastStore } from '../output/PodcastStore.js';
import { ClaudeContentScorer } from '../selection/ClaudeContentScorer.js';
import { SegmentSelector } from '../selection/SegmentSelector.js';
import { DeepgramTranscriber } from '../transcription/DeepgramTranscriber.js';
import { createLogger } from '../utils/Logger.js';
import { PipelineOrchestrator } from './PipelineOrchestrator.js';
import type { RuntimeSettings } from '../settings.js';

const log = createLogger('createOrchestrator');

export class MissingCredentialError extends Error {
  constructor(readonly variable: string) {
    super(`${variable} is not set`);
    this.name = 'MissingCredentialError';
  }
}

export function createOrchestrator(settings: RuntimeSettings): PipelineOrchestrator {
  if (!settings.openaiApiKey) {
    throw new MissingCredentialError('OPENAI_API_KEY');
  }

  const media = new FfmpegRunner({ ffmpegPath: settings.ffmpegPath, ffprobePath: settings.ffprobePath });

  const scorer = settings.anthropicApiKey ? new ClaudeContentScorer(settings.anthropicApiKey) : null;
  if (!scorer) {
    log.info('ANTHROPIC_API_KEY not set, key segments will be chosen heuristically');
  }

  const transcriber = settings.deepgramApiKey ? new DeepgramTranscriber(settings.deepgramApiKey) : null;
  if (!transcriber) {
    log.info('DEEPGRAM_API_KEY not set, uploads must include a transcript and live meetings are unavailable');
  }

  return new PipelineOrchestrator({
    transcriber,
    selector: new SegmentSelector(scorer),
    narrator: new NarrationSynthesizer(new OpenAISpeechSynthesizer(settings.openaiApiKey, media)),
    media,
    storage: new PodcastStore(settings.outputDir),
    recordingSourceFactory: () => new MicrophoneSource({ ffmpegPath: settings.ffmpegPath }),
    workRoot: join(settings.workDir, 'jobs'),
    musicPath: settings.musicPath,
    outputFormat: settings.outputFormat,
    synthesisConcurrency: settings.synthesisConcurrency,
    assemblerOptions: {
      crossfadeSeconds: settings.crossfadeSeconds,
      colorExcerptSeconds: settings.colorExcerptSeconds,
    },
  });
}
