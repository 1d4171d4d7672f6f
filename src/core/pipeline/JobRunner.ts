/**
 * JobRunner - drives one PipelineJob from creation to a terminal state
 *
 * One runner per job, owned by the orchestrator's registry. The runner is the
 * only writer of its job and its transcript buffer. Every collaborator call
 * gets the job's AbortSignal and is raced against it, so cancel() never waits
 * on a vendor. Storage is the exception: a save is awaited, and one that
 * lands after cancel is discarded. A throw anywhere in here is caught here.
 */

import * as fs from 'fs/promises';
import { join } from 'path';
import { PodcastError, errorMessage, isPodcastError, throwIfAborted, toPodcastError } from '../errors.js';
import type { PodcastErrorCode } from '../errors.js';
import { AudioAssembler } from '../audio/AudioAssembler.js';
import { WavFileWriter } from '../capture/WavFileWriter.js';
import { buildIntroScript, buildNarrationScript, buildOutroScript } from '../narration/scripts.js';
import { buildManifest, podcastTitle } from '../output/manifest.js';
import { TranscriptBuffer } from '../transcript/TranscriptBuffer.js';
import { mapWithConcurrency, raceAbort } from '../utils/async.js';
import { createLogger } from '../utils/Logger.js';
import { BoundedChannel } from './BoundedChannel.js';
import { PipelineJob } from './PipelineJob.js';
import type { PipelineDependencies } from './dependencies.js';
import type { RecordingSource } from '../collaborators.js';
import { INTRO_CLIP_ID, OUTRO_CLIP_ID } from '../../shared/types.js';
import type { NarrationRequest, NarrationResult } from '../narration/NarrationSynthesizer.js';
import type {
  JobState,
  JobStatus,
  KeySegment,
  NarrationClip,
  StorageReference,
  PodcastManifest,
  TranscriptChunk,
} from '../../shared/types.js';

const log = createLogger('JobRunner');

export type JobInput =
  | { workflowKind: 'UPLOAD'; audioPath: string; transcript?: readonly TranscriptChunk[] }
  | { workflowKind: 'LIVE_MEETING'; recordingSource?: RecordingSource };

/** Code recorded when a stage fails with an error that carries none. */
const STAGE_FAILURE_CODES: Partial<Record<JobState, PodcastErrorCode>> = {
  RECORDING: 'RECORDING_DISCONNECTED',
  TRANSCRIBING: 'TRANSCRIPTION_FAILED',
  SELECTING: 'SCORER_UNAVAILABLE',
  SYNTHESIZING: 'SYNTHESIS_UNAVAILABLE',
  ASSEMBLING: 'RENDER_FAILED',
};

export class JobRunner {
  readonly job: PipelineJob;
  readonly workDir: string;

  private readonly buffer = new TranscriptBuffer();
  private readonly abortController = new AbortController();
  private completion: Promise<JobStatus> | null = null;
  private recordingSource: RecordingSource | null = null;
  private stopRequested = false;
  private expectedChunks = 0;

  constructor(
    job: PipelineJob,
    private readonly input: JobInput,
    private readonly deps: PipelineDependencies,
  ) {
    this.job = job;
    this.workDir = join(deps.workRoot, job.id);
  }

  /**
   * Start the pipeline in the background. Safe to call more than once.
   */
  start(): Promise<JobStatus> {
    this.completion ??= this.run();
    return this.completion;
  }

  whenDone(): Promise<JobStatus> {
    return this.start();
  }

  /**
   * Ask the recording to end. A stop that arrives before capture starts is
   * kept and applied once it does. No-op after recording or when already asked.
   */
  async stopRecording(): Promise<void> {
    if (this.input.workflowKind !== 'LIVE_MEETING') {
      throw new PodcastError(`Job ${this.job.id} is not a live meeting`, 'INVALID_OPERATION');
    }
    if (this.stopRequested || (this.job.state !== 'CREATED' && this.job.state !== 'RECORDING')) {
      return;
    }
    this.stopRequested = true;
    log.info('Stop recording requested', { jobId: this.job.id, state: this.job.state });
    await this.recordingSource?.stopCapture();
  }

  /**
   * Cancel the job. Returns false when it had already finished.
   */
  cancel(): boolean {
    if (this.job.isTerminal) {
      return false;
    }
    this.job.transition('CANCELLED');
    this.abortController.abort();
    log.info('Job cancelled', { jobId: this.job.id });
    return true;
  }

  // ===========================================================================
  // Pipeline
  // ===========================================================================

  private async run(): Promise<JobStatus> {
    const signal = this.abortController.signal;

    try {
      await fs.mkdir(this.workDir, { recursive: true });

      // Recording / transcription
      let audioPath: string;
      if (this.input.workflowKind === 'UPLOAD') {
        audioPath = this.input.audioPath;
        this.advance('TRANSCRIBING');
        await this.ingest(this.uploadTranscript(this.input.audioPath, this.input.transcript, signal), signal);
      } else {
        audioPath = await this.recordLive(this.input.recordingSource, signal);
      }

      // Selection
      this.advance('SELECTING');
      const segments = await raceAbort(
        this.deps.selector.select(this.buffer.snapshot(), this.job.config.segmentCount, this.job.config.style, {
          title: this.job.config.title,
          signal,
        }),
        signal,
      );

      // Synthesis
      this.advance('SYNTHESIZING');
      const bookends = this.bookendScripts(segments.length);
      const clips = await this.synthesizeAll(segments, bookends, signal);

      // Assembly
      this.advance('ASSEMBLING');
      const assembler = new AudioAssembler(this.deps.media, { ...this.deps.assemblerOptions, workDir: this.workDir });
      const timeline = assembler.buildTimeline(segments, clips, {
        sourceAudioPath: audioPath,
        musicPath: this.job.config.addMusic ? this.deps.musicPath : undefined,
        denoise: this.job.config.denoise,
      });
      const rendered = await assembler.render(
        timeline,
        join(this.workDir, `podcast.${this.deps.outputFormat}`),
        signal,
      );

      const degraded = segments.filter((segment) => !timeline.narration.has(segment.id)).map((s) => s.id);
      const manifest = buildManifest({
        jobId: this.job.id,
        workflowKind: this.job.workflowKind,
        config: this.job.config,
        createdAt: this.job.createdAt,
        completedAt: Date.now(),
        keySegments: segments,
        timeline,
        rendered,
        failedSegments: degraded,
        bookends,
      });

      throwIfAborted(signal);
      const reference = await this.store(rendered.path, manifest, signal);

      this.job.setOutput({
        reference,
        durationSeconds: rendered.durationSeconds,
        format: rendered.format,
        narratedSegments: segments.length - degraded.length,
        degradedSegments: degraded,
      });
      this.advance('DONE');
    } catch (error) {
      this.handleFailure(error);
    } finally {
      await this.cleanup();
    }

    return this.job.toStatus();
  }

  /**
   * Move to the next state, or stop the pipeline if the job was cancelled.
   */
  private advance(next: JobState): void {
    if (this.abortController.signal.aborted || this.job.state === 'CANCELLED') {
      throw new PodcastError('Job cancelled', 'CANCELLED');
    }
    if (!this.job.transition(next)) {
      throw new PodcastError(`Cannot move job from ${this.job.state} to ${next}`, 'INVALID_TRANSITION');
    }
  }

  private handleFailure(error: unknown): void {
    if (this.job.state === 'CANCELLED') {
      log.info('Pipeline stopped after cancellation', { jobId: this.job.id });
      return;
    }

    const stage = this.job.state;
    const failure = toPodcastError(error, STAGE_FAILURE_CODES[stage] ?? 'UNKNOWN');
    log.error('Pipeline failed', failure, { jobId: this.job.id, stage, code: failure.code });
    this.job.recordError({ stage, kind: failure.code, message: failure.message });
    this.job.transition('FAILED');
  }

  /**
   * Save the podcast. If the job was cancelled while the save ran, the stored
   * copy is discarded and the pipeline stops as cancelled.
   */
  private async store(artifactPath: string, manifest: PodcastManifest, signal: AbortSignal): Promise<StorageReference> {
    let reference: StorageReference;
    try {
      reference = await this.deps.storage.save({ jobId: this.job.id, artifactPath, manifest }, signal);
    } catch (error) {
      throw isPodcastError(error) ? error : toPodcastError(error, 'STORAGE_FAILED');
    }

    if (signal.aborted || this.job.state === 'CANCELLED') {
      log.info('Discarding podcast saved after cancellation', { jobId: this.job.id });
      try {
        await this.deps.storage.discard(reference);
      } catch (error) {
        log.error('Failed to discard podcast after cancellation', error, { jobId: this.job.id });
      }
      throw new PodcastError('Job cancelled', 'CANCELLED');
    }
    return reference;
  }

  private async cleanup(): Promise<void> {
    try {
      await fs.rm(this.workDir, { recursive: true, force: true });
    } catch (error) {
      log.warn('Failed to remove work directory', { workDir: this.workDir, error: errorMessage(error) });
    }
  }

  // ===========================================================================
  // Transcription
  // ===========================================================================

  private uploadTranscript(
    audioPath: string,
    transcript: readonly TranscriptChunk[] | undefined,
    signal: AbortSignal,
  ): AsyncIterable<TranscriptChunk> {
    if (transcript) {
      this.expectedChunks = transcript.length;
      this.job.setProgress(0, transcript.length);
      return (async function* () {
        yield* transcript;
      })();
    }
    const transcriber = this.deps.transcriber;
    if (!transcriber) {
      throw new PodcastError('No transcriber configured and no transcript supplied', 'TRANSCRIPTION_FAILED');
    }
    return transcriber.transcribeFile(audioPath, signal);
  }

  /**
   * Feed transcript chunks into the buffer. This is the buffer's only producer.
   */
  private async ingest(chunks: AsyncIterable<TranscriptChunk>, signal: AbortSignal): Promise<void> {
    const producer = this.buffer.openProducer();
    for await (const chunk of chunks) {
      throwIfAborted(signal);
      producer.append(chunk);
      if (this.job.state === 'TRANSCRIBING' || this.job.state === 'RECORDING') {
        this.job.setProgress(this.buffer.size, Math.max(this.expectedChunks, this.buffer.size));
      }
    }
    producer.close();
    log.info('Transcript complete', { jobId: this.job.id, chunks: this.buffer.size });
  }

  // ===========================================================================
  // Live recording
  // ===========================================================================

  private async recordLive(provided: RecordingSource | undefined, signal: AbortSignal): Promise<string> {
    const source = provided ?? this.deps.recordingSourceFactory?.();
    const transcriber = this.deps.transcriber;
    if (!source || !transcriber) {
      throw new PodcastError('Live meetings need a recording source and a transcriber', 'INVALID_OPERATION');
    }

    this.advance('RECORDING');
    this.recordingSource = source;
    if (this.stopRequested) {
      // asked to stop while the job was still being set up
      await source.stopCapture();
    }

    const wav = new WavFileWriter(join(this.workDir, 'recording.wav'), source.format);
    await wav.open();

    const audio = new BoundedChannel<Buffer>(64);
    let ingestionFailed = false;
    const ingestion: Promise<unknown> = this.ingest(
      transcriber.transcribeLive(audio, source.format, signal),
      signal,
    ).then(
      () => null,
      (error: unknown) => {
        ingestionFailed = true;
        audio.close();
        source.stopCapture().catch((stopError: unknown) =>
          log.warn('Failed to stop capture after transcription error', { error: errorMessage(stopError) }),
        );
        return toPodcastError(error, 'TRANSCRIPTION_FAILED');
      },
    );

    const onAbort = () => {
      audio.close();
      source.stopCapture().catch((error: unknown) =>
        log.warn('Failed to stop capture on cancel', { error: errorMessage(error) }),
      );
    };
    signal.addEventListener('abort', onAbort, { once: true });

    let disconnect: PodcastError | null = null;
    let capturedBytes = 0;
    let fallingBehind = false;
    try {
      for await (const pcm of source.startCapture()) {
        if (signal.aborted || ingestionFailed) {
          break;
        }
        await wav.write(pcm);
        if (audio.isClosed) {
          break;
        }
        // capture never waits on transcription
        if (!audio.push(pcm) && !fallingBehind) {
          fallingBehind = true;
          log.warn('Transcription is falling behind capture', { jobId: this.job.id, pending: audio.pending });
        }
      }
    } catch (error) {
      if (!signal.aborted && !ingestionFailed) {
        disconnect = toPodcastError(error, 'RECORDING_DISCONNECTED');
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
      audio.close();
      capturedBytes = await wav.close();
    }

    throwIfAborted(signal);

    if (disconnect) {
      if (capturedBytes === 0) {
        throw new PodcastError(`Recording disconnected before any audio: ${disconnect.message}`, 'RECORDING_DISCONNECTED');
      }
      log.warn('Recording disconnected, continuing with captured audio', {
        jobId: this.job.id,
        capturedBytes,
      });
      this.job.recordError({ stage: 'RECORDING', kind: 'RECORDING_DISCONNECTED', message: disconnect.message });
    }

    if (!ingestionFailed) {
      this.advance('TRANSCRIBING');
    }
    const ingestionError = await ingestion;
    if (ingestionError !== null) {
      throw ingestionError;
    }
    return wav.path;
  }

  // ===========================================================================
  // Synthesis
  // ===========================================================================

  private bookendScripts(total: number): { intro?: string; outro?: string } | undefined {
    if (!this.job.config.introOutro || total === 0) {
      return undefined;
    }
    const title = podcastTitle(this.job.config, this.job.createdAt);
    return { intro: buildIntroScript(title, total), outro: buildOutroScript(title) };
  }

  private async synthesizeAll(
    segments: readonly KeySegment[],
    bookends: { intro?: string; outro?: string } | undefined,
    signal: AbortSignal,
  ): Promise<NarrationClip[]> {
    const voiceId = this.job.config.voice;
    const requests: NarrationRequest[] = segments.map((segment) => ({
      keySegmentId: segment.id,
      text: buildNarrationScript(segment, segments.length),
      voiceId,
    }));
    if (bookends?.intro) {
      requests.unshift({ keySegmentId: INTRO_CLIP_ID, text: bookends.intro, voiceId });
    }
    if (bookends?.outro) {
      requests.push({ keySegmentId: OUTRO_CLIP_ID, text: bookends.outro, voiceId });
    }

    let done = 0;
    this.job.setProgress(0, requests.length);

    const results = await mapWithConcurrency(
      requests,
      this.deps.synthesisConcurrency,
      async (request): Promise<NarrationResult> => {
        const result = await raceAbort(this.deps.narrator.synthesize(request, signal), signal);
        done++;
        if (this.job.state === 'SYNTHESIZING') {
          this.job.setProgress(done, requests.length);
        }
        return result;
      },
    );

    const clips: NarrationClip[] = [];
    for (const result of results) {
      if (result.status === 'success') {
        clips.push(result.clip);
      } else {
        log.warn('Narration failed, leaving it out or playing original audio', {
          jobId: this.job.id,
          keySegmentId: result.keySegmentId,
          code: result.error.code,
        });
        this.job.recordError({
          stage: 'SYNTHESIZING',
          kind: result.error.code,
          message: result.error.message,
          keySegmentId: result.keySegmentId,
        });
      }
    }
    return clips;
  }
}
