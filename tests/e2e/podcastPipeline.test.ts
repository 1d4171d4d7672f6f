/**
 * End-to-end pipeline tests
 *
 * Drives the orchestrator through whole jobs with in-process collaborators:
 * - Upload with every narration succeeding
 * - Upload with narration unavailable (original audio fallback)
 * - Intro and outro narration
 * - Live meeting from recording to DONE, transcribing while it records
 * - Cancellation mid-synthesis, mid-recording and while storing
 * - Recording disconnects with and without captured audio
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { NarrationSynthesizer } from '../../src/core/narration/NarrationSynthesizer.js';
import {
  FakeRecordingSource,
  MEETING,
  TOP_FIVE_SPANS,
  blockingSpeech,
  createHarness,
  failingSpeech,
  fakeSpeech,
  fakeTranscriber,
  pathExists,
  stalledTranscriber,
  streamingTranscriber,
} from '../helpers/pipelineFakes.js';
import type { PipelineHarness } from '../helpers/pipelineFakes.js';
import type { PipelineDependencies } from '../../src/core/pipeline/dependencies.js';
import type { PodcastManifest } from '../../src/shared/types.js';

const UPLOAD = { workflowKind: 'UPLOAD', audioPath: '/meetings/planning.wav', transcript: MEETING } as const;
const SEGMENT_IDS = ['seg-01', 'seg-02', 'seg-03', 'seg-04', 'seg-05'];
const noSleep = async () => undefined;

async function readManifest(manifestPath: string): Promise<PodcastManifest> {
  const parsed: PodcastManifest = JSON.parse(await fs.readFile(manifestPath, 'utf-8'));
  return parsed;
}

describe('Podcast pipeline', () => {
  let harness: PipelineHarness | null = null;

  async function setup(overrides: Partial<PipelineDependencies> = {}): Promise<PipelineHarness> {
    harness = await createHarness(overrides);
    return harness;
  }

  afterEach(async () => {
    await harness?.cleanup();
    harness = null;
  });

  describe('upload', () => {
    it('narrates all five key moments and stores the podcast', async () => {
      const speech = fakeSpeech(4);
      const { orchestrator, workRoot, outputDir } = await setup({
        narrator: new NarrationSynthesizer(speech, { sleep: noSleep }),
      });

      const { id } = orchestrator.createJob({ input: UPLOAD, config: { title: 'Q3 planning' } });
      const final = await orchestrator.waitForCompletion(id);

      expect(final.state).toBe('DONE');
      expect(final.errorLog).toEqual([]);
      expect(final.history.map((entry) => entry.state)).toEqual([
        'CREATED',
        'TRANSCRIBING',
        'SELECTING',
        'SYNTHESIZING',
        'ASSEMBLING',
        'DONE',
      ]);
      expect(final.output).toEqual({
        reference: {
          jobId: id,
          artifactPath: path.join(outputDir, id, 'podcast.wav'),
          manifestPath: path.join(outputDir, id, 'manifest.json'),
        },
        durationSeconds: 18.8,
        format: 'wav',
        narratedSegments: 5,
        degradedSegments: [],
      });

      expect(speech.synthesize).toHaveBeenCalledTimes(5);
      expect(speech.synthesize).toHaveBeenCalledWith(
        'Key point 1 of 5. Summary of item 2',
        'default',
        expect.any(AbortSignal),
      );

      expect(await pathExists(path.join(outputDir, id, 'podcast.wav'))).toBe(true);
      expect(await pathExists(path.join(workRoot, id))).toBe(false);
    });

    it('writes a manifest describing every key segment', async () => {
      const { orchestrator } = await setup();
      const { id } = orchestrator.createJob({ input: UPLOAD, config: { title: 'Q3 planning' } });
      const final = await orchestrator.waitForCompletion(id);
      const manifestPath = final.output?.reference.manifestPath ?? '';

      const manifest = await readManifest(manifestPath);

      expect(manifest.jobId).toBe(id);
      expect(manifest.title).toBe('Q3 planning');
      expect(manifest.durationSeconds).toBe(18.8);
      expect(manifest.failedSegments).toEqual([]);
      expect(manifest.segments.map((segment) => segment.keySegmentId)).toEqual(SEGMENT_IDS);
      expect(manifest.segments.map((segment) => [segment.sourceStart, segment.sourceEnd])).toEqual(TOP_FIVE_SPANS);
      expect(manifest.segments.map((segment) => segment.outputStart)).toEqual([0, 3.7, 7.4, 11.1, 14.8]);
      expect(manifest.segments.every((segment) => segment.narrated && segment.scoredBy === 'scorer')).toBe(true);
    });

    it('falls back to the original audio when narration is unavailable', async () => {
      const speech = failingSpeech();
      const { orchestrator } = await setup({ narrator: new NarrationSynthesizer(speech, { sleep: noSleep }) });

      const { id } = orchestrator.createJob({ input: UPLOAD });
      const final = await orchestrator.waitForCompletion(id);

      expect(final.state).toBe('DONE');
      expect(speech.synthesize).toHaveBeenCalledTimes(15);
      // five 10s excerpts joined by four 0.3s crossfades
      expect(final.output?.durationSeconds).toBe(48.8);
      expect(final.output?.narratedSegments).toBe(0);
      expect(final.output?.degradedSegments).toEqual(SEGMENT_IDS);
      expect(final.errorLog.map((entry) => [entry.stage, entry.kind, entry.keySegmentId])).toEqual(
        SEGMENT_IDS.map((segmentId) => ['SYNTHESIZING', 'SYNTHESIS_UNAVAILABLE', segmentId]),
      );
      expect(final.errorLog[0]?.message).toBe(
        'Speech synthesis unavailable after 3 attempts: OpenAI speech failed (503): HTTP 503',
      );

      const manifest = await readManifest(final.output?.reference.manifestPath ?? '');
      expect(manifest.failedSegments).toEqual(SEGMENT_IDS);
      expect(manifest.segments.some((segment) => segment.narrated)).toBe(false);
    });

    it('opens with an intro and closes with an outro', async () => {
      const speech = fakeSpeech(4);
      const { orchestrator } = await setup({ narrator: new NarrationSynthesizer(speech, { sleep: noSleep }) });

      const { id } = orchestrator.createJob({ input: UPLOAD, config: { title: 'Q3 planning', introOutro: true } });
      const final = await orchestrator.waitForCompletion(id);

      expect(final.state).toBe('DONE');
      // seven 4s clips joined by six 0.3s crossfades
      expect(final.output?.durationSeconds).toBe(26.2);
      expect(final.output?.narratedSegments).toBe(5);
      expect(speech.synthesize).toHaveBeenCalledTimes(7);
      expect(speech.synthesize).toHaveBeenNthCalledWith(
        1,
        'Welcome to this recap of Q3 planning. Here are the 5 key moments from the meeting.',
        'default',
        expect.any(AbortSignal),
      );

      const manifest = await readManifest(final.output?.reference.manifestPath ?? '');
      expect(manifest.intro).toEqual({
        text: 'Welcome to this recap of Q3 planning. Here are the 5 key moments from the meeting.',
        outputStart: 0,
        outputEnd: 4,
      });
      expect(manifest.outro).toEqual({
        text: 'That wraps up our recap of Q3 planning. Thanks for listening!',
        outputStart: 22.2,
        outputEnd: 26.2,
      });
      expect(manifest.segments.map((segment) => segment.outputStart)).toEqual([3.7, 7.4, 11.1, 14.8, 18.5]);
    });

    it('leaves out an intro and outro that could not be narrated', async () => {
      const { orchestrator } = await setup({ narrator: new NarrationSynthesizer(failingSpeech(), { sleep: noSleep }) });

      const { id } = orchestrator.createJob({ input: UPLOAD, config: { introOutro: true } });
      const final = await orchestrator.waitForCompletion(id);

      expect(final.state).toBe('DONE');
      expect(final.output?.durationSeconds).toBe(48.8);
      expect(final.output?.degradedSegments).toEqual(SEGMENT_IDS);
      expect(final.errorLog.map((entry) => entry.keySegmentId)).toEqual(['intro', ...SEGMENT_IDS, 'outro']);

      const manifest = await readManifest(final.output?.reference.manifestPath ?? '');
      expect(manifest.intro).toBeUndefined();
      expect(manifest.outro).toBeUndefined();
    });

    it('discards the podcast when cancelled while it is being stored', async () => {
      const { orchestrator, save, discard, store, outputDir } = await setup();
      save.mockImplementationOnce(async (payload, signal) => {
        const reference = await store.save(payload, signal);
        orchestrator.cancel(payload.jobId);
        return reference;
      });

      const { id } = orchestrator.createJob({ input: UPLOAD });
      const final = await orchestrator.waitForCompletion(id);

      expect(final.state).toBe('CANCELLED');
      expect(final.output).toBeUndefined();
      expect(discard).toHaveBeenCalledWith({
        jobId: id,
        artifactPath: path.join(outputDir, id, 'podcast.wav'),
        manifestPath: path.join(outputDir, id, 'manifest.json'),
      });
      expect(await pathExists(path.join(outputDir, id))).toBe(false);
    });

    it('cancels during synthesis without storing anything', async () => {
      const { speech, started } = blockingSpeech();
      const { orchestrator, save, workRoot } = await setup({
        narrator: new NarrationSynthesizer(speech, { sleep: noSleep }),
      });

      const { id } = orchestrator.createJob({ input: UPLOAD });
      await started;
      expect(orchestrator.getStatus(id).state).toBe('SYNTHESIZING');

      expect(orchestrator.cancel(id).state).toBe('CANCELLED');
      const final = await orchestrator.waitForCompletion(id);

      expect(final.state).toBe('CANCELLED');
      expect(final.errorLog).toEqual([]);
      expect(final.output).toBeUndefined();
      expect(save).not.toHaveBeenCalled();
      expect(await pathExists(path.join(workRoot, id))).toBe(false);
    });
  });

  describe('live meeting', () => {
    it('records, transcribes and publishes in order', async () => {
      const source = new FakeRecordingSource();
      const { orchestrator } = await setup();

      const { id } = orchestrator.createJob({ input: { workflowKind: 'LIVE_MEETING', recordingSource: source } });
      await vi.waitFor(() => expect(orchestrator.getStatus(id).state).toBe('RECORDING'));

      await source.push(Buffer.alloc(3200));
      await orchestrator.stopRecording(id);
      const final = await orchestrator.waitForCompletion(id);

      expect(final.state).toBe('DONE');
      expect(final.history.map((entry) => entry.state)).toEqual([
        'CREATED',
        'RECORDING',
        'TRANSCRIBING',
        'SELECTING',
        'SYNTHESIZING',
        'ASSEMBLING',
        'DONE',
      ]);
      const times = final.history.map((entry) => entry.at);
      expect(times).toEqual([...times].sort((a, b) => a - b));
      expect(final.output?.narratedSegments).toBe(5);
    });

    it('treats repeated stop requests as one', async () => {
      const source = new FakeRecordingSource();
      const { orchestrator } = await setup();

      const { id } = orchestrator.createJob({ input: { workflowKind: 'LIVE_MEETING', recordingSource: source } });
      await vi.waitFor(() => expect(orchestrator.getStatus(id).state).toBe('RECORDING'));
      await source.push(Buffer.alloc(3200));

      await Promise.all([orchestrator.stopRecording(id), orchestrator.stopRecording(id)]);
      await orchestrator.waitForCompletion(id);
      const afterDone = await orchestrator.stopRecording(id);

      expect(source.stopCapture).toHaveBeenCalledTimes(1);
      expect(afterDone.state).toBe('DONE');
    });

    it('honours a stop that arrives before recording starts', async () => {
      const source = new FakeRecordingSource();
      const { orchestrator } = await setup();
      await source.push(Buffer.alloc(3200));

      const { id } = orchestrator.createJob({ input: { workflowKind: 'LIVE_MEETING', recordingSource: source } });
      const stopped = await orchestrator.stopRecording(id);
      const final = await orchestrator.waitForCompletion(id);

      expect(stopped.state).toBe('CREATED');
      expect(final.state).toBe('DONE');
      expect(source.stopCapture).toHaveBeenCalledTimes(1);
      expect(final.output?.narratedSegments).toBe(5);
    });

    it('transcribes while the meeting is still being recorded', async () => {
      const source = new FakeRecordingSource();
      const transcriber = streamingTranscriber();
      const { orchestrator } = await setup({ transcriber });

      const { id } = orchestrator.createJob({
        input: { workflowKind: 'LIVE_MEETING', recordingSource: source },
        config: { segmentCount: 3 },
      });
      await vi.waitFor(() => expect(orchestrator.getStatus(id).state).toBe('RECORDING'));

      await source.push(Buffer.alloc(3200));
      await vi.waitFor(() => expect(orchestrator.getStatus(id).progress).toEqual({ done: 1, total: 1 }));
      await source.push(Buffer.alloc(3200));
      await vi.waitFor(() => expect(orchestrator.getStatus(id).progress).toEqual({ done: 2, total: 2 }));
      expect(orchestrator.getStatus(id).state).toBe('RECORDING');

      await orchestrator.stopRecording(id);
      const final = await orchestrator.waitForCompletion(id);

      expect(final.state).toBe('DONE');
      expect(transcriber.liveBytes()).toBe(6400);
      expect(final.output?.narratedSegments).toBe(3);
    });

    it('keeps capturing while transcription falls behind', async () => {
      const source = new FakeRecordingSource();
      const transcriber = stalledTranscriber();
      const { orchestrator } = await setup({ transcriber });

      const { id } = orchestrator.createJob({ input: { workflowKind: 'LIVE_MEETING', recordingSource: source } });
      await vi.waitFor(() => expect(orchestrator.getStatus(id).state).toBe('RECORDING'));

      // more than the capture and transcription queues hold together
      for (let i = 0; i < 200; i++) {
        await source.push(Buffer.alloc(320));
      }
      await orchestrator.stopRecording(id);
      transcriber.release();
      const final = await orchestrator.waitForCompletion(id);

      expect(final.state).toBe('DONE');
      expect(final.output?.narratedSegments).toBe(5);
    });

    it('fails when the device disconnects before any audio', async () => {
      const source = new FakeRecordingSource();
      const { orchestrator, save } = await setup();

      const { id } = orchestrator.createJob({ input: { workflowKind: 'LIVE_MEETING', recordingSource: source } });
      await vi.waitFor(() => expect(orchestrator.getStatus(id).state).toBe('RECORDING'));
      source.disconnect('Microphone unplugged');
      const final = await orchestrator.waitForCompletion(id);

      expect(final.state).toBe('FAILED');
      expect(final.errorLog).toEqual([
        expect.objectContaining({
          stage: 'RECORDING',
          kind: 'RECORDING_DISCONNECTED',
          message: 'Recording disconnected before any audio: Microphone unplugged',
        }),
      ]);
      expect(save).not.toHaveBeenCalled();
    });

    it('keeps going with the captured audio after a disconnect', async () => {
      const source = new FakeRecordingSource();
      const transcriber = fakeTranscriber();
      const { orchestrator } = await setup({ transcriber });

      const { id } = orchestrator.createJob({ input: { workflowKind: 'LIVE_MEETING', recordingSource: source } });
      await vi.waitFor(() => expect(orchestrator.getStatus(id).state).toBe('RECORDING'));
      await source.push(Buffer.alloc(3200));
      await vi.waitFor(() => expect(transcriber.liveBytes()).toBe(3200));
      source.disconnect('Microphone unplugged');
      const final = await orchestrator.waitForCompletion(id);

      expect(final.state).toBe('DONE');
      expect(final.errorLog).toEqual([
        expect.objectContaining({ stage: 'RECORDING', kind: 'RECORDING_DISCONNECTED', message: 'Microphone unplugged' }),
      ]);
      expect(final.output?.narratedSegments).toBe(5);
    });

    it('cancels while recording', async () => {
      const source = new FakeRecordingSource();
      const { orchestrator, save } = await setup();

      const { id } = orchestrator.createJob({ input: { workflowKind: 'LIVE_MEETING', recordingSource: source } });
      await vi.waitFor(() => expect(orchestrator.getStatus(id).state).toBe('RECORDING'));
      orchestrator.cancel(id);
      const final = await orchestrator.waitForCompletion(id);

      expect(final.state).toBe('CANCELLED');
      expect(source.stopCapture).toHaveBeenCalledTimes(1);
      expect(save).not.toHaveBeenCalled();
    });
  });
});
