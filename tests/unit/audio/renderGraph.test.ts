/**
 * renderGraph Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { AudioAssembler } from '../../../src/core/audio/AudioAssembler.js';
import { buildRenderArgs } from '../../../src/core/audio/renderGraph.js';
import type { MediaToolRunner } from '../../../src/core/audio/FfmpegRunner.js';
import type { KeySegment, NarrationClip } from '../../../src/shared/types.js';

const media: MediaToolRunner = {
  probeDuration: async () => 0,
  runFfmpeg: async () => undefined,
};

const SEGMENTS: KeySegment[] = [
  { id: 'seg-01', sourceSpan: [5, 15], rank: 1, score: 0.9, summaryText: 'a', styleTag: 'calm', scoredBy: 'scorer' },
  { id: 'seg-02', sourceSpan: [20, 30], rank: 2, score: 0.8, summaryText: 'b', styleTag: 'calm', scoredBy: 'scorer' },
];

const CLIPS: NarrationClip[] = [
  { keySegmentId: 'seg-02', renderedAudio: Buffer.from('x'), duration: 3, voiceId: 'default' },
];

const NARRATION_PATHS = new Map([['seg-02', '/work/narration-seg-02.mp3']]);

const NORMALIZE = 'aformat=sample_fmts=fltp:sample_rates=44100:channel_layouts=stereo';

const OUTPUT_FLAGS = ['-ac', '2', '-ar', '44100'];
const BITEXACT_FLAGS = ['-fflags', '+bitexact', '-flags:a', '+bitexact', '-map_metadata', '-1'];

describe('buildRenderArgs', () => {
  it('crossfades the pieces and normalizes loudness', () => {
    const timeline = new AudioAssembler(media, { workDir: '/work' }).buildTimeline(SEGMENTS, CLIPS, {
      sourceAudioPath: '/audio/meeting.wav',
    });

    expect(buildRenderArgs(timeline, NARRATION_PATHS, '/out/podcast.wav', 'wav')).toEqual([
      '-ss', '5.000', '-t', '10.000', '-i', '/audio/meeting.wav',
      '-i', '/work/narration-seg-02.mp3',
      '-filter_complex',
      [
        `[0:a]${NORMALIZE},atrim=0:10.000,asetpts=PTS-STARTPTS[p0]`,
        `[1:a]${NORMALIZE},atrim=0:3.000,asetpts=PTS-STARTPTS[p1]`,
        '[p0][p1]acrossfade=d=0.300:c1=tri:c2=tri[j1]',
        '[j1]loudnorm=I=-16:TP=-1.5:LRA=11,aresample=44100[voice]',
      ].join(';'),
      '-map', '[voice]',
      ...OUTPUT_FLAGS,
      '-c:a', 'pcm_s16le',
      ...BITEXACT_FLAGS,
      '-f', 'wav', '-y', '/out/podcast.wav',
    ]);
  });

  it('mixes a looped, ducked music bed under the voice', () => {
    const timeline = new AudioAssembler(media, { workDir: '/work' }).buildTimeline(SEGMENTS, CLIPS, {
      sourceAudioPath: '/audio/meeting.wav',
      musicPath: '/music/bed.mp3',
    });

    const args = buildRenderArgs(timeline, NARRATION_PATHS, '/out/podcast.mp3', 'mp3');
    const filters = args[args.indexOf('-filter_complex') + 1]?.split(';');

    expect(args.slice(8, 12)).toEqual(['-stream_loop', '-1', '-i', '/music/bed.mp3']);
    expect(filters?.slice(-2)).toEqual([
      `[2:a]${NORMALIZE},atrim=0:12.700,asetpts=PTS-STARTPTS,volume=0.1,` +
        "volume=volume=-6dB:enable='gte(t,0.000)*lt(t,10.000)'," +
        "volume=volume=-12dB:enable='gte(t,10.000)*lt(t,12.700)'[bed]",
      '[voice][bed]amix=inputs=2:duration=first:dropout_transition=0:normalize=0[out]',
    ]);
    expect(args.slice(args.indexOf('-map'), args.indexOf('-map') + 2)).toEqual(['-map', '[out]']);
    expect(args).toContain('libmp3lame');
    expect(args.slice(-4)).toEqual(['-f', 'mp3', '-y', '/out/podcast.mp3']);
  });

  it('concatenates when the crossfade is zero', () => {
    const timeline = new AudioAssembler(media, { workDir: '/work', crossfadeSeconds: 0 }).buildTimeline(
      SEGMENTS,
      CLIPS,
      { sourceAudioPath: '/audio/meeting.wav' },
    );

    const args = buildRenderArgs(timeline, NARRATION_PATHS, '/out/podcast.wav', 'wav');
    expect(args[args.indexOf('-filter_complex') + 1]).toContain('[p0][p1]concat=n=2:v=0:a=1[j1]');
    expect(timeline.durationSeconds).toBe(13);
  });

  it('denoises original excerpts only', () => {
    const timeline = new AudioAssembler(media, { workDir: '/work' }).buildTimeline(SEGMENTS, CLIPS, {
      sourceAudioPath: '/audio/meeting.wav',
      denoise: true,
    });

    const args = buildRenderArgs(timeline, NARRATION_PATHS, '/out/podcast.wav', 'wav');
    expect(args[args.indexOf('-filter_complex') + 1]?.split(';').slice(0, 2)).toEqual([
      `[0:a]${NORMALIZE},afftdn=nr=12:nf=-50,atrim=0:10.000,asetpts=PTS-STARTPTS[p0]`,
      `[1:a]${NORMALIZE},atrim=0:3.000,asetpts=PTS-STARTPTS[p1]`,
    ]);
  });

  it('fails when a narration file is missing', () => {
    const timeline = new AudioAssembler(media, { workDir: '/work' }).buildTimeline(SEGMENTS, CLIPS, {
      sourceAudioPath: '/audio/meeting.wav',
    });
    expect(() => buildRenderArgs(timeline, new Map(), '/out/podcast.wav', 'wav')).toThrow(
      'No narration file for segment seg-02',
    );
  });
});
