/**
 * renderGraph - ffmpeg argument builder for a timeline
 *
 * Pure function of its inputs: the same timeline and paths always produce the
 * same argument list, and together with the bit-exact output flags the same
 * bytes.
 *
 * Graph shape:
 *   [piece 0] -acrossfade- [piece 1] -acrossfade- ... -> loudnorm -> [voice]
 *   (excerpts marked denoise pass through afftdn first)
 *   [music] -> trim -> volume -> ducking volumes -> [bed]
 *   [voice][bed] -> amix -> [out]
 * A zero crossfade joins pieces with concat instead.
 */

import type { OutputFormat, Timeline, TimelineEntry } from '../../shared/types.js';

export interface RenderGraphOptions {
  /** Integrated loudness target for the spoken track (LUFS). */
  loudnessTarget: number;
  /** Base music gain before ducking (linear). */
  musicVolume: number;
  sampleRate: number;
}

export const DEFAULT_RENDER_GRAPH_OPTIONS: RenderGraphOptions = {
  loudnessTarget: -16,
  musicVolume: 0.1,
  sampleRate: 44_100,
};

const CODEC_ARGS: Record<OutputFormat, string[]> = {
  wav: ['-c:a', 'pcm_s16le'],
  mp3: ['-c:a', 'libmp3lame', '-b:a', '192k'],
};

/** FFT noise reduction: 12 dB of reduction against a -50 dB noise floor. */
export const DENOISE_FILTER = 'afftdn=nr=12:nf=-50';

function fmt(seconds: number): string {
  return seconds.toFixed(3);
}

export function buildRenderArgs(
  timeline: Timeline,
  narrationPaths: ReadonlyMap<string, string>,
  outputPath: string,
  format: OutputFormat,
  options: RenderGraphOptions = DEFAULT_RENDER_GRAPH_OPTIONS,
): string[] {
  const pieces = timeline.entries.filter((entry) => entry.kind !== 'MUSIC_BED');
  const music = timeline.entries.find((entry) => entry.kind === 'MUSIC_BED');
  if (pieces.length === 0) {
    throw new Error('Timeline has no audio pieces');
  }

  const inputArgs: string[] = [];
  const filters: string[] = [];
  const normalize = `aformat=sample_fmts=fltp:sample_rates=${options.sampleRate}:channel_layouts=stereo`;

  pieces.forEach((entry, i) => {
    inputArgs.push(...inputFor(entry, narrationPaths));
    const denoise = entry.denoise ? `${DENOISE_FILTER},` : '';
    filters.push(`[${i}:a]${normalize},${denoise}atrim=0:${fmt(entry.duration)},asetpts=PTS-STARTPTS[p${i}]`);
  });

  let current = 'p0';
  for (let i = 1; i < pieces.length; i++) {
    const next = `j${i}`;
    const crossfade = pieces[i].crossfadeIn;
    filters.push(
      crossfade > 0
        ? `[${current}][p${i}]acrossfade=d=${fmt(crossfade)}:c1=tri:c2=tri[${next}]`
        : `[${current}][p${i}]concat=n=2:v=0:a=1[${next}]`,
    );
    current = next;
  }

  filters.push(
    `[${current}]loudnorm=I=${options.loudnessTarget}:TP=-1.5:LRA=11,aresample=${options.sampleRate}[voice]`,
  );

  let outLabel = 'voice';
  if (music && music.sourceRef.type === 'music') {
    const musicIndex = pieces.length;
    inputArgs.push('-stream_loop', '-1', '-i', music.sourceRef.path);

    const ducking = timeline.ducking.map(
      (window) => `volume=volume=${window.gainDb}dB:enable='gte(t,${fmt(window.start)})*lt(t,${fmt(window.end)})'`,
    );
    filters.push(
      [
        `[${musicIndex}:a]${normalize}`,
        `atrim=0:${fmt(music.duration)}`,
        'asetpts=PTS-STARTPTS',
        `volume=${options.musicVolume}`,
        ...ducking,
      ].join(',') + '[bed]',
    );
    filters.push('[voice][bed]amix=inputs=2:duration=first:dropout_transition=0:normalize=0[out]');
    outLabel = 'out';
  }

  return [
    ...inputArgs,
    '-filter_complex',
    filters.join(';'),
    '-map',
    `[${outLabel}]`,
    '-ac',
    '2',
    '-ar',
    String(options.sampleRate),
    ...CODEC_ARGS[format],
    '-fflags',
    '+bitexact',
    '-flags:a',
    '+bitexact',
    '-map_metadata',
    '-1',
    '-f',
    format,
    '-y',
    outputPath,
  ];
}

function inputFor(entry: TimelineEntry, narrationPaths: ReadonlyMap<string, string>): string[] {
  const ref = entry.sourceRef;
  switch (ref.type) {
    case 'source':
      return ['-ss', fmt(ref.start), '-t', fmt(ref.end - ref.start), '-i', ref.audioPath];
    case 'narration': {
      const path = narrationPaths.get(ref.keySegmentId);
      if (!path) {
        throw new Error(`No narration file for segment ${ref.keySegmentId}`);
      }
      return ['-i', path];
    }
    case 'music':
      return ['-stream_loop', '-1', '-i', ref.path];
  }
}
