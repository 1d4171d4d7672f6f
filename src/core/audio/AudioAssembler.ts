/**
 * AudioAssembler - builds the podcast timeline and renders it with ffmpeg
 *
 * buildTimeline() is pure: key segments (in rank order) become an optional
 * color excerpt of the original audio followed by the narration clip, or the
 * whole source span when narration failed. An intro or outro clip, when
 * given, opens or closes the podcast. Neighbouring pieces overlap by the
 * crossfade, clamped to half the shorter piece. An optional music bed runs
 * under everything, ducked under speech; ducking windows never overlap, so
 * a crossfade is ducked once.
 *
 * render() probes every referenced asset, writes narration clips to the work
 * directory and renders to `<output>.partial`, renaming on success. A failed
 * render leaves no output file behind.
 */

import * as fs from 'fs/promises';
import { extname, join } from 'path';
import { PodcastError, isPodcastError, throwIfAborted, toPodcastError } from '../errors.js';
import { createLogger } from '../utils/Logger.js';
import { DEFAULT_RENDER_GRAPH_OPTIONS, buildRenderArgs } from './renderGraph.js';
import type { RenderGraphOptions } from './renderGraph.js';
import type { MediaToolRunner } from './FfmpegRunner.js';
import { INTRO_CLIP_ID, OUTRO_CLIP_ID } from '../../shared/types.js';
import type {
  DuckingWindow,
  KeySegment,
  NarrationClip,
  OutputFormat,
  RenderedPodcast,
  SourceRef,
  Timeline,
  TimelineEntry,
  TimelineEntryKind,
} from '../../shared/types.js';

const log = createLogger('AudioAssembler');

// ============================================================================
// Options
// ============================================================================

export interface AudioAssemblerOptions {
  crossfadeSeconds: number;
  /** Length of original audio played before each narration. 0 disables. */
  colorExcerptSeconds: number;
  narrationDuckDb: number;
  excerptDuckDb: number;
  /** Directory for narration files written during render. */
  workDir: string;
  graph: RenderGraphOptions;
}

export const DEFAULT_ASSEMBLER_OPTIONS: Omit<AudioAssemblerOptions, 'workDir'> = {
  crossfadeSeconds: 0.3,
  colorExcerptSeconds: 0,
  narrationDuckDb: -12,
  excerptDuckDb: -6,
  graph: DEFAULT_RENDER_GRAPH_OPTIONS,
};

export interface TimelineSources {
  sourceAudioPath: string;
  musicPath?: string;
  /** Mark original-audio excerpts for noise reduction. */
  denoise?: boolean;
}

interface Piece {
  kind: Exclude<TimelineEntryKind, 'MUSIC_BED'>;
  sourceRef: SourceRef;
  durationMs: number;
  keySegmentId: string;
}

const toMs = (seconds: number): number => Math.round(seconds * 1000);
const toSeconds = (ms: number): number => ms / 1000;

function bookendPiece(clip: NarrationClip): Piece {
  return {
    kind: 'NARRATION',
    sourceRef: { type: 'narration', keySegmentId: clip.keySegmentId, voiceId: clip.voiceId },
    durationMs: toMs(clip.duration),
    keySegmentId: clip.keySegmentId,
  };
}

// ============================================================================
// AudioAssembler Class
// ============================================================================

export class AudioAssembler {
  private readonly options: AudioAssemblerOptions;

  constructor(
    private readonly media: MediaToolRunner,
    options: Partial<AudioAssemblerOptions> & Pick<AudioAssemblerOptions, 'workDir'>,
  ) {
    this.options = { ...DEFAULT_ASSEMBLER_OPTIONS, ...options };
  }

  /**
   * Lay out the podcast. Segments play in rank order.
   */
  buildTimeline(
    keySegments: readonly KeySegment[],
    narrationClips: readonly NarrationClip[],
    sources: TimelineSources,
  ): Timeline {
    if (keySegments.length === 0) {
      throw new PodcastError('No key segments to assemble', 'EMPTY_TIMELINE');
    }

    const clips = new Map<string, NarrationClip>();
    for (const clip of narrationClips) {
      clips.set(clip.keySegmentId, clip);
    }

    const pieces: Piece[] = [];
    const ordered = [...keySegments].sort((a, b) => a.rank - b.rank);
    for (const segment of ordered) {
      const [spanStart, spanEnd] = segment.sourceSpan;
      const spanMs = toMs(spanEnd) - toMs(spanStart);
      const clip = clips.get(segment.id);

      if (clip) {
        const colorMs = Math.min(toMs(this.options.colorExcerptSeconds), spanMs);
        if (colorMs > 0) {
          pieces.push({
            kind: 'ORIGINAL_EXCERPT',
            sourceRef: {
              type: 'source',
              audioPath: sources.sourceAudioPath,
              start: spanStart,
              end: toSeconds(toMs(spanStart) + colorMs),
            },
            durationMs: colorMs,
            keySegmentId: segment.id,
          });
        }
        pieces.push({
          kind: 'NARRATION',
          sourceRef: { type: 'narration', keySegmentId: segment.id, voiceId: clip.voiceId },
          durationMs: toMs(clip.duration),
          keySegmentId: segment.id,
        });
      } else if (spanMs > 0) {
        pieces.push({
          kind: 'ORIGINAL_EXCERPT',
          sourceRef: { type: 'source', audioPath: sources.sourceAudioPath, start: spanStart, end: spanEnd },
          durationMs: spanMs,
          keySegmentId: segment.id,
        });
      }
    }

    const playable = pieces.filter((piece) => piece.durationMs > 0);
    if (playable.length === 0) {
      throw new PodcastError('Key segments produced no audible material', 'EMPTY_TIMELINE');
    }

    const intro = clips.get(INTRO_CLIP_ID);
    if (intro) {
      playable.unshift(bookendPiece(intro));
    }
    const outro = clips.get(OUTRO_CLIP_ID);
    if (outro) {
      playable.push(bookendPiece(outro));
    }

    const crossfadeMs = toMs(this.options.crossfadeSeconds);
    const entries: TimelineEntry[] = [];
    const ducking: DuckingWindow[] = [];
    let cursorMs = 0;
    let previousMs = 0;
    let duckedUntilMs = 0;

    playable.forEach((piece, i) => {
      const fadeMs = i === 0 ? 0 : Math.min(crossfadeMs, Math.floor(Math.min(previousMs, piece.durationMs) / 2));
      const startMs = cursorMs - fadeMs;
      const endMs = startMs + piece.durationMs;
      const entry: TimelineEntry = {
        kind: piece.kind,
        sourceRef: piece.sourceRef,
        startOffset: toSeconds(startMs),
        duration: toSeconds(piece.durationMs),
        crossfadeIn: toSeconds(fadeMs),
        keySegmentId: piece.keySegmentId,
      };
      if (sources.denoise && piece.kind === 'ORIGINAL_EXCERPT') {
        entry.denoise = true;
      }
      entries.push(entry);

      // the crossfade keeps the previous piece's gain
      const gainDb = piece.kind === 'NARRATION' ? this.options.narrationDuckDb : this.options.excerptDuckDb;
      const last = ducking[ducking.length - 1];
      if (last && last.gainDb === gainDb) {
        last.end = toSeconds(endMs);
      } else {
        ducking.push({ start: toSeconds(Math.max(startMs, duckedUntilMs)), end: toSeconds(endMs), gainDb });
      }
      duckedUntilMs = endMs;
      cursorMs = endMs;
      previousMs = piece.durationMs;
    });

    const durationSeconds = toSeconds(cursorMs);
    if (sources.musicPath) {
      entries.push({
        kind: 'MUSIC_BED',
        sourceRef: { type: 'music', path: sources.musicPath },
        startOffset: 0,
        duration: durationSeconds,
        crossfadeIn: 0,
      });
    }

    return {
      entries,
      durationSeconds,
      crossfadeSeconds: toSeconds(crossfadeMs),
      narration: clips,
      ducking: sources.musicPath ? ducking : [],
    };
  }

  /**
   * Render a timeline to `outputPath` (.wav or .mp3).
   */
  async render(timeline: Timeline, outputPath: string, signal?: AbortSignal): Promise<RenderedPodcast> {
    if (!timeline.entries.some((entry) => entry.kind !== 'MUSIC_BED')) {
      throw new PodcastError('Timeline is empty', 'EMPTY_TIMELINE');
    }
    throwIfAborted(signal);

    const format: OutputFormat = extname(outputPath).toLowerCase() === '.mp3' ? 'mp3' : 'wav';
    await this.probeAssets(timeline, signal);

    await fs.mkdir(this.options.workDir, { recursive: true });
    const narrationPaths = new Map<string, string>();
    for (const entry of timeline.entries) {
      if (entry.sourceRef.type !== 'narration') {
        continue;
      }
      const clip = timeline.narration.get(entry.sourceRef.keySegmentId);
      if (!clip) {
        throw new PodcastError(`Missing narration clip for ${entry.sourceRef.keySegmentId}`, 'RENDER_FAILED');
      }
      const clipPath = join(this.options.workDir, `narration-${clip.keySegmentId}.mp3`);
      await fs.writeFile(clipPath, clip.renderedAudio);
      narrationPaths.set(clip.keySegmentId, clipPath);
    }

    const partialPath = `${outputPath}.partial`;
    const args = buildRenderArgs(timeline, narrationPaths, partialPath, format, this.options.graph);

    log.info('Rendering podcast', {
      pieces: timeline.entries.length,
      durationSeconds: timeline.durationSeconds,
      format,
    });

    try {
      await this.media.runFfmpeg(args, signal);
      throwIfAborted(signal);
      await fs.rename(partialPath, outputPath);
    } catch (error) {
      await fs.rm(partialPath, { force: true });
      if (isPodcastError(error, 'CANCELLED') || signal?.aborted) {
        throw isPodcastError(error) ? error : new PodcastError('Render cancelled', 'CANCELLED');
      }
      log.error('Render failed', error);
      throw toPodcastError(error, 'RENDER_FAILED');
    }

    log.info('Podcast rendered', { path: outputPath });
    return { path: outputPath, durationSeconds: timeline.durationSeconds, format };
  }

  private async probeAssets(timeline: Timeline, signal?: AbortSignal): Promise<void> {
    const assets = new Set<string>();
    for (const entry of timeline.entries) {
      if (entry.sourceRef.type === 'source') {
        assets.add(entry.sourceRef.audioPath);
      } else if (entry.sourceRef.type === 'music') {
        assets.add(entry.sourceRef.path);
      }
    }

    for (const asset of assets) {
      try {
        await this.media.probeDuration(asset, signal);
      } catch (error) {
        if (isPodcastError(error, 'CANCELLED')) {
          throw error;
        }
        throw new PodcastError(
          `Cannot read audio asset: ${asset}`,
          'ASSET_UNREADABLE',
          error instanceof Error ? error : undefined,
        );
      }
    }
  }
}
