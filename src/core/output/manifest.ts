/**
 * Podcast manifest - JSON description stored next to the rendered audio.
 */

import { INTRO_CLIP_ID, OUTRO_CLIP_ID } from '../../shared/types.js';
import type {
  KeySegment,
  ManifestBookend,
  ManifestSegment,
  PodcastJobConfig,
  PodcastManifest,
  RenderedPodcast,
  Timeline,
  WorkflowKind,
} from '../../shared/types.js';

export interface ManifestInput {
  jobId: string;
  workflowKind: WorkflowKind;
  config: PodcastJobConfig;
  createdAt: number;
  completedAt: number;
  keySegments: readonly KeySegment[];
  timeline: Timeline;
  rendered: RenderedPodcast;
  failedSegments: readonly string[];
  /** Scripts of the intro and outro that were requested. */
  bookends?: { intro?: string; outro?: string };
}

/**
 * The meeting title, or a dated fallback when none was given.
 */
export function podcastTitle(config: PodcastJobConfig, createdAt: number): string {
  return config.title ?? `Meeting recap ${new Date(createdAt).toISOString().slice(0, 10)}`;
}

export function buildManifest(input: ManifestInput): PodcastManifest {
  const { timeline } = input;

  const segments: ManifestSegment[] = [...input.keySegments]
    .sort((a, b) => a.rank - b.rank)
    .map((segment) => {
      const placed = timeline.entries.filter(
        (entry) => entry.kind !== 'MUSIC_BED' && entry.keySegmentId === segment.id,
      );
      const outputStart = placed.length > 0 ? Math.min(...placed.map((entry) => entry.startOffset)) : 0;
      const outputEnd =
        placed.length > 0 ? Math.max(...placed.map((entry) => entry.startOffset + entry.duration)) : 0;

      return {
        keySegmentId: segment.id,
        rank: segment.rank,
        score: segment.score,
        scoredBy: segment.scoredBy,
        summary: segment.summaryText,
        sourceStart: segment.sourceSpan[0],
        sourceEnd: segment.sourceSpan[1],
        outputStart: round3(outputStart),
        outputEnd: round3(outputEnd),
        narrated: timeline.narration.has(segment.id),
      };
    });

  const manifest: PodcastManifest = {
    jobId: input.jobId,
    title: podcastTitle(input.config, input.createdAt),
    workflowKind: input.workflowKind,
    createdAt: new Date(input.createdAt).toISOString(),
    completedAt: new Date(input.completedAt).toISOString(),
    config: input.config,
    durationSeconds: input.rendered.durationSeconds,
    format: input.rendered.format,
    segments,
    failedSegments: [...input.failedSegments],
  };

  const intro = placeBookend(timeline, INTRO_CLIP_ID, input.bookends?.intro);
  if (intro) {
    manifest.intro = intro;
  }
  const outro = placeBookend(timeline, OUTRO_CLIP_ID, input.bookends?.outro);
  if (outro) {
    manifest.outro = outro;
  }
  return manifest;
}

/** Only narrated bookends are listed; a failed one was left out of the audio. */
function placeBookend(timeline: Timeline, clipId: string, text: string | undefined): ManifestBookend | null {
  const entry = timeline.entries.find((candidate) => candidate.keySegmentId === clipId);
  if (!entry || text === undefined) {
    return null;
  }
  return {
    text,
    outputStart: round3(entry.startOffset),
    outputEnd: round3(entry.startOffset + entry.duration),
  };
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}
