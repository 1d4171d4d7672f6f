/**
 * Shared types for meeting-podcast
 *
 * Data model flowing between the pipeline stages:
 * transcript chunks -> key segments -> narration clips -> timeline -> podcast.
 * All times are seconds unless the name ends in `Ms`.
 */

// =============================================================================
// Job configuration vocabulary
// =============================================================================

export const VOICE_PRESETS = ['default', 'male', 'female', 'british', 'american'] as const;
export type VoicePreset = (typeof VOICE_PRESETS)[number];

export const PODCAST_STYLES = ['professional', 'casual', 'energetic', 'calm'] as const;
export type PodcastStyle = (typeof PODCAST_STYLES)[number];

export type WorkflowKind = 'UPLOAD' | 'LIVE_MEETING';

export type OutputFormat = 'wav' | 'mp3';

/**
 * Per-job configuration, validated once at job creation.
 */
export interface PodcastJobConfig {
  voice: VoicePreset;
  segmentCount: number;
  style: PodcastStyle;
  addMusic: boolean;
  /** Narrate a spoken intro and outro naming the meeting. */
  introOutro: boolean;
  /** Run original-audio excerpts through a noise filter. */
  denoise: boolean;
  /** Meeting title, used in scoring context, the intro/outro and the manifest. */
  title?: string;
}

// =============================================================================
// Transcript
// =============================================================================

/**
 * A contiguous span of recognized speech. Immutable once appended.
 */
export interface TranscriptChunk {
  startTime: number;
  endTime: number;
  speakerLabel?: string;
  text: string;
}

// =============================================================================
// Selection
// =============================================================================

export type ScoreSource = 'scorer' | 'heuristic';

/**
 * A selected span of the source audio chosen for narration.
 */
export interface KeySegment {
  id: string;
  /** Half-open interval [start, end) into the source audio. */
  sourceSpan: readonly [number, number];
  /** 1 = most salient. */
  rank: number;
  /** Salience in [0, 1]. */
  score: number;
  summaryText: string;
  styleTag: PodcastStyle;
  scoredBy: ScoreSource;
}

// =============================================================================
// Narration
// =============================================================================

/** Clip ids of the spoken intro and outro; key segment ids never take these. */
export const INTRO_CLIP_ID = 'intro';
export const OUTRO_CLIP_ID = 'outro';

/**
 * Synthesized speech for one key segment, or for the intro or outro.
 */
export interface NarrationClip {
  keySegmentId: string;
  renderedAudio: Buffer;
  duration: number;
  voiceId: VoicePreset;
}

// =============================================================================
// Timeline
// =============================================================================

export type TimelineEntryKind = 'ORIGINAL_EXCERPT' | 'NARRATION' | 'MUSIC_BED';

export type SourceRef =
  | { type: 'source'; audioPath: string; start: number; end: number }
  | { type: 'narration'; keySegmentId: string; voiceId: VoicePreset }
  | { type: 'music'; path: string };

export interface TimelineEntry {
  kind: TimelineEntryKind;
  sourceRef: SourceRef;
  /** Position in the output. */
  startOffset: number;
  duration: number;
  crossfadeIn: number;
  keySegmentId?: string;
  /** Original audio that is denoised before mixing. */
  denoise?: boolean;
}

/**
 * Gain reduction applied to the music bed over an output window.
 */
export interface DuckingWindow {
  start: number;
  end: number;
  gainDb: number;
}

/**
 * The render plan. Reproducible from key segments, narration clips and the
 * music reference.
 */
export interface Timeline {
  entries: TimelineEntry[];
  durationSeconds: number;
  crossfadeSeconds: number;
  narration: ReadonlyMap<string, NarrationClip>;
  ducking: DuckingWindow[];
}

export interface RenderedPodcast {
  path: string;
  durationSeconds: number;
  format: OutputFormat;
}

// =============================================================================
// Pipeline
// =============================================================================

export type JobState =
  | 'CREATED'
  | 'RECORDING'
  | 'TRANSCRIBING'
  | 'SELECTING'
  | 'SYNTHESIZING'
  | 'ASSEMBLING'
  | 'DONE'
  | 'FAILED'
  | 'CANCELLED';

export interface ErrorLogEntry {
  stage: JobState;
  kind: string;
  message: string;
  keySegmentId?: string;
  at: number;
}

export interface StateHistoryEntry {
  state: JobState;
  at: number;
}

export interface JobProgress {
  done: number;
  total: number;
}

/**
 * Where storage put a finished podcast.
 */
export interface StorageReference {
  jobId: string;
  artifactPath: string;
  manifestPath: string;
}

export interface JobOutput {
  reference: StorageReference;
  durationSeconds: number;
  format: OutputFormat;
  narratedSegments: number;
  degradedSegments: string[];
}

/**
 * Read-only view of a job returned by status queries.
 */
export interface JobStatus {
  id: string;
  workflowKind: WorkflowKind;
  state: JobState;
  config: PodcastJobConfig;
  createdAt: number;
  progress: JobProgress | null;
  errorLog: readonly ErrorLogEntry[];
  history: readonly StateHistoryEntry[];
  output?: JobOutput;
}

// =============================================================================
// Manifest
// =============================================================================

export interface ManifestSegment {
  keySegmentId: string;
  rank: number;
  score: number;
  scoredBy: ScoreSource;
  summary: string;
  sourceStart: number;
  sourceEnd: number;
  outputStart: number;
  outputEnd: number;
  narrated: boolean;
}

export interface ManifestBookend {
  text: string;
  outputStart: number;
  outputEnd: number;
}

export interface PodcastManifest {
  jobId: string;
  title: string;
  workflowKind: WorkflowKind;
  createdAt: string;
  completedAt: string;
  config: PodcastJobConfig;
  durationSeconds: number;
  format: OutputFormat;
  intro?: ManifestBookend;
  segments: ManifestSegment[];
  outro?: ManifestBookend;
  failedSegments: string[];
}
