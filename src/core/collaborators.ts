/**
 * External collaborator contracts
 *
 * The pipeline talks to vendors (transcription, scoring, speech), the capture
 * device and storage only through these interfaces. Every call takes an
 * optional AbortSignal; implementations should stop work when it fires.
 */

import type {
  PodcastManifest,
  PodcastStyle,
  StorageReference,
  TranscriptChunk,
} from '../shared/types.js';

// =============================================================================
// Recording
// =============================================================================

export interface AudioFormat {
  encoding: 'linear16';
  sampleRate: number;
  channels: number;
}

/**
 * A live audio source. startCapture() yields raw PCM until stopCapture() is
 * called or the device disconnects; a disconnect ends iteration with an error.
 */
export interface RecordingSource {
  readonly format: AudioFormat;
  startCapture(): AsyncIterable<Buffer>;
  stopCapture(): Promise<void>;
}

// =============================================================================
// Transcription
// =============================================================================

export interface Transcriber {
  transcribeFile(audioPath: string, signal?: AbortSignal): AsyncIterable<TranscriptChunk>;
  transcribeLive(
    audio: AsyncIterable<Buffer>,
    format: AudioFormat,
    signal?: AbortSignal,
  ): AsyncIterable<TranscriptChunk>;
}

// =============================================================================
// Content scoring
// =============================================================================

export interface ScoringContext {
  style: PodcastStyle;
  previousText: string;
  nextText: string;
  title?: string;
}

export interface ScoringRequest {
  spanText: string;
  context: ScoringContext;
}

export interface ScoringResult {
  relevance: number;
  summary: string;
}

export interface ContentScorer {
  score(request: ScoringRequest, signal?: AbortSignal): Promise<ScoringResult>;
}

// =============================================================================
// Speech synthesis
// =============================================================================

export interface SynthesizedSpeech {
  audio: Buffer;
  durationSeconds: number;
}

export interface SpeechSynthesizer {
  /** Voice presets this vendor can render. */
  readonly supportedVoices: ReadonlySet<string>;
  synthesize(text: string, voiceId: string, signal?: AbortSignal): Promise<SynthesizedSpeech>;
}

// =============================================================================
// Storage
// =============================================================================

export interface StoragePayload {
  jobId: string;
  artifactPath: string;
  manifest: PodcastManifest;
}

export interface PodcastStorage {
  /** Nothing is left in storage when this rejects. */
  save(payload: StoragePayload, signal?: AbortSignal): Promise<StorageReference>;
  /** Remove a stored podcast and its manifest. */
  discard(reference: StorageReference): Promise<void>;
}
