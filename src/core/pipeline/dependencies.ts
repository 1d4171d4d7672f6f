/**
 * Collaborators and settings shared by every job an orchestrator runs.
 */

import type { AudioAssemblerOptions } from '../audio/AudioAssembler.js';
import type { MediaToolRunner } from '../audio/FfmpegRunner.js';
import type { PodcastStorage, RecordingSource, Transcriber } from '../collaborators.js';
import type { NarrationSynthesizer } from '../narration/NarrationSynthesizer.js';
import type { SegmentSelector } from '../selection/SegmentSelector.js';
import type { OutputFormat } from '../../shared/types.js';

export interface PipelineDependencies {
  /** Null when only caller-supplied transcripts are accepted. */
  transcriber: Transcriber | null;
  selector: SegmentSelector;
  narrator: NarrationSynthesizer;
  media: MediaToolRunner;
  storage: PodcastStorage;
  /** Builds the capture source for live jobs that don't bring their own. */
  recordingSourceFactory?: () => RecordingSource;
  /** Parent of every job's work directory. */
  workRoot: string;
  musicPath?: string;
  outputFormat: OutputFormat;
  synthesisConcurrency: number;
  assemblerOptions?: Partial<Omit<AudioAssemblerOptions, 'workDir'>>;
}
