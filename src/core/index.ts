/**
 * Library entry point.
 *
 * Embedders build a PipelineOrchestrator either from environment settings
 * (createOrchestrator) or from their own collaborators (PipelineDependencies).
 */

export { PipelineOrchestrator } from './pipeline/PipelineOrchestrator.js';
export type { CreateJobRequest } from './pipeline/PipelineOrchestrator.js';
export type { JobInput } from './pipeline/JobRunner.js';
export type { PipelineDependencies } from './pipeline/dependencies.js';
export { createOrchestrator, MissingCredentialError } from './pipeline/createOrchestrator.js';
export { loadSettings } from './settings.js';
export type { RuntimeSettings } from './settings.js';

export { TranscriptBuffer } from './transcript/TranscriptBuffer.js';
export type { TranscriptProducer } from './transcript/TranscriptBuffer.js';
export { loadTranscriptFile, parseTranscript } from './transcript/transcriptFile.js';
export { SegmentSelector } from './selection/SegmentSelector.js';
export type { SegmentSelectorOptions } from './selection/SegmentSelector.js';
export { ClaudeContentScorer } from './selection/ClaudeContentScorer.js';
export { NarrationSynthesizer } from './narration/NarrationSynthesizer.js';
export type { NarrationRequest, NarrationResult } from './narration/NarrationSynthesizer.js';
export { OpenAISpeechSynthesizer } from './narration/OpenAISpeechSynthesizer.js';
export { AudioAssembler } from './audio/AudioAssembler.js';
export type { AudioAssemblerOptions } from './audio/AudioAssembler.js';
export { FfmpegRunner } from './audio/FfmpegRunner.js';
export type { MediaToolRunner } from './audio/FfmpegRunner.js';
export { DeepgramTranscriber } from './transcription/DeepgramTranscriber.js';
export { MicrophoneSource } from './capture/MicrophoneSource.js';
export { PodcastStore } from './output/PodcastStore.js';

export { PodcastError, ServiceCallError, isPodcastError } from './errors.js';
export type { ErrorCategory, PodcastErrorCode } from './errors.js';
export { createLogger, logSink } from './utils/Logger.js';
export type * from './collaborators.js';
export type * from '../shared/types.js';
export { parseJobConfig, podcastJobConfigSchema } from '../shared/config.js';
