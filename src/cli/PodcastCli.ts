/**
 * PodcastCli - command implementations behind the `podcast` binary
 *
 * Kept free of commander and process.exit so the flows can be driven from
 * tests: each command creates a job on the orchestrator, reports progress
 * and resolves with the final status or throws a CLIError.
 */

import { existsSync } from 'fs';
import { isPodcastError } from '../core/errors.js';
import { loadTranscriptFile } from '../core/transcript/transcriptFile.js';
import type { PipelineOrchestrator } from '../core/pipeline/PipelineOrchestrator.js';
import type { JobState, JobStatus, TranscriptChunk } from '../shared/types.js';

// ============================================================================
// Exit codes
// ============================================================================

export const EXIT_SUCCESS = 0;
export const EXIT_USER_ERROR = 1;
export const EXIT_SYSTEM_ERROR = 2;
export const EXIT_SIGINT = 130;

export class CLIError extends Error {
  public readonly severity: 'user' | 'system';

  constructor(message: string, severity: 'user' | 'system') {
    super(message);
    this.name = 'CLIError';
    this.severity = severity;
  }
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof CLIError) {
    return error.severity === 'user' ? EXIT_USER_ERROR : EXIT_SYSTEM_ERROR;
  }
  if (isPodcastError(error)) {
    return error.category === 'input' ? EXIT_USER_ERROR : EXIT_SYSTEM_ERROR;
  }
  return EXIT_SYSTEM_ERROR;
}

// ============================================================================
// Reporting
// ============================================================================

export interface CliReporter {
  step(message: string): void;
  success(message: string): void;
  fail(message: string): void;
}

const STATE_LABELS: Record<JobState, string> = {
  CREATED: 'Job created',
  RECORDING: 'Recording (press Ctrl+C to stop)',
  TRANSCRIBING: 'Transcribing',
  SELECTING: 'Selecting key moments',
  SYNTHESIZING: 'Narrating key moments',
  ASSEMBLING: 'Mixing podcast',
  DONE: 'Done',
  FAILED: 'Failed',
  CANCELLED: 'Cancelled',
};

export interface JobConfigOptions {
  voice?: string;
  segments?: string;
  style?: string;
  music?: boolean;
  introOutro?: boolean;
  denoise?: boolean;
  title?: string;
}

export interface GenerateOptions extends JobConfigOptions {
  audioPath: string;
  transcriptPath?: string;
}

const POLL_INTERVAL_MS = 250;

// ============================================================================
// PodcastCli Class
// ============================================================================

export class PodcastCli {
  private activeJobId: string | null = null;

  constructor(
    private readonly orchestrator: PipelineOrchestrator,
    private readonly reporter: CliReporter,
  ) {}

  get currentJobId(): string | null {
    return this.activeJobId;
  }

  /**
   * Turn an uploaded recording into a podcast.
   */
  async generate(options: GenerateOptions): Promise<JobStatus> {
    if (!existsSync(options.audioPath)) {
      throw new CLIError(`Audio file not found: ${options.audioPath}`, 'user');
    }

    let transcript: TranscriptChunk[] | undefined;
    if (options.transcriptPath) {
      if (!existsSync(options.transcriptPath)) {
        throw new CLIError(`Transcript file not found: ${options.transcriptPath}`, 'user');
      }
      transcript = await loadTranscriptFile(options.transcriptPath);
      this.reporter.step(`Loaded ${transcript.length} transcript chunks`);
    }

    const status = this.orchestrator.createJob({
      input: { workflowKind: 'UPLOAD', audioPath: options.audioPath, transcript },
      config: toJobConfig(options),
    });
    return this.follow(status.id);
  }

  /**
   * Record the meeting from the microphone until `stopped` resolves.
   */
  async record(options: JobConfigOptions, stopped: Promise<void>): Promise<JobStatus> {
    const status = this.orchestrator.createJob({
      input: { workflowKind: 'LIVE_MEETING' },
      config: toJobConfig(options),
    });

    stopped
      .then(async () => {
        if (this.orchestrator.getStatus(status.id).state === 'RECORDING') {
          this.reporter.step('Stopping recording...');
          await this.orchestrator.stopRecording(status.id);
        }
      })
      .catch((error: unknown) => {
        this.reporter.fail(`Could not stop recording: ${error instanceof Error ? error.message : String(error)}`);
      });

    return this.follow(status.id);
  }

  /**
   * Cancel the running job, if any.
   */
  cancelActive(): JobStatus | null {
    if (!this.activeJobId) {
      return null;
    }
    return this.orchestrator.cancel(this.activeJobId);
  }

  private async follow(jobId: string): Promise<JobStatus> {
    this.activeJobId = jobId;
    let lastState: JobState | null = null;

    const report = () => {
      const status = this.orchestrator.getStatus(jobId);
      if (status.state !== lastState) {
        lastState = status.state;
        if (status.state !== 'DONE' && status.state !== 'FAILED' && status.state !== 'CANCELLED') {
          this.reporter.step(`${STATE_LABELS[status.state]}...`);
        }
      }
    };

    report();
    const timer = setInterval(report, POLL_INTERVAL_MS);
    try {
      const final = await this.orchestrator.waitForCompletion(jobId);
      return this.finish(final);
    } finally {
      clearInterval(timer);
      this.activeJobId = null;
    }
  }

  private finish(status: JobStatus): JobStatus {
    if (status.state === 'DONE' && status.output) {
      const { output } = status;
      this.reporter.success(
        `Podcast ready: ${output.durationSeconds.toFixed(1)}s, ${output.narratedSegments} narrated segment(s)`,
      );
      if (output.degradedSegments.length > 0) {
        this.reporter.fail(
          `Narration failed for ${output.degradedSegments.join(', ')}; original audio used instead`,
        );
      }
      return status;
    }

    if (status.state === 'CANCELLED') {
      throw new CLIError('Job cancelled', 'user');
    }

    const failure = status.errorLog[status.errorLog.length - 1];
    const message = failure ? `${failure.kind} during ${failure.stage}: ${failure.message}` : 'unknown error';
    const userFault = failure?.kind === 'INVALID_CHUNK' || failure?.kind === 'OUT_OF_ORDER_CHUNK' ||
      failure?.kind === 'OVERLAP' || failure?.kind === 'ASSET_UNREADABLE' || failure?.kind === 'EMPTY_TIMELINE';
    throw new CLIError(`Podcast generation failed: ${message}`, userFault ? 'user' : 'system');
  }
}

function toJobConfig(options: JobConfigOptions): Record<string, unknown> {
  const config: Record<string, unknown> = {};
  if (options.voice !== undefined) {
    config.voice = options.voice;
  }
  if (options.segments !== undefined) {
    config.segmentCount = Number(options.segments);
  }
  if (options.style !== undefined) {
    config.style = options.style;
  }
  if (options.music !== undefined) {
    config.addMusic = options.music;
  }
  if (options.introOutro !== undefined) {
    config.introOutro = options.introOutro;
  }
  if (options.denoise !== undefined) {
    config.denoise = options.denoise;
  }
  if (options.title !== undefined) {
    config.title = options.title;
  }
  return config;
}
