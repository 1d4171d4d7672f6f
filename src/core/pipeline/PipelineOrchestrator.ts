/**
 * PipelineOrchestrator - registry and outward API for podcast jobs
 *
 * Maps job id -> JobRunner. Jobs share no mutable state; each runner owns its
 * job, buffer and work directory. Status queries are synchronous snapshots
 * and never wait on a running pipeline.
 */

import { PodcastError } from '../errors.js';
import { parseJobConfig } from '../../shared/config.js';
import { createLogger } from '../utils/Logger.js';
import { JobRunner } from './JobRunner.js';
import { PipelineJob, formatJobId } from './PipelineJob.js';
import type { JobInput } from './JobRunner.js';
import type { PipelineDependencies } from './dependencies.js';
import type { JobStatus } from '../../shared/types.js';

const log = createLogger('PipelineOrchestrator');

export interface CreateJobRequest {
  input: JobInput;
  /** Untrusted config; validated here. */
  config?: unknown;
}

export class PipelineOrchestrator {
  private readonly jobs = new Map<string, JobRunner>();

  constructor(private readonly deps: PipelineDependencies) {}

  /**
   * Validate the config, register the job and start its pipeline.
   */
  createJob(request: CreateJobRequest): JobStatus {
    const parsed = parseJobConfig(request.config);
    if (!parsed.ok) {
      throw new PodcastError(`Invalid job config: ${parsed.issues.join('; ')}`, 'INVALID_CONFIG');
    }

    if (parsed.config.addMusic && !this.deps.musicPath) {
      throw new PodcastError(
        'Invalid job config: addMusic needs a music asset (set PODCAST_MUSIC_PATH)',
        'INVALID_CONFIG',
      );
    }

    const { input } = request;
    if (input.workflowKind === 'LIVE_MEETING') {
      if (!this.deps.transcriber) {
        throw new PodcastError('Live meetings need a transcription service', 'INVALID_OPERATION');
      }
      if (!input.recordingSource && !this.deps.recordingSourceFactory) {
        throw new PodcastError('Live meetings need a recording source', 'INVALID_OPERATION');
      }
    } else if (!input.transcript && !this.deps.transcriber) {
      throw new PodcastError(
        'Uploads need a transcript when no transcription service is configured',
        'INVALID_OPERATION',
      );
    }

    let id = formatJobId(Date.now());
    while (this.jobs.has(id)) {
      id = formatJobId(Date.now());
    }

    const job = new PipelineJob(id, input.workflowKind, parsed.config);
    const runner = new JobRunner(job, input, this.deps);
    this.jobs.set(id, runner);
    log.info('Job created', { jobId: id, workflowKind: input.workflowKind, config: parsed.config });

    void runner.start();
    return job.toStatus();
  }

  getStatus(id: string): JobStatus {
    return this.getRunner(id).job.toStatus();
  }

  listJobs(): JobStatus[] {
    return [...this.jobs.values()].map((runner) => runner.job.toStatus()).sort((a, b) => a.createdAt - b.createdAt);
  }

  /**
   * End the live recording of a job. Idempotent; a no-op once recording is over.
   */
  async stopRecording(id: string): Promise<JobStatus> {
    const runner = this.getRunner(id);
    await runner.stopRecording();
    return runner.job.toStatus();
  }

  /**
   * Cancel a job. The job is CANCELLED when this returns; a finished job is
   * left as it is.
   */
  cancel(id: string): JobStatus {
    const runner = this.getRunner(id);
    if (!runner.cancel()) {
      log.info('Cancel ignored, job already finished', { jobId: id, state: runner.job.state });
    }
    return runner.job.toStatus();
  }

  /**
   * Resolve once the job reaches a terminal state (after cleanup).
   */
  waitForCompletion(id: string): Promise<JobStatus> {
    return this.getRunner(id).whenDone();
  }

  /**
   * Drop a finished job from the registry.
   */
  acknowledge(id: string): void {
    const runner = this.getRunner(id);
    if (!runner.job.isTerminal) {
      throw new PodcastError(`Job ${id} is still ${runner.job.state}`, 'INVALID_OPERATION');
    }
    this.jobs.delete(id);
    log.info('Job acknowledged', { jobId: id });
  }

  /**
   * Cancel every unfinished job and wait for them to wind down.
   */
  async shutdown(): Promise<void> {
    const runners = [...this.jobs.values()];
    for (const runner of runners) {
      runner.cancel();
    }
    await Promise.all(runners.map((runner) => runner.whenDone()));
  }

  private getRunner(id: string): JobRunner {
    const runner = this.jobs.get(id);
    if (!runner) {
      throw new PodcastError(`Job not found: ${id}`, 'JOB_NOT_FOUND');
    }
    return runner;
  }
}
