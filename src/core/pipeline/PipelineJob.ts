/**
 * PipelineJob - state and bookkeeping for one podcast job
 *
 * State machine:
 *   CREATED -> RECORDING (live only) -> TRANSCRIBING -> SELECTING
 *           -> SYNTHESIZING -> ASSEMBLING -> DONE
 *   Upload jobs go CREATED -> TRANSCRIBING.
 *   Any non-terminal state -> FAILED | CANCELLED.
 *
 * Only the job's runner mutates it; everyone else reads toStatus().
 */

import { randomUUID } from 'crypto';
import { createLogger } from '../utils/Logger.js';
import type {
  ErrorLogEntry,
  JobOutput,
  JobProgress,
  JobState,
  JobStatus,
  PodcastJobConfig,
  StateHistoryEntry,
  WorkflowKind,
} from '../../shared/types.js';

const log = createLogger('PipelineJob');

// =============================================================================
// State Machine Definition
// =============================================================================

const STATE_TRANSITIONS: Record<JobState, JobState[]> = {
  CREATED: ['RECORDING', 'TRANSCRIBING', 'FAILED', 'CANCELLED'],
  RECORDING: ['TRANSCRIBING', 'FAILED', 'CANCELLED'],
  TRANSCRIBING: ['SELECTING', 'FAILED', 'CANCELLED'],
  SELECTING: ['SYNTHESIZING', 'FAILED', 'CANCELLED'],
  SYNTHESIZING: ['ASSEMBLING', 'FAILED', 'CANCELLED'],
  ASSEMBLING: ['DONE', 'FAILED', 'CANCELLED'],
  DONE: [],
  FAILED: [],
  CANCELLED: [],
};

const TERMINAL_STATES: ReadonlySet<JobState> = new Set(['DONE', 'FAILED', 'CANCELLED']);

export function isTerminalState(state: JobState): boolean {
  return TERMINAL_STATES.has(state);
}

/**
 * Job ID pattern: podcast-YYYYMMDD-HHMMSS-xxxx
 */
export function formatJobId(timestamp: number, suffix: string = randomUUID().slice(0, 4)): string {
  const date = new Date(timestamp);

  const dateStr = [
    date.getFullYear(),
    String(date.getMonth() + 1).padStart(2, '0'),
    String(date.getDate()).padStart(2, '0'),
  ].join('');

  const timeStr = [
    String(date.getHours()).padStart(2, '0'),
    String(date.getMinutes()).padStart(2, '0'),
    String(date.getSeconds()).padStart(2, '0'),
  ].join('');

  return `podcast-${dateStr}-${timeStr}-${suffix}`;
}

// =============================================================================
// PipelineJob Class
// =============================================================================

export class PipelineJob {
  readonly id: string;
  readonly workflowKind: WorkflowKind;
  readonly config: PodcastJobConfig;
  readonly createdAt: number;

  private _state: JobState = 'CREATED';
  private readonly history: StateHistoryEntry[];
  private readonly errorLog: ErrorLogEntry[] = [];
  private progress: JobProgress | null = null;
  private output: JobOutput | undefined;

  constructor(id: string, workflowKind: WorkflowKind, config: PodcastJobConfig, now: number = Date.now()) {
    this.id = id;
    this.workflowKind = workflowKind;
    this.config = config;
    this.createdAt = now;
    this.history = [{ state: 'CREATED', at: now }];
  }

  get state(): JobState {
    return this._state;
  }

  get isTerminal(): boolean {
    return isTerminalState(this._state);
  }

  /**
   * Move to `next`. Returns false (and logs) when the move is not allowed.
   */
  transition(next: JobState): boolean {
    const allowed = STATE_TRANSITIONS[this._state];
    const workflowAllows =
      !(this._state === 'CREATED' && next === 'RECORDING' && this.workflowKind !== 'LIVE_MEETING') &&
      !(this._state === 'CREATED' && next === 'TRANSCRIBING' && this.workflowKind === 'LIVE_MEETING');

    if (!allowed.includes(next) || !workflowAllows) {
      log.warn('Invalid state transition', { jobId: this.id, from: this._state, to: next });
      return false;
    }

    const previous = this._state;
    this._state = next;
    this.history.push({ state: next, at: Date.now() });
    if (next !== 'TRANSCRIBING' && next !== 'SYNTHESIZING') {
      this.progress = null;
    }
    log.info('State transition', { jobId: this.id, from: previous, to: next });
    return true;
  }

  recordError(entry: Omit<ErrorLogEntry, 'at'>): void {
    this.errorLog.push({ ...entry, at: Date.now() });
  }

  setProgress(done: number, total: number): void {
    this.progress = { done, total };
  }

  setOutput(output: JobOutput): void {
    this.output = output;
  }

  toStatus(): JobStatus {
    return {
      id: this.id,
      workflowKind: this.workflowKind,
      state: this._state,
      config: this.config,
      createdAt: this.createdAt,
      progress: this.progress ? { ...this.progress } : null,
      errorLog: this.errorLog.map((entry) => ({ ...entry })),
      history: this.history.map((entry) => ({ ...entry })),
      output: this.output,
    };
  }
}
