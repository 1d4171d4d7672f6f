/**
 * SegmentSelector - picks the key segments worth narrating
 *
 * 1. Group transcript chunks into candidate spans (speaker turns, bounded
 *    by a minimum and maximum span length).
 * 2. Score every candidate with the content scorer, a few calls at a time.
 *    If no scorer is configured, any call fails or a reply is unusable, the
 *    whole candidate set is scored with local heuristics instead.
 * 3. Greedily accept candidates by descending score (earlier start wins
 *    ties), skipping any that overlap or crowd an accepted segment.
 *
 * Never fails for lack of material: a thin transcript yields fewer segments.
 */

import { heuristicScore, heuristicSummary, tokenize } from './heuristics.js';
import { PodcastError, isPodcastError, throwIfAborted } from '../errors.js';
import { mapWithConcurrency } from '../utils/async.js';
import { createLogger } from '../utils/Logger.js';
import type { ContentScorer, ScoringResult } from '../collaborators.js';
import type { KeySegment, PodcastStyle, ScoreSource, TranscriptChunk } from '../../shared/types.js';

const log = createLogger('SegmentSelector');

// ============================================================================
// Types
// ============================================================================

export interface SegmentSelectorOptions {
  /** A span keeps absorbing chunks while shorter than this. */
  minSpanSeconds: number;
  /** A span never grows past this. */
  maxSpanSeconds: number;
  /** Required silence between two accepted segments. */
  minGapSeconds: number;
  /** Scorer calls in flight at once. */
  scoringConcurrency: number;
}

export const DEFAULT_SELECTOR_OPTIONS: SegmentSelectorOptions = {
  minSpanSeconds: 8,
  maxSpanSeconds: 45,
  minGapSeconds: 0,
  scoringConcurrency: 3,
};

export interface CandidateSpan {
  index: number;
  start: number;
  end: number;
  text: string;
  speakerLabel?: string;
}

interface ScoredCandidate extends CandidateSpan {
  score: number;
  summary: string;
}

export interface SelectOptions {
  title?: string;
  signal?: AbortSignal;
}

// ============================================================================
// Candidate spans
// ============================================================================

export function buildCandidates(
  chunks: readonly TranscriptChunk[],
  options: Pick<SegmentSelectorOptions, 'minSpanSeconds' | 'maxSpanSeconds'> = DEFAULT_SELECTOR_OPTIONS,
): CandidateSpan[] {
  const candidates: CandidateSpan[] = [];
  let current: CandidateSpan | null = null;

  for (const chunk of chunks) {
    const text = chunk.text.trim();
    if (text.length === 0) {
      continue;
    }

    if (current) {
      const sameSpeaker = chunk.speakerLabel === current.speakerLabel;
      const tooShort = current.end - current.start < options.minSpanSeconds;
      const fits = chunk.endTime - current.start <= options.maxSpanSeconds;
      if ((sameSpeaker || tooShort) && fits) {
        current.end = chunk.endTime;
        current.text = `${current.text} ${text}`;
        if (!sameSpeaker) {
          current.speakerLabel = undefined;
        }
        continue;
      }
      candidates.push(current);
    }

    current = {
      index: candidates.length,
      start: chunk.startTime,
      end: chunk.endTime,
      text,
      speakerLabel: chunk.speakerLabel,
    };
  }

  if (current) {
    candidates.push(current);
  }

  return candidates.filter((candidate) => tokenize(candidate.text).length > 0);
}

/**
 * Relevance clamped to [0, 1]. A non-numeric relevance or a blank summary
 * counts as a scorer failure.
 */
export function checkScoringResult(result: ScoringResult): ScoringResult {
  if (!Number.isFinite(result.relevance)) {
    throw new PodcastError(`Scorer returned a non-numeric relevance: ${result.relevance}`, 'SCORER_UNAVAILABLE');
  }
  const summary = result.summary.trim();
  if (summary.length === 0) {
    throw new PodcastError('Scorer returned an empty summary', 'SCORER_UNAVAILABLE');
  }
  return { relevance: Math.min(1, Math.max(0, result.relevance)), summary };
}

// ============================================================================
// SegmentSelector Class
// ============================================================================

export class SegmentSelector {
  private readonly options: SegmentSelectorOptions;

  constructor(
    private readonly scorer: ContentScorer | null,
    options: Partial<SegmentSelectorOptions> = {},
  ) {
    this.options = { ...DEFAULT_SELECTOR_OPTIONS, ...options };
  }

  /**
   * Choose up to `targetCount` non-overlapping key segments, ordered by rank.
   */
  async select(
    chunks: readonly TranscriptChunk[],
    targetCount: number,
    style: PodcastStyle,
    selectOptions: SelectOptions = {},
  ): Promise<KeySegment[]> {
    const { signal, title } = selectOptions;
    throwIfAborted(signal);

    const candidates = buildCandidates(chunks, this.options);
    if (candidates.length === 0 || targetCount <= 0) {
      log.info('No candidate spans to select from', { chunks: chunks.length });
      return [];
    }

    const { scored, source } = await this.scoreCandidates(candidates, style, title, signal);
    const accepted = this.pick(scored, targetCount);

    log.info('Selected key segments', {
      candidates: candidates.length,
      selected: accepted.length,
      target: targetCount,
      scoredBy: source,
    });

    return accepted.map((candidate, i) =>
      Object.freeze({
        id: `seg-${String(i + 1).padStart(2, '0')}`,
        sourceSpan: Object.freeze([candidate.start, candidate.end] as const),
        rank: i + 1,
        score: candidate.score,
        summaryText: candidate.summary,
        styleTag: style,
        scoredBy: source,
      }),
    );
  }

  private async scoreCandidates(
    candidates: CandidateSpan[],
    style: PodcastStyle,
    title: string | undefined,
    signal: AbortSignal | undefined,
  ): Promise<{ scored: ScoredCandidate[]; source: ScoreSource }> {
    const scorer = this.scorer;
    if (scorer) {
      try {
        const results = await mapWithConcurrency(
          candidates,
          this.options.scoringConcurrency,
          async (candidate, i): Promise<ScoringResult> =>
            checkScoringResult(
              await scorer.score(
                {
                  spanText: candidate.text,
                  context: {
                    style,
                    title,
                    previousText: candidates[i - 1]?.text ?? '',
                    nextText: candidates[i + 1]?.text ?? '',
                  },
                },
                signal,
              ),
            ),
        );
        return {
          scored: candidates.map((candidate, i) => ({
            ...candidate,
            score: results[i].relevance,
            summary: results[i].summary,
          })),
          source: 'scorer',
        };
      } catch (error) {
        if (isPodcastError(error, 'CANCELLED') || signal?.aborted) {
          throw error;
        }
        log.warn('Content scorer unavailable, falling back to heuristic scoring', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    } else {
      log.info('No content scorer configured, using heuristic scoring');
    }

    return {
      scored: candidates.map((candidate) => ({
        ...candidate,
        score: heuristicScore(candidate.text),
        summary: heuristicSummary(candidate.text),
      })),
      source: 'heuristic',
    };
  }

  private pick(scored: ScoredCandidate[], targetCount: number): ScoredCandidate[] {
    const ordered = [...scored].sort((a, b) => b.score - a.score || a.start - b.start || a.index - b.index);
    const accepted: ScoredCandidate[] = [];
    const gap = this.options.minGapSeconds;

    for (const candidate of ordered) {
      if (accepted.length >= targetCount) {
        break;
      }
      const clashes = accepted.some(
        (other) => candidate.start < other.end + gap && other.start < candidate.end + gap,
      );
      if (!clashes) {
        accepted.push(candidate);
      }
    }

    return accepted;
  }
}
