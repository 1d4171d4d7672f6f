/**
 * ClaudeContentScorer - rates a transcript span for podcast-worthiness
 *
 * Sends one candidate span plus its neighbours to Claude and expects a JSON
 * verdict: {"relevance": 0..1, "summary": "..."}. Any failure surfaces as a
 * ServiceCallError; the selector falls back to local heuristics.
 */

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { ServiceCallError, errorMessage, isTransientServiceError, isTransientStatus } from '../errors.js';
import { withTimeout } from '../utils/async.js';
import type { ContentScorer, ScoringRequest, ScoringResult } from '../collaborators.js';
import type { PodcastStyle } from '../../shared/types.js';

// =============================================================================
// Options
// =============================================================================

export interface ClaudeContentScorerOptions {
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export const DEFAULT_CLAUDE_SCORER_OPTIONS: ClaudeContentScorerOptions = {
  model: 'claude-sonnet-4-5-20250929',
  maxTokens: 512,
  temperature: 0,
  timeoutMs: 30_000,
};

// =============================================================================
// Prompt
// =============================================================================

const STYLE_GUIDANCE: Record<PodcastStyle, string> = {
  professional: 'Write the summary in a neutral, businesslike tone.',
  casual: 'Write the summary in a relaxed, conversational tone.',
  energetic: 'Write the summary with upbeat, lively phrasing.',
  calm: 'Write the summary in a measured, soothing tone.',
};

const SYSTEM_PROMPT = `You pick the moments of a meeting worth replaying in a short podcast recap.

You receive one excerpt of a meeting transcript together with the text just before and after it.

Rate how much the excerpt matters to someone who missed the meeting:
- 1.0: a decision, commitment, key insight or turning point
- 0.5: useful discussion that supports a decision
- 0.0: small talk, logistics, filler

Then write a one or two sentence summary of the excerpt that a narrator can read aloud. Do not quote speakers verbatim and do not invent facts.

Respond with ONLY valid JSON: {"relevance": <number 0-1>, "summary": "<text>"}`;

const scoringResponseSchema = z.object({
  relevance: z.number().finite(),
  summary: z.string().trim().min(1),
});

// =============================================================================
// ClaudeContentScorer
// =============================================================================

export class ClaudeContentScorer implements ContentScorer {
  private client: Anthropic;
  private options: ClaudeContentScorerOptions;

  constructor(apiKey: string, options: Partial<ClaudeContentScorerOptions> = {}) {
    this.options = { ...DEFAULT_CLAUDE_SCORER_OPTIONS, ...options };
    this.client = new Anthropic({ apiKey, maxRetries: 0 });
  }

  async score(request: ScoringRequest, signal?: AbortSignal): Promise<ScoringResult> {
    const { spanText, context } = request;
    const userContent = [
      context.title ? `Meeting: ${context.title}` : null,
      STYLE_GUIDANCE[context.style],
      '',
      `Before:\n${context.previousText || '(start of meeting)'}`,
      '',
      `Excerpt:\n${spanText}`,
      '',
      `After:\n${context.nextText || '(end of meeting)'}`,
    ]
      .filter((line): line is string => line !== null)
      .join('\n');

    let text: string;
    try {
      const response = await withTimeout(
        this.client.messages.create(
          {
            model: this.options.model,
            max_tokens: this.options.maxTokens,
            temperature: this.options.temperature,
            system: SYSTEM_PROMPT,
            messages: [{ role: 'user', content: userContent }],
          },
          { signal },
        ),
        this.options.timeoutMs,
        `Claude scoring timed out after ${this.options.timeoutMs}ms`,
      );

      const textBlock = response.content.find((block) => block.type === 'text');
      if (!textBlock || textBlock.type !== 'text') {
        throw new ServiceCallError('Claude response contained no text block', false);
      }
      text = textBlock.text;
    } catch (error) {
      throw toServiceCallError(error);
    }

    return parseScoringResult(text);
  }
}

// =============================================================================
// Response Parsing
// =============================================================================

/**
 * Parse Claude's JSON verdict. Tolerates markdown code fences; clamps
 * relevance into [0, 1].
 */
export function parseScoringResult(text: string): ScoringResult {
  let jsonStr = text.trim();
  const fenceMatch = jsonStr.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenceMatch) {
    jsonStr = fenceMatch[1].trim();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonStr);
  } catch {
    throw new ServiceCallError(`Failed to parse Claude response as JSON: ${jsonStr.slice(0, 200)}`, false);
  }

  const result = scoringResponseSchema.safeParse(parsed);
  if (!result.success) {
    throw new ServiceCallError('Claude response JSON missing required fields (relevance, summary)', false);
  }

  return {
    relevance: Math.min(1, Math.max(0, result.data.relevance)),
    summary: result.data.summary,
  };
}

function toServiceCallError(error: unknown): ServiceCallError {
  if (error instanceof ServiceCallError) {
    return error;
  }
  const cause = error instanceof Error ? error : undefined;
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return new ServiceCallError(
      `Claude API error (${error.status}): ${error.message}`,
      isTransientStatus(error.status),
      error.status,
      cause,
    );
  }
  return new ServiceCallError(errorMessage(error), isTransientServiceError(error), undefined, cause);
}
