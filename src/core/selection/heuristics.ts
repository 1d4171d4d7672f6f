/**
 * heuristics.ts - Local salience scoring (no AI required)
 *
 * Used when no content scorer is configured or the scorer is unreachable.
 * Scores a span by content-word density, length and a few decision cues,
 * and summarizes it with its leading sentence.
 */

// ============================================================================
// Constants
// ============================================================================

const STOPWORDS = new Set([
  'the', 'and', 'that', 'this', 'with', 'for', 'you', 'are', 'was', 'but',
  'have', 'has', 'had', 'not', 'they', 'them', 'there', 'then', 'just', 'like',
  'yeah', 'okay', 'um', 'uh', 'so', 'well', 'really', 'kind', 'sort', 'know',
  'think', 'mean', 'what', 'from', 'its', 'our', 'can', 'get', 'got', 'also',
]);

/** Phrases that usually mark a decision or commitment. */
const CUE_PHRASES = [
  'decide',
  'decided',
  'agree',
  'action item',
  'next step',
  'deadline',
  'important',
  'priority',
  'problem',
  'because',
];

const CUE_BONUS = 0.1;
const MAX_CUE_BONUS = 0.3;

/** Word count at which a span stops gaining from length. */
const FULL_LENGTH_WORDS = 40;

const MAX_SUMMARY_CHARS = 160;

// ============================================================================
// Scoring
// ============================================================================

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}']+/gu) ?? [];
}

/**
 * Salience in [0, 1], rounded to four decimals so equal inputs tie exactly.
 */
export function heuristicScore(text: string): number {
  const words = tokenize(text);
  if (words.length === 0) {
    return 0;
  }

  const contentWords = words.filter((word) => word.length > 2 && !STOPWORDS.has(word));
  const density = contentWords.length / words.length;
  const lengthFactor = Math.min(1, words.length / FULL_LENGTH_WORDS);

  const lower = text.toLowerCase();
  const cueHits = CUE_PHRASES.filter((phrase) => lower.includes(phrase)).length;
  const cueBonus = Math.min(MAX_CUE_BONUS, cueHits * CUE_BONUS);

  const raw = 0.5 * density + 0.3 * lengthFactor + cueBonus;
  return Math.round(Math.min(1, Math.max(0, raw)) * 10_000) / 10_000;
}

// ============================================================================
// Summaries
// ============================================================================

/**
 * Leading sentence of the span, cut at a word boundary.
 */
export function heuristicSummary(text: string): string {
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized.length === 0) {
    return '';
  }

  const sentenceEnd = normalized.search(/[.!?。！？](\s|$)/);
  const sentence = sentenceEnd >= 0 ? normalized.slice(0, sentenceEnd + 1) : normalized;
  if (sentence.length <= MAX_SUMMARY_CHARS) {
    return sentence;
  }

  const cut = sentence.slice(0, MAX_SUMMARY_CHARS);
  const lastSpace = cut.lastIndexOf(' ');
  return `${(lastSpace > 0 ? cut.slice(0, lastSpace) : cut).replace(/[,;:]$/, '')}...`;
}
