/**
 * Narration scripts
 *
 * Turns a key segment's summary into the line the narrator reads, with a
 * style-specific lead-in so consecutive segments don't all start the same way.
 * The intro and outro name the meeting.
 */

import type { KeySegment, PodcastStyle } from '../../shared/types.js';

type LeadIn = (position: number, total: number) => string;

const LEAD_INS: Record<PodcastStyle, LeadIn> = {
  professional: (position, total) => `Key point ${position} of ${total}.`,
  casual: (position) => (position === 1 ? "Here's where things got interesting." : "Here's another bit worth hearing."),
  energetic: (position, total) => (position === total ? 'And finally, a big one!' : `Moment number ${position}!`),
  calm: (position) => (position === 1 ? "Let's begin with this moment." : 'Next, a quieter moment to consider.'),
};

/**
 * Script for one segment. `total` is the number of selected segments.
 */
export function buildNarrationScript(segment: KeySegment, total: number): string {
  const leadIn = LEAD_INS[segment.styleTag](segment.rank, total);
  const summary = segment.summaryText.trim();
  return summary.length > 0 ? `${leadIn} ${summary}` : leadIn;
}

export function buildIntroScript(title: string, total: number): string {
  const moments = total === 1 ? 'Here is the key moment' : `Here are the ${total} key moments`;
  return `Welcome to this recap of ${title}. ${moments} from the meeting.`;
}

export function buildOutroScript(title: string): string {
  return `That wraps up our recap of ${title}. Thanks for listening!`;
}
