/**
 * Job configuration schema
 *
 * Validated once when a job is created; everything downstream works with the
 * parsed PodcastJobConfig and never re-checks it.
 */

import { z } from 'zod';
import { PODCAST_STYLES, VOICE_PRESETS } from './types.js';
import type { PodcastJobConfig } from './types.js';

export const MIN_SEGMENT_COUNT = 3;
export const MAX_SEGMENT_COUNT = 10;

export const podcastJobConfigSchema = z
  .object({
    voice: z.enum(VOICE_PRESETS).default('default'),
    segmentCount: z.number().int().min(MIN_SEGMENT_COUNT).max(MAX_SEGMENT_COUNT).default(5),
    style: z.enum(PODCAST_STYLES).default('professional'),
    addMusic: z.boolean().default(false),
    introOutro: z.boolean().default(false),
    denoise: z.boolean().default(false),
    title: z.string().trim().min(1).max(200).optional(),
  })
  .strict();

export type PodcastJobConfigInput = z.input<typeof podcastJobConfigSchema>;

export const DEFAULT_JOB_CONFIG: PodcastJobConfig = podcastJobConfigSchema.parse({});

export type ConfigParseResult =
  | { ok: true; config: PodcastJobConfig }
  | { ok: false; issues: string[] };

/**
 * Parse untrusted job config. Issues are formatted as `field: message`.
 */
export function parseJobConfig(input: unknown): ConfigParseResult {
  const parsed = podcastJobConfigSchema.safeParse(input ?? {});
  if (parsed.success) {
    return { ok: true, config: parsed.data };
  }
  return {
    ok: false,
    issues: parsed.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'config';
      return `${field}: ${issue.message}`;
    }),
  };
}
