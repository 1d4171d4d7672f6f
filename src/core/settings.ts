/**
 * Runtime settings
 *
 * Read from the environment once per process (CLI run or MCP server). Vendor
 * keys are optional here; each entry point decides which collaborators it can
 * build without them.
 */

import { homedir, tmpdir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import type { OutputFormat } from '../shared/types.js';

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const settingsSchema = z.object({
  ANTHROPIC_API_KEY: optionalString,
  DEEPGRAM_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  PODCAST_OUTPUT_DIR: optionalString,
  PODCAST_WORK_DIR: optionalString,
  PODCAST_MUSIC_PATH: optionalString,
  PODCAST_CROSSFADE_MS: z.coerce.number().int().min(0).max(5000).default(300),
  PODCAST_COLOR_EXCERPT_SEC: z.coerce.number().min(0).max(30).default(0),
  PODCAST_SYNTHESIS_CONCURRENCY: z.coerce.number().int().min(1).max(10).default(3),
  PODCAST_OUTPUT_FORMAT: z.enum(['wav', 'mp3']).default('wav'),
  FFMPEG_PATH: z.string().trim().min(1).default('ffmpeg'),
  FFPROBE_PATH: z.string().trim().min(1).default('ffprobe'),
});

export interface RuntimeSettings {
  anthropicApiKey?: string;
  deepgramApiKey?: string;
  openaiApiKey?: string;
  outputDir: string;
  workDir: string;
  musicPath?: string;
  crossfadeSeconds: number;
  colorExcerptSeconds: number;
  synthesisConcurrency: number;
  outputFormat: OutputFormat;
  ffmpegPath: string;
  ffprobePath: string;
}

/**
 * Parse settings from an environment map. Throws a readable error listing
 * every invalid variable.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): RuntimeSettings {
  const parsed = settingsSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment settings: ${details}`);
  }

  const values = parsed.data;
  return {
    anthropicApiKey: values.ANTHROPIC_API_KEY,
    deepgramApiKey: values.DEEPGRAM_API_KEY,
    openaiApiKey: values.OPENAI_API_KEY,
    outputDir: values.PODCAST_OUTPUT_DIR ?? join(homedir(), 'Documents', 'meeting-podcast'),
    workDir: values.PODCAST_WORK_DIR ?? join(tmpdir(), 'meeting-podcast'),
    musicPath: values.PODCAST_MUSIC_PATH,
    crossfadeSeconds: values.PODCAST_CROSSFADE_MS / 1000,
    colorExcerptSeconds: values.PODCAST_COLOR_EXCERPT_SEC,
    synthesisConcurrency: values.PODCAST_SYNTHESIS_CONCURRENCY,
    outputFormat: values.PODCAST_OUTPUT_FORMAT,
    ffmpegPath: values.FFMPEG_PATH,
    ffprobePath: values.FFPROBE_PATH,
  };
}
