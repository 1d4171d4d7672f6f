/**
 * Transcript files supplied with an upload.
 *
 * Accepts either a bare array of chunks or `{ "chunks": [...] }`, with times
 * in seconds. Chunk ordering is checked later by the transcript buffer.
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import { PodcastError } from '../errors.js';
import type { TranscriptChunk } from '../../shared/types.js';

export const transcriptChunkSchema = z.object({
  startTime: z.number().finite().min(0),
  endTime: z.number().finite().min(0),
  speakerLabel: z.string().min(1).optional(),
  text: z.string(),
});

const transcriptFileSchema = z.preprocess(
  (data) => (data !== null && typeof data === 'object' && !Array.isArray(data) && 'chunks' in data ? data.chunks : data),
  z.array(transcriptChunkSchema),
);

export function parseTranscript(data: unknown): TranscriptChunk[] {
  const parsed = transcriptFileSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new PodcastError(`Invalid transcript${where}: ${issue?.message ?? 'unrecognized format'}`, 'INVALID_CHUNK');
  }
  return parsed.data;
}

export async function loadTranscriptFile(path: string): Promise<TranscriptChunk[]> {
  let raw: string;
  try {
    raw = await fs.readFile(path, 'utf-8');
  } catch (error) {
    throw new PodcastError(
      `Cannot read transcript file: ${path}`,
      'INVALID_CHUNK',
      error instanceof Error ? error : undefined,
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new PodcastError(`Transcript file is not valid JSON: ${path}`, 'INVALID_CHUNK');
  }
  return parseTranscript(data);
}
