/**
 * Tool: create_podcast_job
 *
 * Start a podcast job, either from an existing recording (`audioPath`) or
 * from a live microphone recording (`live: true`) that runs until
 * stop_recording is called. Returns immediately with the new job's status.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { existsSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { loadTranscriptFile } from '../../core/transcript/transcriptFile.js';
import { createLogger } from '../../core/utils/Logger.js';
import { PODCAST_STYLES, VOICE_PRESETS } from '../../shared/types.js';
import { errorResult, formatStatus, textResult } from '../utils/format.js';
import type { PipelineOrchestrator } from '../../core/pipeline/PipelineOrchestrator.js';
import type { JobInput } from '../../core/pipeline/JobRunner.js';

const log = createLogger('mcp:create_podcast_job');

export function register(server: McpServer, orchestrator: PipelineOrchestrator): void {
  server.tool(
    'create_podcast_job',
    'Create a podcast from a meeting. Pass audioPath for a recorded meeting, or live=true to record from the microphone until stop_recording is called.',
    {
      audioPath: z.string().optional().describe('Absolute path to a meeting recording'),
      live: z.boolean().optional().describe('Record a live meeting from the microphone'),
      transcriptPath: z.string().optional().describe('Transcript JSON for the recording (skips transcription)'),
      voice: z.enum(VOICE_PRESETS).optional().describe('Narrator voice (default: default)'),
      segmentCount: z.number().int().optional().describe('Key moments to narrate, 3-10 (default: 5)'),
      style: z.enum(PODCAST_STYLES).optional().describe('Narration style (default: professional)'),
      addMusic: z.boolean().optional().describe('Mix a background music bed (default: false)'),
      introOutro: z.boolean().optional().describe('Add a spoken intro and outro naming the meeting (default: false)'),
      denoise: z.boolean().optional().describe('Reduce background noise in original audio excerpts (default: false)'),
      title: z.string().optional().describe('Meeting title'),
    },
    async ({ audioPath, live, transcriptPath, voice, segmentCount, style, addMusic, introOutro, denoise, title }) => {
      try {
        if (Boolean(audioPath) === Boolean(live)) {
          return errorResult(new Error('Pass exactly one of audioPath or live=true.'));
        }

        let input: JobInput;
        if (audioPath) {
          const resolved = resolve(audioPath);
          if (!existsSync(resolved)) {
            return errorResult(new Error(`Audio file not found: ${resolved}`));
          }
          const transcript = transcriptPath ? await loadTranscriptFile(resolve(transcriptPath)) : undefined;
          input = { workflowKind: 'UPLOAD', audioPath: resolved, transcript };
        } else {
          if (transcriptPath) {
            return errorResult(new Error('transcriptPath only applies to recorded meetings.'));
          }
          input = { workflowKind: 'LIVE_MEETING' };
        }

        const config = Object.fromEntries(
          Object.entries({ voice, segmentCount, style, addMusic, introOutro, denoise, title }).filter(
            ([, value]) => value !== undefined,
          ),
        );
        const status = orchestrator.createJob({ input, config });
        log.info('Job created via MCP', { jobId: status.id });

        return textResult(
          [
            status.workflowKind === 'LIVE_MEETING'
              ? 'Recording started. Call stop_recording when the meeting ends.'
              : 'Podcast job started.',
            formatStatus(status),
          ].join('\n'),
        );
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
