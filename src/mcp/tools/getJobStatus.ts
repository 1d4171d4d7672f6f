/**
 * Tool: get_job_status
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { errorResult, formatStatus, textResult } from '../utils/format.js';
import type { PipelineOrchestrator } from '../../core/pipeline/PipelineOrchestrator.js';

export function register(server: McpServer, orchestrator: PipelineOrchestrator): void {
  server.tool(
    'get_job_status',
    'Get the state, progress, errors and output of a podcast job.',
    {
      jobId: z.string().describe('Job ID returned by create_podcast_job'),
    },
    async ({ jobId }) => {
      try {
        return textResult(formatStatus(orchestrator.getStatus(jobId)));
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
