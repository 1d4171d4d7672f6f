/**
 * Tool: cancel_job
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { errorResult, formatStatus, textResult } from '../utils/format.js';
import type { PipelineOrchestrator } from '../../core/pipeline/PipelineOrchestrator.js';

export function register(server: McpServer, orchestrator: PipelineOrchestrator): void {
  server.tool(
    'cancel_job',
    'Cancel a podcast job. Finished jobs are left unchanged.',
    {
      jobId: z.string().describe('Job ID to cancel'),
    },
    async ({ jobId }) => {
      try {
        return textResult(formatStatus(orchestrator.cancel(jobId)));
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
