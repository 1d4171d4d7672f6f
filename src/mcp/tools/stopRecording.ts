/**
 * Tool: stop_recording
 *
 * End the live recording of a job. The pipeline then continues on its own;
 * poll get_job_status for the result. Calling it again is harmless.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { createLogger } from '../../core/utils/Logger.js';
import { errorResult, formatStatus, textResult } from '../utils/format.js';
import type { PipelineOrchestrator } from '../../core/pipeline/PipelineOrchestrator.js';

const log = createLogger('mcp:stop_recording');

export function register(server: McpServer, orchestrator: PipelineOrchestrator): void {
  server.tool(
    'stop_recording',
    'Stop the live recording of a podcast job and let the pipeline finish.',
    {
      jobId: z.string().describe('Job ID of a live meeting'),
    },
    async ({ jobId }) => {
      try {
        log.info('Stopping recording', { jobId });
        const status = await orchestrator.stopRecording(jobId);
        return textResult(['Recording stopped.', formatStatus(status)].join('\n'));
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
