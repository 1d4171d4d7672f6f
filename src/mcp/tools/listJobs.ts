/**
 * Tool: list_jobs
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { errorResult, textResult } from '../utils/format.js';
import type { PipelineOrchestrator } from '../../core/pipeline/PipelineOrchestrator.js';

export function register(server: McpServer, orchestrator: PipelineOrchestrator): void {
  server.tool(
    'list_jobs',
    'List podcast jobs known to this server, oldest first.',
    {},
    async () => {
      try {
        const jobs = orchestrator.listJobs();
        if (jobs.length === 0) {
          return textResult('No jobs.');
        }
        return textResult(jobs.map((job) => `${job.id}  ${job.workflowKind}  ${job.state}`).join('\n'));
      } catch (error) {
        return errorResult(error);
      }
    },
  );
}
