/**
 * MCP Server Factory
 *
 * Creates the podcast MCP server with every tool wired to one orchestrator.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { VERSION } from '../shared/version.js';
import type { PipelineOrchestrator } from '../core/pipeline/PipelineOrchestrator.js';

import { register as registerCreatePodcastJob } from './tools/createPodcastJob.js';
import { register as registerGetJobStatus } from './tools/getJobStatus.js';
import { register as registerStopRecording } from './tools/stopRecording.js';
import { register as registerCancelJob } from './tools/cancelJob.js';
import { register as registerListJobs } from './tools/listJobs.js';

export function createServer(orchestrator: PipelineOrchestrator): McpServer {
  const server = new McpServer({
    name: 'meeting-podcast',
    version: VERSION,
  });

  registerCreatePodcastJob(server, orchestrator);
  registerGetJobStatus(server, orchestrator);
  registerStopRecording(server, orchestrator);
  registerCancelJob(server, orchestrator);
  registerListJobs(server, orchestrator);

  return server;
}
