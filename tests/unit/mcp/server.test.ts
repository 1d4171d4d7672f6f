/**
 * MCP Server Factory Unit Tests
 *
 * Tests that createServer():
 * - Names the server and reports the package version
 * - Registers every podcast tool
 */

import { describe, it, expect, vi } from 'vitest';

const { mockTool, mockMcpServer } = vi.hoisted(() => {
  const tool = vi.fn();
  return {
    mockTool: tool,
    mockMcpServer: vi.fn().mockImplementation(() => ({ tool })),
  };
});

vi.mock('@modelcontextprotocol/sdk/server/mcp.js', () => ({
  McpServer: mockMcpServer,
}));

import { createServer } from '../../../src/mcp/server.js';
import { VERSION } from '../../../src/shared/version.js';
import { createHarness } from '../../helpers/pipelineFakes.js';

describe('createServer', () => {
  it('registers the podcast tools on a named server', async () => {
    const harness = await createHarness();

    createServer(harness.orchestrator);

    expect(mockMcpServer).toHaveBeenCalledWith({ name: 'meeting-podcast', version: VERSION });
    expect(mockTool.mock.calls.map((call) => call[0])).toEqual([
      'create_podcast_job',
      'get_job_status',
      'stop_recording',
      'cancel_job',
      'list_jobs',
    ]);

    await harness.cleanup();
  });
});
