/**
 * Podcast MCP Server - Entry Point
 *
 * Headless Node.js process communicating over stdio using JSON-RPC 2.0.
 * stdout is reserved for MCP protocol; all logging goes to stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createOrchestrator } from '../core/pipeline/createOrchestrator.js';
import { loadSettings } from '../core/settings.js';
import { createLogger, logSink } from '../core/utils/Logger.js';
import { VERSION } from '../shared/version.js';
import { createServer } from './server.js';

const log = createLogger('podcast-mcp');

log.info(`Podcast MCP server v${VERSION} starting...`);

process.on('uncaughtException', (error) => {
  log.error('Uncaught exception', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  log.error('Unhandled rejection', reason);
  process.exit(1);
});

try {
  const orchestrator = createOrchestrator(loadSettings());

  const shutdown = () => {
    log.info('Shutting down, cancelling unfinished jobs');
    orchestrator
      .shutdown()
      .then(() => logSink.flush())
      .then(
        () => process.exit(0),
        (error: unknown) => {
          log.error('Shutdown failed', error);
          process.exit(1);
        },
      );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  const server = createServer(orchestrator);
  const transport = new StdioServerTransport();
  await server.connect(transport);
} catch (error) {
  log.error('Failed to start MCP server', error);
  await logSink.flush();
  process.exit(1);
}
