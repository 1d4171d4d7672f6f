/**
 * Text rendering of tool results.
 *
 * Tool replies are plain text read by an agent; the artifact path is repeated
 * on an `OUTPUT:` line so it can be picked out without parsing the rest.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { isPodcastError } from '../../core/errors.js';
import type { JobStatus } from '../../shared/types.js';

export function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

export function errorResult(error: unknown): CallToolResult {
  const message = isPodcastError(error)
    ? `[${error.code}] ${error.message}`
    : error instanceof Error
      ? error.message
      : String(error);
  return {
    content: [{ type: 'text', text: `Error: ${message}` }],
    isError: true,
  };
}

export function formatStatus(status: JobStatus): string {
  const lines = [
    `Job: ${status.id}`,
    `Workflow: ${status.workflowKind}`,
    `State: ${status.state}`,
  ];

  if (status.progress) {
    lines.push(`Progress: ${status.progress.done}/${status.progress.total}`);
  }

  const { config } = status;
  lines.push(
    `Config: voice=${config.voice}, segments=${config.segmentCount}, style=${config.style}, music=${config.addMusic}`,
  );

  if (status.errorLog.length > 0) {
    lines.push('Errors:');
    for (const entry of status.errorLog) {
      const segment = entry.keySegmentId ? ` (${entry.keySegmentId})` : '';
      lines.push(`  - ${entry.kind} during ${entry.stage}${segment}: ${entry.message}`);
    }
  }

  if (status.output) {
    const { output } = status;
    lines.push(
      `Duration: ${output.durationSeconds.toFixed(1)}s`,
      `Narrated segments: ${output.narratedSegments}`,
    );
    if (output.degradedSegments.length > 0) {
      lines.push(`Degraded segments: ${output.degradedSegments.join(', ')}`);
    }
    lines.push(`Manifest: ${output.reference.manifestPath}`, `OUTPUT:${output.reference.artifactPath}`);
  }

  return lines.join('\n');
}
