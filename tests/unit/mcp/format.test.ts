/**
 * MCP result formatting Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { errorResult, formatStatus, textResult } from '../../../src/mcp/utils/format.js';
import { PodcastError } from '../../../src/core/errors.js';
import type { JobStatus } from '../../../src/shared/types.js';

const BASE: JobStatus = {
  id: 'podcast-20260105-090307-ab12',
  workflowKind: 'UPLOAD',
  state: 'SYNTHESIZING',
  config: { voice: 'female', segmentCount: 4, style: 'energetic', addMusic: true, introOutro: false, denoise: false },
  createdAt: 0,
  progress: { done: 2, total: 4 },
  errorLog: [],
  history: [],
};

describe('textResult / errorResult', () => {
  it('wraps plain text', () => {
    expect(textResult('hello')).toEqual({ content: [{ type: 'text', text: 'hello' }] });
  });

  it('prefixes podcast errors with their code', () => {
    expect(errorResult(new PodcastError('Job not found: x', 'JOB_NOT_FOUND'))).toEqual({
      content: [{ type: 'text', text: 'Error: [JOB_NOT_FOUND] Job not found: x' }],
      isError: true,
    });
    expect(errorResult(new Error('boom')).content).toEqual([{ type: 'text', text: 'Error: boom' }]);
    expect(errorResult('odd').content).toEqual([{ type: 'text', text: 'Error: odd' }]);
  });
});

describe('formatStatus', () => {
  it('shows progress for a running job', () => {
    expect(formatStatus(BASE)).toBe(
      [
        'Job: podcast-20260105-090307-ab12',
        'Workflow: UPLOAD',
        'State: SYNTHESIZING',
        'Progress: 2/4',
        'Config: voice=female, segments=4, style=energetic, music=true',
      ].join('\n'),
    );
  });

  it('lists errors and the output of a finished job', () => {
    const status: JobStatus = {
      ...BASE,
      state: 'DONE',
      progress: null,
      errorLog: [
        {
          stage: 'SYNTHESIZING',
          kind: 'SYNTHESIS_UNAVAILABLE',
          message: 'Speech synthesis unavailable after 3 attempts: HTTP 503',
          keySegmentId: 'seg-02',
          at: 0,
        },
      ],
      output: {
        reference: {
          jobId: BASE.id,
          artifactPath: '/out/podcast.wav',
          manifestPath: '/out/manifest.json',
        },
        durationSeconds: 61.24,
        format: 'wav',
        narratedSegments: 3,
        degradedSegments: ['seg-02'],
      },
    };

    expect(formatStatus(status)).toBe(
      [
        'Job: podcast-20260105-090307-ab12',
        'Workflow: UPLOAD',
        'State: DONE',
        'Config: voice=female, segments=4, style=energetic, music=true',
        'Errors:',
        '  - SYNTHESIS_UNAVAILABLE during SYNTHESIZING (seg-02): Speech synthesis unavailable after 3 attempts: HTTP 503',
        'Duration: 61.2s',
        'Narrated segments: 3',
        'Degraded segments: seg-02',
        'Manifest: /out/manifest.json',
        'OUTPUT:/out/podcast.wav',
      ].join('\n'),
    );
  });
});
